// ─── Error Taxonomy ───
// Shared by the server core, the HTTP layer and the client store.

/** Malformed program input: wrong artist count, wrong slot grid shape, bad round. */
export class InvalidInputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidInputError';
    }
}

/** Scheduler started with a non-positive round count or interval. */
export class InvalidConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidConfigError';
    }
}

/** No usable Spotify credential: the user has to log in (again). */
export class AuthRequiredError extends Error {
    constructor(message = 'Not authenticated. Please log in with Spotify.') {
        super(message);
        this.name = 'AuthRequiredError';
    }
}

export const PLAYBACK_FAILURE_KINDS = ['DeviceNotFound', 'PremiumRequired', 'RateLimited', 'Unknown'] as const;

export type PlaybackFailureKind = (typeof PLAYBACK_FAILURE_KINDS)[number];

/**
 * A play/pause command that did not go through.
 * Non-fatal for the scheduler: the round still counts and the next one plays normally.
 */
export class PlaybackError extends Error {
    constructor(public kind: PlaybackFailureKind, message: string) {
        super(message);
        this.name = 'PlaybackError';
    }
}

export function describeError(e: unknown): string {
    if (e instanceof Error) return e.message;
    return String(e);
}
