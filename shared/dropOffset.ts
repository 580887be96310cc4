// ─── Drop Offset ───

/** Where the drop sits, as a fraction of the track. */
export const DROP_POSITION = 0.6;

/** Keep at least this much of the track ahead of the start point... */
export const PREFERRED_TAIL_MS = 45_000;

/** ...and never less than this. */
export const MIN_TAIL_MS = 10_000;

/**
 * Start offset for a round: about 60% in, leaving 45s of track where possible
 * and 10s at the very least. Short tracks start from 0.
 */
export function computeStartOffsetMs(durationMs: number): number {
    const raw = Math.min(DROP_POSITION * durationMs, durationMs - PREFERRED_TAIL_MS);
    const offset = Math.max(0, Math.min(raw, durationMs - MIN_TAIL_MS));
    return Math.trunc(offset);
}
