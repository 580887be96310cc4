// ─── Shared Socket.IO Event Types ───
// Imported by both client and server

import type { PlaybackFailureKind } from './errors';

// ─── Event Names ───
export const Events = {
    // Setup
    SELECT_ARTISTS: 'select_artists',
    PROGRAM_READY: 'program_ready',
    DEVICE_READY: 'device_ready',
    DEVICE_VERIFIED: 'device_verified',
    SESSION_ERROR: 'session_error',

    // Game controls
    START_GAME: 'start_game',
    PAUSE_GAME: 'pause_game',
    RESUME_GAME: 'resume_game',
    RESET_GAME: 'reset_game',
    REQUEST_STATE: 'request_state',

    // Clock
    GAME_STATE: 'game_state',
    ROUND_ADVANCED: 'round_advanced',
    ROUND_PROGRESS: 'round_progress',
    GAME_FINISHED: 'game_finished',
    PLAYBACK_FAILED: 'playback_failed',
} as const;

// ─── Game Shape ───

/** Artists per program, and tracks per artist. The round mapping assumes both. */
export const PROGRAM_SIZE = 10;

export type GameMode = 'normal' | 'test';

export interface SchedulerConfig {
    roundCount: number;
    intervalMs: number;
}

export const GAME_MODES: Record<GameMode, SchedulerConfig> = {
    normal: { roundCount: 100, intervalMs: 60_000 },
    test: { roundCount: 20, intervalMs: 10_000 },
};

export type SchedulerPhase = 'ready' | 'running' | 'paused' | 'finished';

// ─── Domain Data ───

export interface ArtistData {
    id: string;
    name: string;
    imageUrl: string | null;
}

export interface TrackData {
    uri: string;
    name: string;
    durationMs: number;
    artistName: string;
    albumImageUrl: string | null;
}

/** A track slot; null when the artist has fewer than ten top tracks. */
export type TrackSlot = TrackData | null;

export interface RoundSlot {
    artistIndex: number;
    trackRank: number;
}

/** What to play for one round. */
export interface PlaybackDirective extends RoundSlot {
    round: number;
    track: TrackData;
    startOffsetMs: number;
}

// ─── Payloads ───

export interface SelectArtistsPayload {
    artists: ArtistData[];
}

export interface ProgramReadyPayload {
    artists: ArtistData[];
    tracks: TrackSlot[][];
}

export interface DeviceReadyPayload {
    deviceId: string;
}

export interface DeviceVerifiedPayload {
    deviceId: string;
}

export interface StartGamePayload {
    mode: GameMode;
}

export interface SessionErrorPayload {
    message: string;
}

/** Fired once per round; directive is null when the slot holds no track. */
export interface RoundAdvancedPayload extends RoundSlot {
    round: number;
    roundCount: number;
    directive: PlaybackDirective | null;
}

export interface RoundProgressPayload {
    round: number;
    roundCount: number;
    remainingMs: number;
}

export interface GameFinishedPayload {
    roundCount: number;
    intervalMs: number;
}

export interface PlaybackFailedPayload {
    round: number;
    kind: PlaybackFailureKind;
    message: string;
}

export interface GameSnapshot {
    phase: SchedulerPhase;
    round: number;
    roundCount: number;
    intervalMs: number;
    remainingMs: number;
    mode: GameMode | null;
    hasProgram: boolean;
}

export interface GameStatePayload {
    snapshot: GameSnapshot;
}
