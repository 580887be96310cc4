// ─── Game State Store ───
// Mirrors the server's single game for a display client. Framework-free (zustand/vanilla);
// a UI binds to it with zustand's useStore.

import { createStore } from 'zustand/vanilla';
import {
    Events,
    PROGRAM_SIZE,
    type ArtistData,
    type GameFinishedPayload,
    type GameMode,
    type GameStatePayload,
    type PlaybackFailedPayload,
    type ProgramReadyPayload,
    type RoundAdvancedPayload,
    type RoundProgressPayload,
    type SchedulerPhase,
    type SessionErrorPayload,
    type DeviceVerifiedPayload,
    type TrackData,
} from '../../shared/events';
import { connectSocket, disconnectSocket, emit, type getSocket } from '../services/socketService';

export interface GameState {
    connected: boolean;
    error: string | null;

    // Setup
    selectedArtists: ArtistData[];
    program: ProgramReadyPayload | null;
    loadingProgram: boolean;
    deviceId: string | null;
    mode: GameMode;

    // Clock
    phase: SchedulerPhase;
    round: number;
    roundCount: number;
    remainingSeconds: number;
    lastRound: RoundAdvancedPayload | null;
    nowPlaying: TrackData | null;
    nowPlayingArtist: ArtistData | null;
    playbackError: PlaybackFailedPayload | null;
    finished: GameFinishedPayload | null;

    // Actions
    connect: (serverUrl?: string) => void;
    disconnect: () => void;
    selectArtist: (artist: ArtistData) => void;
    removeArtist: (artistId: string) => void;
    confirmArtists: () => void;
    registerDevice: (sdkDeviceId: string) => void;
    setMode: (mode: GameMode) => void;
    startGame: () => void;
    pauseGame: () => void;
    resumeGame: () => void;
    resetGame: () => void;
}

type GameData = Omit<GameState,
    | 'connect' | 'disconnect' | 'selectArtist' | 'removeArtist' | 'confirmArtists'
    | 'registerDevice' | 'setMode' | 'startGame' | 'pauseGame' | 'resumeGame' | 'resetGame'>;

const initialState: GameData = {
    connected: false,
    error: null,
    selectedArtists: [],
    program: null,
    loadingProgram: false,
    deviceId: null,
    mode: 'normal',
    phase: 'ready',
    round: 1,
    roundCount: 0,
    remainingSeconds: 0,
    lastRound: null,
    nowPlaying: null,
    nowPlayingArtist: null,
    playbackError: null,
    finished: null,
};

export const gameStore = createStore<GameState>()((set, get) => ({
    ...initialState,

    connect: (serverUrl) => {
        const socket = connectSocket(serverUrl);
        setupListeners(set, get, socket);
    },

    disconnect: () => {
        disconnectSocket();
        set({ ...initialState });
    },

    selectArtist: (artist) => {
        const { selectedArtists } = get();
        if (selectedArtists.length >= PROGRAM_SIZE) {
            set({ error: `You can only select ${PROGRAM_SIZE} artists` });
            return;
        }
        if (selectedArtists.some((a) => a.id === artist.id)) {
            set({ error: 'Artist already selected' });
            return;
        }
        set({ selectedArtists: [...selectedArtists, artist], error: null });
    },

    removeArtist: (artistId) => {
        set({ selectedArtists: get().selectedArtists.filter((a) => a.id !== artistId), error: null });
    },

    confirmArtists: () => {
        const { selectedArtists } = get();
        if (selectedArtists.length !== PROGRAM_SIZE) {
            set({ error: `Select ${PROGRAM_SIZE - selectedArtists.length} more artist(s)` });
            return;
        }
        set({ loadingProgram: true, error: null });
        emit(Events.SELECT_ARTISTS, { artists: selectedArtists });
    },

    registerDevice: (sdkDeviceId) => {
        emit(Events.DEVICE_READY, { deviceId: sdkDeviceId });
    },

    setMode: (mode) => {
        if (get().phase === 'running' || get().phase === 'paused') return;
        set({ mode });
    },

    startGame: () => {
        const { program, deviceId, mode } = get();
        if (!program) {
            set({ error: 'Select artists first' });
            return;
        }
        if (!deviceId) {
            set({ error: 'No Spotify device connected' });
            return;
        }
        set({ error: null, finished: null, playbackError: null });
        emit(Events.START_GAME, { mode });
    },

    pauseGame: () => {
        emit(Events.PAUSE_GAME);
    },

    resumeGame: () => {
        emit(Events.RESUME_GAME);
    },

    resetGame: () => {
        emit(Events.RESET_GAME);
    },
}));

/** Share of the program played so far, 0–100. */
export function progressPercent(state: Pick<GameState, 'round' | 'roundCount' | 'phase'>): number {
    if (state.roundCount === 0 || state.phase === 'ready') return 0;
    if (state.phase === 'finished') return 100;
    return (state.round / state.roundCount) * 100;
}

function setupListeners(
    set: (state: Partial<GameState>) => void,
    get: () => GameState,
    socket: ReturnType<typeof getSocket>
) {
    // Remove any old listeners first
    socket.removeAllListeners();

    // ─── Connection Events ───

    socket.on('connect', () => {
        set({ connected: true });
        socket.emit(Events.REQUEST_STATE);
    });

    socket.on('disconnect', () => {
        console.log('[Socket] Disconnected from server');
        set({ connected: false });
    });

    socket.on(Events.SESSION_ERROR, (data: SessionErrorPayload) => {
        set({ error: data.message, loadingProgram: false });
    });

    // ─── Setup ───

    socket.on(Events.PROGRAM_READY, (data: ProgramReadyPayload) => {
        set({
            program: data,
            selectedArtists: data.artists,
            loadingProgram: false,
            error: null,
        });
    });

    socket.on(Events.DEVICE_VERIFIED, (data: DeviceVerifiedPayload) => {
        set({ deviceId: data.deviceId });
    });

    // ─── Clock ───

    socket.on(Events.GAME_STATE, ({ snapshot }: GameStatePayload) => {
        const update: Partial<GameState> = {
            phase: snapshot.phase,
            round: snapshot.round,
            roundCount: snapshot.roundCount,
            remainingSeconds: Math.ceil(snapshot.remainingMs / 1000),
        };
        if (snapshot.mode) update.mode = snapshot.mode;
        if (snapshot.phase === 'ready') {
            update.lastRound = null;
            update.nowPlaying = null;
            update.nowPlayingArtist = null;
            update.playbackError = null;
        }
        set(update);
    });

    socket.on(Events.ROUND_ADVANCED, (data: RoundAdvancedPayload) => {
        set({
            round: data.round,
            roundCount: data.roundCount,
            lastRound: data,
            nowPlaying: data.directive?.track ?? null,
            nowPlayingArtist: get().program?.artists[data.artistIndex] ?? null,
            playbackError: null,
        });
    });

    socket.on(Events.ROUND_PROGRESS, (data: RoundProgressPayload) => {
        set({
            round: data.round,
            roundCount: data.roundCount,
            remainingSeconds: Math.ceil(data.remainingMs / 1000),
        });
    });

    socket.on(Events.PLAYBACK_FAILED, (data: PlaybackFailedPayload) => {
        // A late failure for an earlier round no longer describes what is on screen
        if (data.round !== get().round) return;
        set({ playbackError: data });
    });

    socket.on(Events.GAME_FINISHED, (data: GameFinishedPayload) => {
        set({
            phase: 'finished',
            round: data.roundCount,
            remainingSeconds: 0,
            finished: data,
        });
    });
}
