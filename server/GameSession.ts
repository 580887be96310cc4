import {
    GAME_MODES,
    PROGRAM_SIZE,
    type ArtistData,
    type GameFinishedPayload,
    type GameMode,
    type GameSnapshot,
    type PlaybackDirective,
    type PlaybackFailedPayload,
    type RoundAdvancedPayload,
    type RoundProgressPayload,
    type TrackSlot,
} from '../shared/events';
import { InvalidInputError, describeError } from '../shared/errors';
import { buildProgram, type Program } from '../shared/program';
import type { MusicCatalog } from './providers/types';
import { RoundScheduler } from './RoundScheduler';

/** What the session needs from the playback side. */
export interface PlaybackController {
    issuePlayback(directive: PlaybackDirective): Promise<void>;
    pause(): Promise<void>;
    resume(): Promise<void>;
}

/**
 * The one game this process runs: the selected program plus the round clock.
 * Spotify's own player is paused and resumed alongside the clock.
 */
export class GameSession {
    private program: Program | null = null;
    private mode: GameMode | null = null;
    private loading = false;

    // Callbacks set by the socket handler
    onRoundAdvanced?: (event: RoundAdvancedPayload) => void;
    onProgress?: (progress: RoundProgressPayload) => void;
    onFinished?: (summary: GameFinishedPayload) => void;
    onPlaybackFailed?: (failure: PlaybackFailedPayload) => void;
    onStateChange?: (snapshot: GameSnapshot) => void;

    constructor(
        private catalog: MusicCatalog,
        private playback: PlaybackController,
        private scheduler = new RoundScheduler()
    ) {
        this.scheduler.onRoundAdvanced = (event) => this.onRoundAdvanced?.(event);
        this.scheduler.onProgress = (progress) => this.onProgress?.(progress);
        this.scheduler.onFinished = (summary) => this.onFinished?.(summary);
        this.scheduler.onPlaybackFailed = ({ round, error }) => {
            this.onPlaybackFailed?.({ round, kind: error.kind, message: error.message });
        };
        this.scheduler.onPhaseChange = () => this.emitState();
    }

    // ─── Program ───

    /**
     * Fetch each artist's top tracks and build a fresh program.
     * Any game in progress is discarded first.
     */
    async selectArtists(artists: ArtistData[]): Promise<Program> {
        if (artists.length !== PROGRAM_SIZE) {
            throw new InvalidInputError(`Select exactly ${PROGRAM_SIZE} artists (got ${artists.length})`);
        }
        if (this.loading) {
            throw new InvalidInputError('Already loading tracks for a selection');
        }

        this.loading = true;
        try {
            const tracksByArtist: TrackSlot[][] = [];
            // One artist at a time: the Spotify client queues requests anyway
            for (const artist of artists) {
                tracksByArtist.push(await this.catalog.getTopTrackSlots(artist.id));
            }
            const program = buildProgram(artists, tracksByArtist);

            this.mode = null;
            this.scheduler.reset();
            this.program = program;

            const playable = tracksByArtist.flat().filter((t) => t !== null).length;
            console.log(`[Session] Program ready: ${artists.length} artists, ${playable} playable tracks`);
            this.emitState();
            return program;
        } finally {
            this.loading = false;
        }
    }

    getProgram(): Program | null {
        return this.program;
    }

    // ─── Game Controls ───

    start(mode: GameMode): void {
        if (!this.program) {
            throw new InvalidInputError(`Select ${PROGRAM_SIZE} artists before starting a game`);
        }
        const phase = this.scheduler.getPhase();
        if (phase === 'running' || phase === 'paused') {
            console.warn(`[Session] Game already ${phase}; reset it before starting another`);
            return;
        }
        if (phase === 'finished') {
            this.scheduler.reset();
        }
        this.mode = mode;
        this.scheduler.start(GAME_MODES[mode], this.program, (directive) => this.playback.issuePlayback(directive));
    }

    pause(): void {
        if (this.scheduler.getPhase() !== 'running') return;
        this.scheduler.pause();
        this.controlPlayer('pause', () => this.playback.pause());
    }

    resume(): void {
        if (this.scheduler.getPhase() !== 'paused') return;
        this.scheduler.resume();
        this.controlPlayer('resume', () => this.playback.resume());
    }

    reset(): void {
        const wasPlaying = this.scheduler.getPhase() === 'running';
        this.mode = null;
        this.scheduler.reset();
        if (wasPlaying) this.controlPlayer('pause', () => this.playback.pause());
    }

    getSnapshot(): GameSnapshot {
        const { phase, round, roundCount, intervalMs, remainingMs } = this.scheduler.getSnapshot();
        return { phase, round, roundCount, intervalMs, remainingMs, mode: this.mode, hasProgram: this.program !== null };
    }

    private emitState(): void {
        this.onStateChange?.(this.getSnapshot());
    }

    private controlPlayer(action: string, command: () => Promise<void>): void {
        void command().catch((e: unknown) => {
            console.warn(`[Session] Could not ${action} the Spotify player: ${describeError(e)}`);
        });
    }
}
