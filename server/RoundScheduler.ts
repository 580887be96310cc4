import type {
    PlaybackDirective,
    RoundAdvancedPayload,
    RoundProgressPayload,
    GameFinishedPayload,
    SchedulerConfig,
    SchedulerPhase,
} from '../shared/events';
import { computeStartOffsetMs } from '../shared/dropOffset';
import { InvalidConfigError, PlaybackError, describeError } from '../shared/errors';
import { slotForRound, trackAt, type Program } from '../shared/program';

/** Issues the actual play command for a round. Fire-and-forget from the scheduler's side. */
export type PlaybackSink = (directive: PlaybackDirective) => Promise<void>;

export interface PlaybackFailure {
    round: number;
    error: PlaybackError;
}

export interface SchedulerSnapshot {
    phase: SchedulerPhase;
    round: number;
    roundCount: number;
    intervalMs: number;
    remainingMs: number;
}

export interface RoundSchedulerOptions {
    /**
     * Where a resumed round picks up. 'round-start' rewinds the clock to the start of the
     * paused round; 'paused-instant' keeps the time already spent in it.
     */
    resumeFrom?: 'round-start' | 'paused-instant';
    /** Upper bound between wake-ups, so progress reports keep flowing on long rounds. */
    maxWakeIntervalMs?: number;
}

const DEFAULT_MAX_WAKE_INTERVAL_MS = 1000;

/**
 * Wall-clock round driver.
 *
 * Rounds are derived from `now - epoch` on every wake-up instead of counting ticks, so
 * late timers never accumulate drift. A round fires at most once; rounds slept through
 * are dropped. Each wake-up chain carries a generation number: pause, resume, reset and
 * start bump it, and a callback from an older chain does nothing. If the host clock
 * steps backwards the epoch moves with it, so elapsed time never decreases.
 */
export class RoundScheduler {
    private phase: SchedulerPhase = 'ready';
    private config: SchedulerConfig | null = null;
    private program: Program | null = null;
    private sink: PlaybackSink | null = null;

    private currentRound = 1;
    private epoch = 0;
    private lastFiredRound = 0;
    private lastElapsed = 0;
    private pausedElapsed = 0;

    private generation = 0;
    private runId = 0;
    private timer: ReturnType<typeof setTimeout> | null = null;

    private readonly resumeFrom: 'round-start' | 'paused-instant';
    private readonly maxWakeIntervalMs: number;

    // Callbacks set by the owning session
    onRoundAdvanced?: (event: RoundAdvancedPayload) => void;
    onProgress?: (progress: RoundProgressPayload) => void;
    onFinished?: (summary: GameFinishedPayload) => void;
    onPlaybackFailed?: (failure: PlaybackFailure) => void;
    onPhaseChange?: (phase: SchedulerPhase) => void;

    constructor(options: RoundSchedulerOptions = {}) {
        this.resumeFrom = options.resumeFrom ?? 'round-start';
        this.maxWakeIntervalMs = options.maxWakeIntervalMs ?? DEFAULT_MAX_WAKE_INTERVAL_MS;
    }

    getPhase(): SchedulerPhase {
        return this.phase;
    }

    getCurrentRound(): number {
        return this.currentRound;
    }

    getSnapshot(): SchedulerSnapshot {
        const roundCount = this.config?.roundCount ?? 0;
        const intervalMs = this.config?.intervalMs ?? 0;
        let remainingMs = 0;
        if (this.phase === 'running') {
            remainingMs = Math.min(intervalMs, Math.max(0, this.currentRound * intervalMs - this.elapsedMs()));
        } else if (this.phase === 'paused') {
            remainingMs = this.resumeFrom === 'paused-instant'
                ? this.currentRound * intervalMs - this.pausedElapsed
                : intervalMs;
        }
        return { phase: this.phase, round: this.currentRound, roundCount, intervalMs, remainingMs };
    }

    // ─── Commands ───

    start(config: SchedulerConfig, program: Program, sink: PlaybackSink): void {
        validateConfig(config);
        if (this.phase !== 'ready') {
            console.warn(`[Scheduler] start ignored while ${this.phase}`);
            return;
        }

        this.config = { ...config };
        this.program = program;
        this.sink = sink;
        this.currentRound = 1;
        this.lastFiredRound = 0;
        this.lastElapsed = 0;
        this.pausedElapsed = 0;
        this.epoch = Date.now();
        this.runId++;

        console.log(`[Scheduler] Starting ${config.roundCount} rounds × ${config.intervalMs}ms`);
        this.setPhase('running');
        this.wake(++this.generation);
    }

    pause(): void {
        if (this.phase !== 'running' || !this.config) return;

        this.cancelWakeUp();
        this.generation++;
        // Clamp to the current round so a wake-up that was due but not yet run cannot leak in
        const elapsed = this.elapsedMs();
        const roundStart = (this.currentRound - 1) * this.config.intervalMs;
        this.pausedElapsed = Math.min(Math.max(elapsed, roundStart), this.currentRound * this.config.intervalMs - 1);

        console.log(`[Scheduler] Paused in round ${this.currentRound}`);
        this.setPhase('paused');
    }

    resume(): void {
        if (this.phase !== 'paused' || !this.config) return;

        const resumeElapsed = this.resumeFrom === 'paused-instant'
            ? this.pausedElapsed
            : (this.currentRound - 1) * this.config.intervalMs;
        this.epoch = Date.now() - resumeElapsed;
        this.lastElapsed = resumeElapsed;

        console.log(`[Scheduler] Resumed in round ${this.currentRound}`);
        this.setPhase('running');
        this.wake(++this.generation);
    }

    reset(): void {
        this.cancelWakeUp();
        this.generation++;
        this.runId++;
        this.config = null;
        this.program = null;
        this.sink = null;
        this.currentRound = 1;
        this.lastFiredRound = 0;
        this.lastElapsed = 0;
        this.pausedElapsed = 0;
        this.epoch = 0;

        if (this.phase !== 'ready') {
            console.log('[Scheduler] Reset');
            this.setPhase('ready');
        }
    }

    // ─── Clock ───

    private wake(generation: number): void {
        if (generation !== this.generation || this.phase !== 'running' || !this.config) return;
        this.timer = null;

        const { roundCount, intervalMs } = this.config;
        const elapsed = this.elapsedMs();
        const round = Math.floor(elapsed / intervalMs) + 1;

        if (round > roundCount) {
            this.finish();
            return;
        }

        this.currentRound = round;
        if (round !== this.lastFiredRound) {
            if (this.lastFiredRound > 0 && round > this.lastFiredRound + 1) {
                console.warn(`[Scheduler] Woke late: skipped rounds ${this.lastFiredRound + 1}-${round - 1}`);
            }
            this.lastFiredRound = round;
            this.fireRound(round);
            // A listener may have paused or reset us
            if (generation !== this.generation || this.phase !== 'running') return;
        }

        const remainingMs = round * intervalMs - elapsed;
        this.onProgress?.({ round, roundCount, remainingMs });
        if (generation !== this.generation || this.phase !== 'running') return;

        this.timer = setTimeout(() => this.wake(generation), Math.min(remainingMs, this.maxWakeIntervalMs));
    }

    /** Time since the epoch, never less than the last reading. */
    private elapsedMs(): number {
        const elapsed = Date.now() - this.epoch;
        if (elapsed < this.lastElapsed) {
            console.warn(`[Scheduler] Clock stepped back ${this.lastElapsed - elapsed}ms, holding the round`);
            this.epoch = Date.now() - this.lastElapsed;
            return this.lastElapsed;
        }
        this.lastElapsed = elapsed;
        return elapsed;
    }

    private fireRound(round: number): void {
        if (!this.config || !this.program) return;

        const slot = slotForRound(round);
        const track = trackAt(this.program, slot);
        const directive: PlaybackDirective | null = track
            ? { round, ...slot, track, startOffsetMs: computeStartOffsetMs(track.durationMs) }
            : null;

        if (!directive) {
            console.log(`[Scheduler] Round ${round}: no track for artist ${slot.artistIndex}, rank ${slot.trackRank}, skipping playback`);
        }

        this.onRoundAdvanced?.({ round, roundCount: this.config.roundCount, ...slot, directive });

        if (directive) this.dispatch(directive);
    }

    private dispatch(directive: PlaybackDirective): void {
        const sink = this.sink;
        if (!sink) return;
        const runId = this.runId;

        let pending: Promise<void>;
        try {
            pending = sink(directive);
        } catch (e) {
            pending = Promise.reject(e);
        }

        void pending.catch((e: unknown) => {
            const error = e instanceof PlaybackError ? e : new PlaybackError('Unknown', describeError(e));
            if (runId !== this.runId) {
                console.warn(`[Scheduler] Dropping playback failure from a previous run: ${error.message}`);
                return;
            }
            console.error(`[Scheduler] Round ${directive.round} playback failed (${error.kind}): ${error.message}`);
            this.onPlaybackFailed?.({ round: directive.round, error });
        });
    }

    private finish(): void {
        if (!this.config) return;
        const { roundCount, intervalMs } = this.config;

        this.cancelWakeUp();
        this.generation++;
        this.currentRound = roundCount;

        console.log(`[Scheduler] Finished after ${roundCount} rounds`);
        this.setPhase('finished');
        this.onFinished?.({ roundCount, intervalMs });
    }

    private cancelWakeUp(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }

    private setPhase(phase: SchedulerPhase): void {
        this.phase = phase;
        this.onPhaseChange?.(phase);
    }
}

function validateConfig(config: SchedulerConfig): void {
    if (!Number.isInteger(config.roundCount) || config.roundCount <= 0) {
        throw new InvalidConfigError(`roundCount must be a positive integer, got ${config.roundCount}`);
    }
    if (!Number.isInteger(config.intervalMs) || config.intervalMs <= 0) {
        throw new InvalidConfigError(`intervalMs must be a positive integer, got ${config.intervalMs}`);
    }
}
