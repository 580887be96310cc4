import type { Server, Socket } from 'socket.io';
import { z } from 'zod';
import { Events, PROGRAM_SIZE, type ProgramReadyPayload, type TrackSlot } from '../shared/events';
import { describeError } from '../shared/errors';
import type { Program } from '../shared/program';
import type { GameSession } from './GameSession';

/** Verifies the browser SDK's device before playback; SpotifyPlayback in production. */
export interface DeviceVerifier {
    verifyDevice(sdkDeviceId: string): Promise<string>;
}

const artistSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    imageUrl: z.string().nullable().default(null),
});

const selectArtistsSchema = z.object({
    artists: z.array(artistSchema).length(PROGRAM_SIZE, `Select exactly ${PROGRAM_SIZE} artists`),
});

const deviceReadySchema = z.object({ deviceId: z.string().min(1) });

const startGameSchema = z.object({ mode: z.enum(['normal', 'test']).default('normal') });

function errorMessage(e: unknown): string {
    if (e instanceof z.ZodError) return e.errors.map((err) => err.message).join('; ');
    return describeError(e);
}

/**
 * Wire the single game session to every connected socket.
 * All clients see the same game; any of them can drive it.
 */
export function registerGameSocket(io: Server, session: GameSession, devices: DeviceVerifier): void {
    wireSessionCallbacks(io, session);

    io.on('connection', (socket: Socket) => {
        console.log(`[IO] Connected: ${socket.id}`);

        const fail = (e: unknown) => {
            const message = errorMessage(e);
            console.warn(`[IO] ${socket.id}: ${message}`);
            socket.emit(Events.SESSION_ERROR, { message });
        };

        // Late joiners get the current state straight away
        socket.emit(Events.GAME_STATE, { snapshot: session.getSnapshot() });
        const program = session.getProgram();
        if (program) {
            socket.emit(Events.PROGRAM_READY, toProgramPayload(program));
        }

        // ─── Setup ───

        socket.on(Events.SELECT_ARTISTS, async (payload: unknown) => {
            try {
                const { artists } = selectArtistsSchema.parse(payload);
                const built = await session.selectArtists(artists);
                io.emit(Events.PROGRAM_READY, toProgramPayload(built));
            } catch (e) {
                fail(e);
            }
        });

        socket.on(Events.DEVICE_READY, async (payload: unknown) => {
            try {
                const { deviceId } = deviceReadySchema.parse(payload);
                const verified = await devices.verifyDevice(deviceId);
                socket.emit(Events.DEVICE_VERIFIED, { deviceId: verified });
            } catch (e) {
                fail(e);
            }
        });

        // ─── Game Controls ───

        socket.on(Events.START_GAME, (payload: unknown) => {
            try {
                const { mode } = startGameSchema.parse(payload ?? {});
                session.start(mode);
            } catch (e) {
                fail(e);
            }
        });

        socket.on(Events.PAUSE_GAME, () => session.pause());
        socket.on(Events.RESUME_GAME, () => session.resume());
        socket.on(Events.RESET_GAME, () => session.reset());

        socket.on(Events.REQUEST_STATE, () => {
            socket.emit(Events.GAME_STATE, { snapshot: session.getSnapshot() });
        });

        socket.on('disconnect', () => {
            console.log(`[IO] Disconnected: ${socket.id}`);
        });
    });
}

function wireSessionCallbacks(io: Server, session: GameSession): void {
    session.onRoundAdvanced = (event) => {
        io.emit(Events.ROUND_ADVANCED, event);
    };

    session.onProgress = (progress) => {
        io.emit(Events.ROUND_PROGRESS, progress);
    };

    session.onFinished = (summary) => {
        io.emit(Events.GAME_FINISHED, summary);
    };

    session.onPlaybackFailed = (failure) => {
        io.emit(Events.PLAYBACK_FAILED, failure);
    };

    session.onStateChange = (snapshot) => {
        io.emit(Events.GAME_STATE, { snapshot });
    };
}

function toProgramPayload(program: Program): ProgramReadyPayload {
    return {
        artists: program.artists.map((a) => ({ ...a })),
        tracks: program.slots.map((slots): TrackSlot[] => slots.map((t) => (t ? { ...t } : null))),
    };
}
