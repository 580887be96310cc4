import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createServer, type Server as HttpServer } from 'node:http';
import { Server } from 'socket.io';
import { io as connect, type Socket as ClientSocket } from 'socket.io-client';
import {
    Events,
    type ArtistData,
    type DeviceVerifiedPayload,
    type GameStatePayload,
    type ProgramReadyPayload,
    type RoundAdvancedPayload,
    type SessionErrorPayload,
    type TrackData,
} from '../../shared/events';
import { padTracks } from '../../shared/program';
import { GameSession, type PlaybackController } from '../GameSession';
import { registerGameSocket, type DeviceVerifier } from '../gameSocket';
import type { MusicCatalog } from '../providers/types';

const artists: ArtistData[] = Array.from({ length: 10 }, (_, i) => ({ id: `artist-${i}`, name: `Artist ${i}`, imageUrl: null }));

function song(artistId: string, rank: number): TrackData {
    return { uri: `spotify:track:${artistId}-${rank}`, name: `Song ${rank}`, durationMs: 240_000, artistName: artistId, albumImageUrl: null };
}

function nextEvent<T>(socket: ClientSocket, event: string): Promise<T> {
    return new Promise((resolve) => {
        socket.once(event, (payload: T) => resolve(payload));
    });
}

describe('game socket', () => {
    let httpServer: HttpServer;
    let io: Server;
    let session: GameSession;
    let devices: DeviceVerifier;
    let client: ClientSocket;

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});

        const catalog: MusicCatalog = {
            searchArtists: async () => [],
            getTopTrackSlots: async (id) => padTracks([song(id, 0), song(id, 1)]),
        };
        const playback: PlaybackController = {
            issuePlayback: async () => {},
            pause: async () => {},
            resume: async () => {},
        };
        session = new GameSession(catalog, playback);
        devices = { verifyDevice: vi.fn(async (sdkId: string) => `verified-${sdkId}`) };

        httpServer = createServer();
        io = new Server(httpServer);
        registerGameSocket(io, session, devices);
        await new Promise<void>((resolve) => httpServer.listen(0, '127.0.0.1', resolve));
        const address = httpServer.address();
        if (!address || typeof address === 'string') throw new Error('Test server has no port');

        client = connect(`http://127.0.0.1:${address.port}`, { transports: ['websocket'], autoConnect: false });
    });

    afterEach(async () => {
        client.disconnect();
        session.reset();
        await new Promise<void>((resolve) => {
            io.close(() => resolve());
        });
        vi.restoreAllMocks();
    });

    async function join(): Promise<GameStatePayload> {
        const state = nextEvent<GameStatePayload>(client, Events.GAME_STATE);
        client.connect();
        return state;
    }

    it('sends the current state to a new client', async () => {
        const { snapshot } = await join();

        expect(snapshot).toEqual({
            phase: 'ready',
            round: 1,
            roundCount: 0,
            intervalMs: 0,
            remainingMs: 0,
            mode: null,
            hasProgram: false,
        });
    });

    it('builds a program from ten artists and shares it', async () => {
        await join();
        const ready = nextEvent<ProgramReadyPayload>(client, Events.PROGRAM_READY);

        client.emit(Events.SELECT_ARTISTS, { artists });
        const program = await ready;

        expect(program.artists.map((a) => a.id)).toEqual(artists.map((a) => a.id));
        expect(program.tracks[2][1]?.uri).toBe('spotify:track:artist-2-1');
        expect(program.tracks[2][2]).toBeNull();
    });

    it('replays the program to clients that join later', async () => {
        await session.selectArtists(artists);
        const ready = nextEvent<ProgramReadyPayload>(client, Events.PROGRAM_READY);

        client.connect();

        await expect(ready).resolves.toMatchObject({ artists: expect.arrayContaining([expect.objectContaining({ id: 'artist-9' })]) });
    });

    it('reports a selection of the wrong size', async () => {
        await join();
        const error = nextEvent<SessionErrorPayload>(client, Events.SESSION_ERROR);

        client.emit(Events.SELECT_ARTISTS, { artists: artists.slice(0, 3) });

        await expect(error).resolves.toEqual({ message: 'Select exactly 10 artists' });
    });

    it('verifies the browser player device', async () => {
        await join();
        const verified = nextEvent<DeviceVerifiedPayload>(client, Events.DEVICE_VERIFIED);

        client.emit(Events.DEVICE_READY, { deviceId: 'sdk-1' });

        await expect(verified).resolves.toEqual({ deviceId: 'verified-sdk-1' });
        expect(devices.verifyDevice).toHaveBeenCalledWith('sdk-1');
    });

    it('refuses to start without a program', async () => {
        await join();
        const error = nextEvent<SessionErrorPayload>(client, Events.SESSION_ERROR);

        client.emit(Events.START_GAME, { mode: 'test' });

        await expect(error).resolves.toEqual({ message: 'Select 10 artists before starting a game' });
    });

    it('starts, pauses and resets a game for everyone', async () => {
        await session.selectArtists(artists);
        await join();

        const firstRound = nextEvent<RoundAdvancedPayload>(client, Events.ROUND_ADVANCED);
        client.emit(Events.START_GAME, { mode: 'test' });
        await expect(firstRound).resolves.toMatchObject({ round: 1, roundCount: 20, artistIndex: 0, trackRank: 0 });

        const paused = nextEvent<GameStatePayload>(client, Events.GAME_STATE);
        client.emit(Events.PAUSE_GAME);
        await expect(paused).resolves.toMatchObject({ snapshot: { phase: 'paused', mode: 'test', round: 1 } });

        const reset = nextEvent<GameStatePayload>(client, Events.GAME_STATE);
        client.emit(Events.RESET_GAME);
        await expect(reset).resolves.toMatchObject({ snapshot: { phase: 'ready', mode: null, hasProgram: true } });
    });
});
