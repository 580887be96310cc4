import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { computeStartOffsetMs } from '../shared/dropOffset';
import { AuthRequiredError, InvalidInputError, PlaybackError, type PlaybackFailureKind } from '../shared/errors';
import { PROGRAM_SIZE, type TrackSlot } from '../shared/events';
import type { SpotifyTokens, TokenStore } from './auth/TokenStore';
import type { DeviceDirectory, MusicCatalog } from './providers/types';
import { SpotifyApiError } from './providers/spotify/spotifyApi';

export interface AppDependencies {
    clientUrl: string;
    corsOrigins: string[];
    tokens: TokenStore;
    catalog: MusicCatalog;
    devices: DeviceDirectory;
    playback: { playAt(deviceId: string, trackUri: string, positionMs: number): Promise<void> };
    authorizeUrl: (state: string) => string;
    exchangeCode: (code: string) => Promise<SpotifyTokens>;
}

/** A login round-trip has this long to come back through /callback. */
const STATE_TTL_MS = 10 * 60 * 1000;

const searchQuerySchema = z.object({
    q: z.string().optional().default(''),
    limit: z.coerce.number().int().min(1).max(50).optional(),
});

const tracksBodySchema = z.object({
    artist_ids: z.array(z.string().min(1)).length(PROGRAM_SIZE, `Must provide exactly ${PROGRAM_SIZE} artist IDs`),
});

const playMinuteBodySchema = z.object({
    device_id: z.string().min(1),
    track_uri: z.string().min(1),
    duration_ms: z.number().int().nonnegative(),
});

const callbackQuerySchema = z.object({
    code: z.string().optional(),
    state: z.string().optional(),
    error: z.string().optional(),
});

const PLAYBACK_STATUS: Record<PlaybackFailureKind, number> = {
    DeviceNotFound: 404,
    PremiumRequired: 403,
    RateLimited: 429,
    Unknown: 500,
};

export function createApp(deps: AppDependencies) {
    const app = express();
    const pendingStates = new Map<string, number>();

    app.use(cors({ origin: deps.corsOrigins, credentials: true }));
    app.use(express.json());

    app.get('/', (_req, res) => {
        res.json({
            message: 'Club 100 API',
            status: 'running',
            authenticated: deps.tokens.hasTokens(),
        });
    });

    // Health check
    app.get('/health', (_req, res) => {
        res.json({
            status: 'healthy',
            has_tokens: deps.tokens.hasTokens(),
            token_expired: deps.tokens.isExpired(),
        });
    });

    // ─── Auth ───

    app.get('/login', (_req, res) => {
        const now = Date.now();
        for (const [state, expiresAt] of pendingStates) {
            if (expiresAt <= now) pendingStates.delete(state);
        }
        const state = nanoid();
        pendingStates.set(state, now + STATE_TTL_MS);
        res.redirect(deps.authorizeUrl(state));
    });

    app.get('/callback', async (req, res) => {
        const { code, state, error } = callbackQuerySchema.parse(req.query);
        if (error) {
            res.status(400).json({ error: `Spotify authorization failed: ${error}` });
            return;
        }
        const expiresAt = state ? pendingStates.get(state) : undefined;
        if (!state || expiresAt === undefined || expiresAt <= Date.now()) {
            res.status(400).json({ error: 'Invalid or expired login state. Start the login again.' });
            return;
        }
        pendingStates.delete(state);
        if (!code) {
            res.status(400).json({ error: 'Missing authorization code' });
            return;
        }

        deps.tokens.setTokens(await deps.exchangeCode(code));
        console.log('[HTTP] Spotify login complete');
        res.redirect(deps.clientUrl);
    });

    app.post('/logout', (_req, res) => {
        deps.tokens.clear();
        res.json({ status: 'logged_out' });
    });

    // Access token for the browser playback SDK
    app.get('/api/token', async (_req, res) => {
        const accessToken = await deps.tokens.getCredential();
        res.json({ access_token: accessToken });
    });

    // ─── Catalog ───

    app.get('/api/search', async (req, res) => {
        const { q, limit } = searchQuerySchema.parse(req.query);
        if (q.trim() === '') {
            res.json([]);
            return;
        }
        res.json(await deps.catalog.searchArtists(q.trim(), limit));
    });

    app.post('/api/tracks', async (req, res) => {
        const { artist_ids } = tracksBodySchema.parse(req.body);
        const tracks: TrackSlot[][] = [];
        for (const artistId of artist_ids) {
            tracks.push(await deps.catalog.getTopTrackSlots(artistId));
        }
        res.json({ tracks });
    });

    // ─── Playback ───

    app.get('/api/devices', async (_req, res) => {
        res.json({ devices: await deps.devices.listDevices() });
    });

    app.post('/api/play-minute', async (req, res) => {
        const body = playMinuteBodySchema.parse(req.body);
        const positionMs = computeStartOffsetMs(body.duration_ms);
        await deps.playback.playAt(body.device_id, body.track_uri, positionMs);
        res.json({ status: 'ok', position_ms: positionMs });
    });

    app.use(errorHandler);

    return app;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
    if (err instanceof z.ZodError) {
        res.status(400).json({ error: err.errors.map((e) => e.message).join('; ') });
        return;
    }
    if (err instanceof InvalidInputError) {
        res.status(400).json({ error: err.message });
        return;
    }
    if (err instanceof AuthRequiredError) {
        res.status(401).json({ error: err.message });
        return;
    }
    if (err instanceof PlaybackError) {
        res.status(PLAYBACK_STATUS[err.kind]).json({ error: err.message, kind: err.kind });
        return;
    }
    if (err instanceof SpotifyApiError) {
        res.status(err.status >= 400 ? err.status : 502).json({ error: err.message });
        return;
    }
    console.error('[HTTP] Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
}
