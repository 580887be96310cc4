// ─── Spotify Web API Wrapper ───

import { z } from 'zod';
import { AuthRequiredError } from '../../../shared/errors';
import type { CredentialProvider } from '../../auth/TokenStore';

const BASE_URL = 'https://api.spotify.com/v1';

export class SpotifyApiError extends Error {
    constructor(public status: number, message: string, public reason?: string) {
        super(message);
        this.name = 'SpotifyApiError';
    }
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

const MAX_RETRIES = 5;
const MAX_BACKOFF_MS = 10_000;

export interface SpotifyClientOptions {
    /** Minimum gap between consecutive requests. */
    minGapMs?: number;
    /** Random extra wait added to each 429 backoff. */
    maxJitterMs?: number;
}

// ─── API Types (Spotify response shapes) ───

const imageSchema = z.object({
    url: z.string(),
    height: z.number().nullable().optional(),
    width: z.number().nullable().optional(),
});

const artistSchema = z.object({
    id: z.string(),
    name: z.string(),
    images: z.array(imageSchema).optional().default([]),
});

const trackSchema = z.object({
    uri: z.string(),
    name: z.string(),
    duration_ms: z.number().int().nonnegative(),
    artists: z.array(z.object({ name: z.string() })).optional().default([]),
    album: z.object({ images: z.array(imageSchema).optional().default([]) }).optional(),
});

const deviceSchema = z.object({
    id: z.string().nullable(),
    name: z.string(),
    type: z.string(),
    is_active: z.boolean(),
    is_restricted: z.boolean().optional().default(false),
    volume_percent: z.number().nullable().optional(),
});

const errorBodySchema = z.object({
    error: z.object({
        status: z.number().optional(),
        message: z.string().optional(),
        reason: z.string().optional(),
    }),
});

export const artistSearchSchema = z.object({
    artists: z.object({ items: z.array(artistSchema) }),
});

export const topTracksSchema = z.object({
    tracks: z.array(trackSchema),
});

export const devicesSchema = z.object({
    devices: z.array(deviceSchema),
});

export type SpotifyArtist = z.infer<typeof artistSchema>;
export type SpotifyTrack = z.infer<typeof trackSchema>;
export type SpotifyDevice = z.infer<typeof deviceSchema>;

function parseErrorBody(text: string): z.infer<typeof errorBodySchema> | null {
    try {
        const result = errorBodySchema.safeParse(JSON.parse(text));
        return result.success ? result.data : null;
    } catch {
        // Not JSON
        return null;
    }
}

/**
 * Low-level client for the Spotify Web API.
 * - Serial queue with a minimum gap between requests
 * - Exponential backoff with jitter on 429, pausing the whole queue
 * - One retry with a force-refreshed token on 401
 * - Network failures surface as status 0
 */
export class SpotifyClient {
    private lastRequestTime = 0;
    private readonly minGapMs: number;
    private readonly maxJitterMs: number;

    constructor(private credentials: CredentialProvider, options: SpotifyClientOptions = {}) {
        this.minGapMs = options.minGapMs ?? 300;
        this.maxJitterMs = options.maxJitterMs ?? 500;
    }

    /** GET and validate the JSON body against `schema`. */
    async getJson<S extends z.ZodTypeAny>(endpoint: string, schema: S, retries = MAX_RETRIES): Promise<z.infer<S>> {
        const response = await this.execute(endpoint, { method: 'GET' }, retries);
        const json: unknown = await response.json();
        return schema.parse(json);
    }

    /** Fire a command endpoint (play, pause) that answers 204 No Content. */
    async send(endpoint: string, init: RequestInit, retries = MAX_RETRIES): Promise<void> {
        await this.execute(endpoint, init, retries);
    }

    // Claim the next slot before sleeping so concurrent callers line up behind each other
    private async waitForSlot(): Promise<void> {
        const slot = Math.max(this.lastRequestTime + this.minGapMs, Date.now());
        this.lastRequestTime = slot;
        const wait = slot - Date.now();
        if (wait > 0) {
            await sleep(wait);
        }
    }

    // When a 429 is hit, pause the entire queue, not just the failing request
    private pauseQueue(durationMs: number): void {
        this.lastRequestTime = Math.max(this.lastRequestTime, Date.now() + durationMs);
    }

    private async execute(
        endpoint: string,
        init: RequestInit,
        retries: number,
        attempt = 0,
        forcedRefresh = false
    ): Promise<Response> {
        const token = await this.credentials.getCredential({ forceRefresh: forcedRefresh });

        await this.waitForSlot();

        let response: Response;
        try {
            response = await fetch(`${BASE_URL}${endpoint}`, {
                ...init,
                headers: {
                    Authorization: `Bearer ${token}`,
                    ...(init.body ? { 'Content-Type': 'application/json' } : {}),
                },
            });
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            throw new SpotifyApiError(0, `Network error: ${message}`);
        }

        if (response.ok) return response;

        // ─── Handle 429 (Rate Limiting) ───
        if (response.status === 429 && retries > 0) {
            const retryAfterSec = parseInt(response.headers.get('Retry-After') || '1', 10) || 1;
            const backoff = Math.min(retryAfterSec * 1000 * Math.pow(2, attempt), MAX_BACKOFF_MS);
            const waitMs = backoff + Math.random() * this.maxJitterMs;

            console.warn(`[Spotify] 429 on ${endpoint}: waiting ${Math.round(waitMs)}ms (${retries} retries left)`);
            this.pauseQueue(waitMs);
            await sleep(waitMs);
            return this.execute(endpoint, init, retries - 1, attempt + 1);
        }

        // ─── Handle 401 (Token Expired) ───
        if (response.status === 401) {
            if (!forcedRefresh) {
                console.log('[Spotify] 401, refreshing token and retrying...');
                return this.execute(endpoint, init, retries, attempt, true);
            }
            throw new AuthRequiredError('Spotify rejected the refreshed token. Please log in again.');
        }

        // ─── Other errors ───
        const errorText = await response.text();
        const parsed = parseErrorBody(errorText);
        console.error(`[Spotify] API error ${response.status} on ${endpoint}:`, errorText);
        throw new SpotifyApiError(
            response.status,
            parsed?.error.message || `Spotify API error: ${response.status}`,
            parsed?.error.reason
        );
    }

    // ─── Public API Functions ───

    async searchArtists(query: string, limit = 10): Promise<SpotifyArtist[]> {
        const params = new URLSearchParams({ q: query, type: 'artist', limit: String(limit) });
        const data = await this.getJson(`/search?${params.toString()}`, artistSearchSchema);
        return data.artists.items;
    }

    async fetchArtistTopTracks(artistId: string, market: string): Promise<SpotifyTrack[]> {
        const params = new URLSearchParams({ market });
        const data = await this.getJson(`/artists/${encodeURIComponent(artistId)}/top-tracks?${params.toString()}`, topTracksSchema);
        return data.tracks;
    }

    async fetchDevices(retries = MAX_RETRIES): Promise<SpotifyDevice[]> {
        const data = await this.getJson('/me/player/devices', devicesSchema, retries);
        return data.devices;
    }

    async startPlayback(deviceId: string, trackUri: string, positionMs: number, retries = MAX_RETRIES): Promise<void> {
        const params = new URLSearchParams({ device_id: deviceId });
        await this.send(
            `/me/player/play?${params.toString()}`,
            { method: 'PUT', body: JSON.stringify({ uris: [trackUri], position_ms: positionMs }) },
            retries
        );
    }

    async resumePlayback(deviceId: string, retries = MAX_RETRIES): Promise<void> {
        const params = new URLSearchParams({ device_id: deviceId });
        await this.send(`/me/player/play?${params.toString()}`, { method: 'PUT' }, retries);
    }

    async pausePlayback(deviceId: string, retries = MAX_RETRIES): Promise<void> {
        const params = new URLSearchParams({ device_id: deviceId });
        await this.send(`/me/player/pause?${params.toString()}`, { method: 'PUT' }, retries);
    }
}
