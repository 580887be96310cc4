// ─── Spotify OAuth 2.0 Authorization Code Flow ───
// Runs server-side: the client secret never leaves this process.

import { z } from 'zod';
import type { SpotifyTokens } from '../../auth/TokenStore';

const SPOTIFY_AUTH_URL = 'https://accounts.spotify.com/authorize';
const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token';

export const SCOPES = [
    'streaming',                   // Web Playback SDK
    'user-read-email',
    'user-read-private',
    'user-modify-playback-state',  // Play / pause on a device
    'user-read-playback-state',    // Device list
].join(' ');

export interface SpotifyAppCredentials {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
}

const tokenResponseSchema = z.object({
    access_token: z.string(),
    refresh_token: z.string().optional(),
    expires_in: z.number(),
});

const tokenErrorSchema = z.object({
    error: z.string(),
    error_description: z.string().optional(),
});

export function buildAuthorizeUrl(app: SpotifyAppCredentials, state: string): string {
    const params = new URLSearchParams({
        response_type: 'code',
        client_id: app.clientId,
        scope: SCOPES,
        redirect_uri: app.redirectUri,
        state,
        show_dialog: 'false',
    });
    return `${SPOTIFY_AUTH_URL}?${params.toString()}`;
}

export async function exchangeCodeForTokens(app: SpotifyAppCredentials, code: string): Promise<SpotifyTokens> {
    const data = await requestToken(app, {
        grant_type: 'authorization_code',
        code,
        redirect_uri: app.redirectUri,
    });
    if (!data.refresh_token) throw new Error('Token exchange returned no refresh token');

    return {
        accessToken: data.access_token,
        refreshToken: data.refresh_token,
        expiresAt: Date.now() + data.expires_in * 1000,
    };
}

export async function refreshAccessToken(app: SpotifyAppCredentials, refreshToken: string): Promise<SpotifyTokens> {
    const data = await requestToken(app, {
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
    });

    return {
        accessToken: data.access_token,
        // Spotify may omit the refresh token; the old one stays valid then
        refreshToken: data.refresh_token || refreshToken,
        expiresAt: Date.now() + data.expires_in * 1000,
    };
}

async function requestToken(app: SpotifyAppCredentials, body: Record<string, string>) {
    const response = await fetch(SPOTIFY_TOKEN_URL, {
        method: 'POST',
        headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Authorization: `Basic ${btoa(app.clientId + ':' + app.clientSecret)}`,
        },
        body: new URLSearchParams(body),
    });

    const json: unknown = await response.json().catch(() => null);

    if (!response.ok) {
        const err = tokenErrorSchema.safeParse(json);
        const reason = err.success ? err.data.error_description || err.data.error : `status ${response.status}`;
        throw new Error(`Token request failed: ${reason}`);
    }

    return tokenResponseSchema.parse(json);
}
