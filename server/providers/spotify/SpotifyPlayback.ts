// ─── Spotify Playback Collaborator ───
// Resolves the game's playback device and issues play/pause commands on it.

import type { PlaybackDirective } from '../../../shared/events';
import { AuthRequiredError, PlaybackError, describeError } from '../../../shared/errors';
import type { DeviceDirectory, SpotifyDeviceInfo } from '../types';
import { SpotifyApiError, type SpotifyClient } from './spotifyApi';

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export interface SpotifyPlaybackOptions {
    /** Name the browser playback SDK registers the device under. */
    deviceName: string;
    /** Device registration polling: attempts, starting delay and delay cap. */
    maxAttempts?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    /** Floor for the next poll after a 429. */
    rateLimitedDelayMs?: number;
    /** 429 retries for each request a round makes; kept low so a round is not spent waiting. */
    playRetries?: number;
}

/** The slice of the Web API client that playback control uses. */
export type PlayerApi = Pick<SpotifyClient, 'fetchDevices' | 'startPlayback' | 'resumePlayback' | 'pausePlayback'>;

export function toPlaybackError(e: unknown): PlaybackError {
    if (e instanceof PlaybackError) return e;
    if (e instanceof SpotifyApiError) {
        switch (e.status) {
            case 404:
                return new PlaybackError('DeviceNotFound', 'Device not found. Make sure the Spotify player is active.');
            case 403:
                return new PlaybackError('PremiumRequired', e.reason === 'PREMIUM_REQUIRED'
                    ? 'Spotify Premium is required for playback control.'
                    : e.message);
            case 429:
                return new PlaybackError('RateLimited', 'Spotify rate limit reached.');
        }
    }
    return new PlaybackError('Unknown', describeError(e));
}

export class SpotifyPlayback implements DeviceDirectory {
    private knownDeviceId: string | null = null;
    private readonly deviceName: string;
    private readonly maxAttempts: number;
    private readonly initialDelayMs: number;
    private readonly maxDelayMs: number;
    private readonly rateLimitedDelayMs: number;
    private readonly playRetries: number;

    constructor(private client: PlayerApi, options: SpotifyPlaybackOptions) {
        this.deviceName = options.deviceName;
        this.maxAttempts = options.maxAttempts ?? 20;
        this.initialDelayMs = options.initialDelayMs ?? 1500;
        this.maxDelayMs = options.maxDelayMs ?? 6000;
        this.rateLimitedDelayMs = options.rateLimitedDelayMs ?? 3000;
        this.playRetries = options.playRetries ?? 1;
    }

    getKnownDeviceId(): string | null {
        return this.knownDeviceId;
    }

    async listDevices(retries?: number): Promise<SpotifyDeviceInfo[]> {
        const devices = await this.client.fetchDevices(retries);
        // Restricted or private-session devices come back without an id
        return devices.flatMap((d) =>
            d.id === null ? [] : [{ id: d.id, name: d.name, type: d.type, isActive: d.is_active }]
        );
    }

    /**
     * Wait for the SDK's local device to show up in Spotify's device list.
     * The SDK reports ready well before the Web API knows the device, and the ids can
     * differ between the two, so match by name as well. Gives up after `maxAttempts`
     * and falls back to the SDK id.
     */
    async verifyDevice(sdkDeviceId: string): Promise<string> {
        let delayMs = this.initialDelayMs;

        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            let nextDelay: number;
            try {
                const devices = await this.listDevices();
                const match = devices.find((d) => d.id === sdkDeviceId || d.name === this.deviceName);
                if (match) {
                    console.log(`[Playback] Device verified after ${attempt} attempt(s): ${match.id}`);
                    this.knownDeviceId = match.id;
                    return match.id;
                }
                console.log(`[Playback] Device not registered yet (attempt ${attempt}/${this.maxAttempts})`);
                nextDelay = Math.min(this.maxDelayMs, delayMs);
                delayMs = Math.min(this.maxDelayMs, Math.floor(delayMs * 1.4));
            } catch (e) {
                if (e instanceof AuthRequiredError) throw e;
                console.error(`[Playback] Device check failed (attempt ${attempt}/${this.maxAttempts}):`, describeError(e));
                nextDelay = e instanceof SpotifyApiError && e.status === 429
                    ? Math.max(delayMs * 2, this.rateLimitedDelayMs)
                    : Math.min(this.maxDelayMs, delayMs);
                delayMs = Math.min(this.maxDelayMs, Math.floor(nextDelay * 1.1));
            }
            if (attempt < this.maxAttempts) await sleep(nextDelay);
        }

        console.warn(`[Playback] Device registration timed out, using SDK id ${sdkDeviceId}`);
        this.knownDeviceId = sdkDeviceId;
        return sdkDeviceId;
    }

    /** Device ids change between sessions, so look the device up again for every command. */
    async resolveDeviceId(): Promise<string> {
        let devices: SpotifyDeviceInfo[];
        try {
            devices = await this.listDevices(this.playRetries);
        } catch (e) {
            throw toPlaybackError(e);
        }
        const match = devices.find((d) => d.id === this.knownDeviceId) ?? devices.find((d) => d.name === this.deviceName);
        if (!match) {
            throw new PlaybackError('DeviceNotFound', `Spotify device "${this.deviceName}" is not connected`);
        }
        this.knownDeviceId = match.id;
        return match.id;
    }

    /** Playback sink for the round scheduler. */
    async issuePlayback(directive: PlaybackDirective): Promise<void> {
        const deviceId = await this.resolveDeviceId();
        console.log(
            `[Playback] Round ${directive.round}: ${directive.track.name} by ${directive.track.artistName} ` +
            `from ${directive.startOffsetMs}ms on ${deviceId}`
        );
        await this.playAt(deviceId, directive.track.uri, directive.startOffsetMs);
    }

    async playAt(deviceId: string, trackUri: string, positionMs: number): Promise<void> {
        try {
            await this.client.startPlayback(deviceId, trackUri, positionMs, this.playRetries);
        } catch (e) {
            throw toPlaybackError(e);
        }
    }

    async pause(): Promise<void> {
        if (!this.knownDeviceId) return;
        try {
            await this.client.pausePlayback(this.knownDeviceId, this.playRetries);
        } catch (e) {
            throw toPlaybackError(e);
        }
    }

    async resume(): Promise<void> {
        if (!this.knownDeviceId) return;
        try {
            await this.client.resumePlayback(this.knownDeviceId, this.playRetries);
        } catch (e) {
            throw toPlaybackError(e);
        }
    }
}
