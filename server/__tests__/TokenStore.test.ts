import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AuthRequiredError } from '../../shared/errors';
import { TokenStore, type SpotifyTokens } from '../auth/TokenStore';

const NOW = new Date('2026-03-01T12:00:00Z').getTime();

function tokens(overrides: Partial<SpotifyTokens> = {}): SpotifyTokens {
    return {
        accessToken: 'access-1',
        refreshToken: 'refresh-1',
        expiresAt: NOW + 3600_000,
        ...overrides,
    };
}

describe('TokenStore', () => {
    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(NOW);
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    it('requires a login before handing out a token', async () => {
        const store = new TokenStore(vi.fn());

        expect(store.hasTokens()).toBe(false);
        expect(store.isExpired()).toBe(true);
        await expect(store.getCredential()).rejects.toBeInstanceOf(AuthRequiredError);
    });

    it('returns the current token while it is fresh', async () => {
        const refresher = vi.fn();
        const store = new TokenStore(refresher);
        store.setTokens(tokens());

        await expect(store.getCredential()).resolves.toBe('access-1');
        expect(refresher).not.toHaveBeenCalled();
    });

    it('refreshes within a minute of expiry', async () => {
        const refresher = vi.fn(async () => tokens({ accessToken: 'access-2', expiresAt: NOW + 7200_000 }));
        const store = new TokenStore(refresher);
        store.setTokens(tokens({ expiresAt: NOW + 30_000 }));

        expect(store.isExpired()).toBe(true);
        await expect(store.getCredential()).resolves.toBe('access-2');
        expect(refresher).toHaveBeenCalledWith('refresh-1');
        expect(store.isExpired()).toBe(false);
    });

    it('refreshes a fresh token when forced', async () => {
        const refresher = vi.fn(async () => tokens({ accessToken: 'access-2' }));
        const store = new TokenStore(refresher);
        store.setTokens(tokens());

        await expect(store.getCredential({ forceRefresh: true })).resolves.toBe('access-2');
        expect(refresher).toHaveBeenCalledTimes(1);
    });

    it('shares one refresh between concurrent callers', async () => {
        let finish: (t: SpotifyTokens) => void = () => {};
        const refresher = vi.fn(() => new Promise<SpotifyTokens>((resolve) => { finish = resolve; }));
        const store = new TokenStore(refresher);
        store.setTokens(tokens({ expiresAt: NOW - 1 }));

        const first = store.getCredential();
        const second = store.getCredential();
        finish(tokens({ accessToken: 'access-3' }));

        await expect(Promise.all([first, second])).resolves.toEqual(['access-3', 'access-3']);
        expect(refresher).toHaveBeenCalledTimes(1);
    });

    it('logs the user out when the refresh fails', async () => {
        const refresher = vi.fn(async (): Promise<SpotifyTokens> => {
            throw new Error('invalid_grant');
        });
        const store = new TokenStore(refresher);
        store.setTokens(tokens({ expiresAt: NOW - 1 }));

        await expect(store.getCredential()).rejects.toThrow('Session expired. Please log in again.');
        expect(store.hasTokens()).toBe(false);
    });

    it('forgets the tokens on clear', () => {
        const store = new TokenStore(vi.fn());
        store.setTokens(tokens());
        store.clear();

        expect(store.hasTokens()).toBe(false);
    });
});
