import { AuthRequiredError, describeError } from '../../shared/errors';

export interface SpotifyTokens {
    accessToken: string;
    refreshToken: string;
    expiresAt: number; // Unix timestamp in ms
}

export interface CredentialOptions {
    /** Refresh even if the current token has not expired yet (e.g. after a 401). */
    forceRefresh?: boolean;
}

/** Source of a valid bearer token for the Spotify Web API. */
export interface CredentialProvider {
    getCredential(options?: CredentialOptions): Promise<string>;
}

export type TokenRefresher = (refreshToken: string) => Promise<SpotifyTokens>;

/** Refresh when the token is within this window of expiring. */
const DEFAULT_REFRESH_BUFFER_MS = 60 * 1000;

/**
 * In-memory token holder for the one logged-in user.
 * Refreshes before expiry and shares a single in-flight refresh between concurrent callers.
 */
export class TokenStore implements CredentialProvider {
    private tokens: SpotifyTokens | null = null;
    private pendingRefresh: Promise<string> | null = null;

    constructor(
        private refresher: TokenRefresher,
        private refreshBufferMs = DEFAULT_REFRESH_BUFFER_MS
    ) { }

    setTokens(tokens: SpotifyTokens): void {
        this.tokens = { ...tokens };
    }

    hasTokens(): boolean {
        return this.tokens !== null;
    }

    isExpired(): boolean {
        if (!this.tokens) return true;
        return Date.now() >= this.tokens.expiresAt - this.refreshBufferMs;
    }

    clear(): void {
        this.tokens = null;
        this.pendingRefresh = null;
    }

    async getCredential(options: CredentialOptions = {}): Promise<string> {
        if (!this.tokens) {
            throw new AuthRequiredError('No access token available. Log in with Spotify first.');
        }
        if (!options.forceRefresh && !this.isExpired()) {
            return this.tokens.accessToken;
        }
        if (!this.pendingRefresh) {
            this.pendingRefresh = this.refresh(this.tokens.refreshToken).finally(() => {
                this.pendingRefresh = null;
            });
        }
        return this.pendingRefresh;
    }

    private async refresh(refreshToken: string): Promise<string> {
        if (!refreshToken) {
            this.clear();
            throw new AuthRequiredError('No refresh token available. Log in with Spotify again.');
        }
        try {
            const tokens = await this.refresher(refreshToken);
            this.setTokens(tokens);
            console.log('[Auth] Access token refreshed');
            return tokens.accessToken;
        } catch (e) {
            console.error('[Auth] Token refresh failed:', describeError(e));
            this.clear();
            throw new AuthRequiredError('Session expired. Please log in again.');
        }
    }
}
