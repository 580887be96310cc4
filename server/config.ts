import { z } from 'zod';

const envSchema = z.object({
    SPOTIFY_CLIENT_ID: z.string().min(1, 'SPOTIFY_CLIENT_ID is required'),
    SPOTIFY_CLIENT_SECRET: z.string().min(1, 'SPOTIFY_CLIENT_SECRET is required'),
    REDIRECT_URI: z.string().url().default('http://127.0.0.1:3011/callback'),
    CLIENT_URL: z.string().url().default('http://127.0.0.1:3000'),
    MARKET: z.string().length(2, 'MARKET must be a two-letter country code').default('US'),
    PORT: z.coerce.number().int().positive().default(3011),
    DEVICE_NAME: z.string().min(1).default('Club 100 Game Player'),
    CORS_ORIGINS: z.string().default('http://127.0.0.1:3000,http://localhost:3000,http://127.0.0.1:5173,http://localhost:5173'),
});

export interface ServerConfig {
    spotify: {
        clientId: string;
        clientSecret: string;
        redirectUri: string;
    };
    /** Where the browser lands after logging in */
    clientUrl: string;
    market: string;
    port: number;
    /** Name the browser playback SDK registers its device under */
    deviceName: string;
    corsOrigins: string[];
}

export class ConfigError extends Error {
    constructor(public issues: string[]) {
        super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
        this.name = 'ConfigError';
    }
}

/**
 * Parse server configuration from environment variables.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        throw new ConfigError(result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
    }
    const parsed = result.data;

    return {
        spotify: {
            clientId: parsed.SPOTIFY_CLIENT_ID,
            clientSecret: parsed.SPOTIFY_CLIENT_SECRET,
            redirectUri: parsed.REDIRECT_URI,
        },
        clientUrl: parsed.CLIENT_URL,
        market: parsed.MARKET.toUpperCase(),
        port: parsed.PORT,
        deviceName: parsed.DEVICE_NAME,
        corsOrigins: parsed.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean),
    };
}
