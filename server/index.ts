import 'dotenv/config';
import { createServer } from 'http';
import { Server } from 'socket.io';
import { createApp } from './app';
import { TokenStore } from './auth/TokenStore';
import { ConfigError, loadConfig, type ServerConfig } from './config';
import { GameSession } from './GameSession';
import { registerGameSocket } from './gameSocket';
import { SpotifyClient } from './providers/spotify/spotifyApi';
import { buildAuthorizeUrl, exchangeCodeForTokens, refreshAccessToken } from './providers/spotify/spotifyAuth';
import { SpotifyPlayback } from './providers/spotify/SpotifyPlayback';
import { SpotifyProvider } from './providers/spotify/SpotifyProvider';

function readConfig(): ServerConfig {
    try {
        return loadConfig();
    } catch (e) {
        if (e instanceof ConfigError) {
            console.error(`[Server] ${e.message}`);
            console.error('[Server] Set the missing variables in .env (see .env.example).');
            process.exit(1);
        }
        throw e;
    }
}

const config = readConfig();

const tokens = new TokenStore((refreshToken) => refreshAccessToken(config.spotify, refreshToken));
const client = new SpotifyClient(tokens);
const catalog = new SpotifyProvider(client, config.market);
const playback = new SpotifyPlayback(client, { deviceName: config.deviceName });
const session = new GameSession(catalog, playback);

const app = createApp({
    clientUrl: config.clientUrl,
    corsOrigins: config.corsOrigins,
    tokens,
    catalog,
    devices: playback,
    playback,
    authorizeUrl: (state) => buildAuthorizeUrl(config.spotify, state),
    exchangeCode: (code) => exchangeCodeForTokens(config.spotify, code),
});

const httpServer = createServer(app);
const io = new Server(httpServer, {
    cors: {
        origin: config.corsOrigins,
        methods: ['GET', 'POST'],
    },
});

registerGameSocket(io, session, playback);

httpServer.listen(config.port, () => {
    console.log(`\n  🍺 Club 100 server running on http://localhost:${config.port}\n`);
});
