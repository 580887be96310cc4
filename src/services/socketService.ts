// ─── Socket.IO Client Service ───
// Singleton wrapper managing the display's connection to the game server.

import { io, type Socket } from 'socket.io-client';

export const DEFAULT_SERVER_URL = 'http://127.0.0.1:3011';

let socket: Socket | null = null;
let socketUrl: string | null = null;

/** The shared socket for `serverUrl`. Asking for another server drops the old connection. */
export function getSocket(serverUrl = DEFAULT_SERVER_URL): Socket {
    if (socket && socketUrl !== serverUrl) {
        console.log(`[Socket] Switching server from ${socketUrl} to ${serverUrl}`);
        disconnectSocket();
    }
    if (!socket) {
        socket = io(serverUrl, {
            autoConnect: false,
            transports: ['websocket', 'polling'],
        });
        socketUrl = serverUrl;
    }
    return socket;
}

export function connectSocket(serverUrl = DEFAULT_SERVER_URL): Socket {
    const s = getSocket(serverUrl);
    if (!s.connected) {
        s.connect();
    }
    return s;
}

export function disconnectSocket(): void {
    if (socket) {
        socket.disconnect();
        socket = null;
        socketUrl = null;
    }
}

/** Send a command to the game server. Dropped with a warning while offline. */
export function emit(event: string, payload?: unknown): void {
    if (socket?.connected) {
        socket.emit(event, payload);
    } else {
        console.warn('[Socket] Not connected, cannot emit', event);
    }
}
