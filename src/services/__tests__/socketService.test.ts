import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mocks = vi.hoisted(() => {
    class FakeSocket {
        connected = false;
        constructor(readonly url: string) {}
        connect = vi.fn(() => {
            this.connected = true;
        });
        disconnect = vi.fn(() => {
            this.connected = false;
        });
        emit = vi.fn();
    }
    const created: FakeSocket[] = [];
    return {
        created,
        io: vi.fn((url: string) => {
            const socket = new FakeSocket(url);
            created.push(socket);
            return socket;
        }),
    };
});

vi.mock('socket.io-client', () => ({ io: mocks.io }));

import { connectSocket, disconnectSocket, emit } from '../socketService';

describe('socketService', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        disconnectSocket();
        mocks.created.length = 0;
        vi.clearAllMocks();
        vi.restoreAllMocks();
    });

    it('connects once and reuses the socket', () => {
        const first = connectSocket('http://10.0.0.5:3011');
        const second = connectSocket('http://10.0.0.5:3011');

        expect(second).toBe(first);
        expect(mocks.io).toHaveBeenCalledTimes(1);
        expect(mocks.io).toHaveBeenCalledWith('http://10.0.0.5:3011', { autoConnect: false, transports: ['websocket', 'polling'] });
        expect(mocks.created[0].connect).toHaveBeenCalledTimes(1);
    });

    it('drops the old connection when pointed at another server', () => {
        const first = connectSocket('http://10.0.0.5:3011');
        const second = connectSocket('http://10.0.0.6:3011');

        expect(second).not.toBe(first);
        expect(mocks.created[0].disconnect).toHaveBeenCalledTimes(1);
        expect(mocks.created.map((s) => s.url)).toEqual(['http://10.0.0.5:3011', 'http://10.0.0.6:3011']);
    });

    it('sends on the connected socket without opening another', () => {
        connectSocket('http://10.0.0.5:3011');

        emit('start_game', { mode: 'test' });

        expect(mocks.io).toHaveBeenCalledTimes(1);
        expect(mocks.created[0].emit).toHaveBeenCalledWith('start_game', { mode: 'test' });
    });

    it('drops commands while offline', () => {
        emit('pause_game');

        expect(mocks.io).not.toHaveBeenCalled();
        expect(console.warn).toHaveBeenCalledWith('[Socket] Not connected, cannot emit', 'pause_game');
    });
});
