import { EventEmitter } from 'events';
import { WebSocket } from 'ws';
import { describe, expect, it } from 'vitest';
import { silentLogger } from '../../testing/fakes';
import { StreamManager } from './StreamManager';

class FakeSocket extends EventEmitter {
    public readyState = 1;
    public readonly sent: string[] = [];
    public closedWith: number | null = null;

    public send(data: string): void {
        this.sent.push(data);
    }

    public close(code: number): void {
        this.closedWith = code;
        this.readyState = 3;
    }

    public terminate(): void {
        this.readyState = 3;
    }
}

describe('StreamManager', () => {
    it('sends envelopes as JSON to open connections', () => {
        const manager = new StreamManager({ logger: silentLogger });
        const socket = new FakeSocket();
        manager.addConnection('c1', socket as unknown as WebSocket);

        const sent = manager.sendChunk('c1', { type: 'session_cleared', content: { session_id: 's1' }, isFinal: true });

        expect(sent).toBe(true);
        expect(socket.sent).toEqual(['{"type":"session_cleared","content":{"session_id":"s1"},"isFinal":true}']);
        expect(manager.getActiveConnectionCount()).toBe(1);
    });

    it('refuses to send to unknown or closed connections', () => {
        const manager = new StreamManager({ logger: silentLogger });
        const socket = new FakeSocket();
        manager.addConnection('c1', socket as unknown as WebSocket);
        socket.readyState = 3;

        expect(manager.sendChunk('c1', { type: 'session_cleared', content: { session_id: 's1' } })).toBe(false);
        expect(manager.sendChunk('missing', { type: 'session_cleared', content: { session_id: 's1' } })).toBe(false);
        expect(socket.sent).toEqual([]);
    });

    it('closes and forgets a removed connection', () => {
        const manager = new StreamManager({ logger: silentLogger });
        const socket = new FakeSocket();
        manager.addConnection('c1', socket as unknown as WebSocket);

        expect(manager.removeConnection('c1')).toBe(true);
        expect(socket.closedWith).toBe(1001);
        expect(manager.hasConnection('c1')).toBe(false);
        expect(manager.removeConnection('c1')).toBe(false);
    });

    it('drops a connection once the socket closes', () => {
        const manager = new StreamManager({ logger: silentLogger });
        const socket = new FakeSocket();
        manager.addConnection('c1', socket as unknown as WebSocket);

        socket.emit('close', 1000, Buffer.from(''));

        expect(manager.getActiveConnectionCount()).toBe(0);
        expect(manager.hasConnection('c1')).toBe(false);
    });
});
