/**
 * SocketClient over WebSocketTransport against an in-process fake server.
 */

import { describe, it, expect, vi } from 'vitest';
import { SocketClient, withClient } from '../src/client';
import { ConnectionError, MalformedPacketError } from '../src/errors';
import { WebSocketTransport } from '../src/transport/WebSocketTransport';
import type { JsonValue } from '../src/types';
import { FakeServer, quietLogger } from './test-utils';

function createClient(server: FakeServer, namespace?: string) {
    const transport = new WebSocketTransport('http://localhost:3000', {
        logger: quietLogger(),
        createSocket: server.createSocket,
    });
    const client = new SocketClient(transport, { logger: quietLogger(), namespace });
    return { client, transport };
}

describe('SocketClient over WebSocketTransport', () => {
    it('completes the handshake and joins the namespace', async () => {
        const server = new FakeServer();
        const { client, transport } = createClient(server, '/chat');

        await client.initialize();

        expect(client.isConnected).toBe(true);
        expect(transport.getNamespace()).toBe('/chat');
        expect(server.received).toEqual(['40/chat,']);
    });

    it('fails to initialize when the server refuses the namespace', async () => {
        const server = new FakeServer().refuse('not authorized');
        const { client, transport } = createClient(server, '/chat');

        const error = await client.initialize().catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ConnectionError);
        expect(error instanceof ConnectionError && error.message).toBe(
            'Namespace /chat refused the connection: not authorized'
        );
        expect(client.isConnected).toBe(false);
        expect(transport.getStatus()).toBe('disconnected');
        expect(server.closedByClient).toBe(1);
    });

    it('emits on the namespace once the server has accepted it', async () => {
        const server = new FakeServer();
        const { client } = createClient(server, '/chat');

        await client.initialize();
        client.emit('hello', []);

        expect(server.received).toEqual(['40/chat,', '42/chat,["hello"]']);
    });

    it('delivers server events to listeners', async () => {
        const server = new FakeServer();
        const { client } = createClient(server);
        const listener = vi.fn();
        client.on('chat message', listener);
        await client.initialize();

        server.push('chat message', 'hi', { from: 'bob' });
        await client.read();

        expect(listener).toHaveBeenCalledWith('hi', { from: 'bob' });
    });

    it('correlates an acknowledged emit with the server reply', async () => {
        const server = new FakeServer().answer('add', (_event, args) => {
            const [a, b] = args;
            return typeof a === 'number' && typeof b === 'number' ? { sum: a + b } : null;
        });
        const { client } = createClient(server);
        await client.initialize();

        const replies: Array<JsonValue | null> = [];
        client.emit('add', [2, 3], (response) => replies.push(response));
        const message = await client.read();

        expect(message?.type).toBe('ack');
        expect(replies).toEqual([{ sum: 5 }]);
        expect(client.pendingAcks).toBe(0);
        expect(server.received[1]).toMatch(/^42\["add",2,3,"ACK:[0-9a-z]+"\]$/);
    });

    it('passes null to the callback when the reply carries no response', async () => {
        const server = new FakeServer().answer('touch', () => undefined);
        const { client } = createClient(server);
        await client.initialize();

        const callback = vi.fn();
        client.emit('touch', [], callback);
        await client.read();

        expect(callback).toHaveBeenCalledWith(null);
    });

    it('listen() dispatches until the server hangs up', async () => {
        const server = new FakeServer();
        const { client } = createClient(server);
        const ticks: JsonValue[] = [];
        client.on('tick', (n) => ticks.push(n));
        await client.initialize();

        const listening = client.listen();
        server.push('tick', 1);
        server.push('tick', 2);
        server.hangUp();

        const error = await listening;
        expect(error).toBeInstanceOf(ConnectionError);
        expect(error.message).toBe('Connection closed (1001: going away)');
        expect(ticks).toEqual([1, 2]);
    });

    it('listen() stops on the first malformed frame', async () => {
        const server = new FakeServer();
        const { client } = createClient(server);
        await client.initialize();

        const listening = client.listen();
        server.send('42{"not":"an array"}');

        await expect(listening).resolves.toBeInstanceOf(MalformedPacketError);
        expect(client.isConnected).toBe(true);
    });

    it('withClient() leaves the namespace and closes the socket', async () => {
        const server = new FakeServer();
        const transport = new WebSocketTransport('http://localhost:3000', {
            logger: quietLogger(),
            createSocket: server.createSocket,
        });

        await withClient(transport, { logger: quietLogger() }, async (client) => {
            client.emit('hello', ['world']);
        });

        expect(server.received).toEqual(['40', '42["hello","world"]', '41']);
        expect(server.closedByClient).toBe(1);
        expect(transport.getStatus()).toBe('disconnected');
    });
});
