import { describe, it, expect, vi, afterEach } from 'vitest';
import type { ClientEvents, ConnectionStatus } from '../types';
import { EventEmitter } from './EventEmitter';

describe('EventEmitter', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('delivers each event to its own handlers', () => {
        const emitter = new EventEmitter<ClientEvents>();
        const statuses: ConnectionStatus[] = [];
        const expired: string[] = [];

        emitter.on('status', (status) => statuses.push(status));
        emitter.on('ackTimeout', (ackId) => expired.push(ackId));
        emitter.emit('status', 'connected');
        emitter.emit('ackTimeout', 'abc123');

        expect(statuses).toEqual(['connected']);
        expect(expired).toEqual(['abc123']);
    });

    it('calls every handler in subscription order', () => {
        const emitter = new EventEmitter<ClientEvents>();
        const calls: string[] = [];

        emitter.on('status', (status) => calls.push(`first:${status}`));
        emitter.on('status', (status) => calls.push(`second:${status}`));
        emitter.emit('status', 'disconnected');

        expect(calls).toEqual(['first:disconnected', 'second:disconnected']);
    });

    it('unsubscribes through the returned function', () => {
        const emitter = new EventEmitter<ClientEvents>();
        const handler = vi.fn();

        const unsubscribe = emitter.on('status', handler);
        unsubscribe();
        emitter.emit('status', 'connected');

        expect(handler).not.toHaveBeenCalled();
    });

    it('unsubscribes through off()', () => {
        const emitter = new EventEmitter<ClientEvents>();
        const handler = vi.fn();

        emitter.on('ackTimeout', handler);
        emitter.off('ackTimeout', handler);
        emitter.emit('ackTimeout', 'abc123');

        expect(handler).not.toHaveBeenCalled();
    });

    it('lets a handler unsubscribe itself while the event is being delivered', () => {
        const emitter = new EventEmitter<ClientEvents>();
        const later = vi.fn();
        const unsubscribe = emitter.on('status', () => unsubscribe());
        emitter.on('status', later);

        emitter.emit('status', 'connected');
        emitter.emit('status', 'disconnected');

        expect(later).toHaveBeenCalledTimes(2);
    });

    it('logs a throwing handler and keeps delivering', () => {
        const emitter = new EventEmitter<ClientEvents>();
        const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => { });
        const failure = new Error('Boom');
        const next = vi.fn();

        emitter.on('status', () => {
            throw failure;
        });
        emitter.on('status', next);

        expect(() => emitter.emit('status', 'connected')).not.toThrow();
        expect(next).toHaveBeenCalledWith('connected');
        expect(consoleSpy).toHaveBeenCalledWith('[EventEmitter] Error in listener for status:', failure);
    });

    it('ignores events nobody listens to', () => {
        const emitter = new EventEmitter<ClientEvents>();
        expect(() => emitter.emit('ackTimeout', 'abc123')).not.toThrow();
    });
});
