import { describe, it, expect, vi, afterEach } from 'vitest';
import { AckRegistry } from './AckRegistry';

describe('AckRegistry', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('registers a callback under a fresh id', () => {
        const registry = new AckRegistry();
        const id = registry.register(vi.fn());

        expect(typeof id).toBe('string');
        expect(id.length).toBeGreaterThan(0);
        expect(registry.has(id)).toBe(true);
        expect(registry.size).toBe(1);
    });

    it('generates unique ids for rapid successive registrations', () => {
        const registry = new AckRegistry();
        const ids = new Set<string>();
        for (let i = 0; i < 1000; i++) {
            ids.add(registry.register(() => { }));
        }
        expect(ids.size).toBe(1000);
    });

    it('invokes the callback with the response and removes it', () => {
        const registry = new AckRegistry();
        const callback = vi.fn();
        const id = registry.register(callback);

        expect(registry.resolve(id, { ok: true })).toBe(true);
        expect(callback).toHaveBeenCalledWith({ ok: true });
        expect(registry.has(id)).toBe(false);
        expect(registry.size).toBe(0);
    });

    it('runs a callback at most once', () => {
        const registry = new AckRegistry();
        const callback = vi.fn();
        const id = registry.register(callback);

        registry.resolve(id, 'first');
        expect(registry.resolve(id, 'second')).toBe(false);

        expect(callback).toHaveBeenCalledTimes(1);
        expect(callback).toHaveBeenCalledWith('first');
    });

    it('removes the entry even when the callback throws', () => {
        const registry = new AckRegistry();
        const id = registry.register(() => {
            throw new Error('callback failed');
        });

        expect(() => registry.resolve(id, null)).toThrow('callback failed');
        expect(registry.has(id)).toBe(false);
    });

    it('ignores unknown ids', () => {
        const registry = new AckRegistry();
        const callback = vi.fn();
        registry.register(callback);

        expect(registry.resolve('never-issued', 'x')).toBe(false);
        expect(callback).not.toHaveBeenCalled();
        expect(registry.size).toBe(1);
    });

    it('uses a custom id generator', () => {
        const registry = new AckRegistry({ generateId: () => 'fixed' });
        expect(registry.register(() => { })).toBe('fixed');
    });

    it('falls back to a built-in id when a custom generator repeats', () => {
        const registry = new AckRegistry({ generateId: () => 'fixed' });
        const first = registry.register(() => { });
        const second = registry.register(() => { });

        expect(first).toBe('fixed');
        expect(second).not.toBe('fixed');
        expect(registry.size).toBe(2);
    });

    it('keeps entries forever without an ackTimeout', () => {
        vi.useFakeTimers();
        const registry = new AckRegistry();
        const id = registry.register(() => { });

        vi.advanceTimersByTime(24 * 60 * 60 * 1000);
        expect(registry.has(id)).toBe(true);
    });

    it('expires unanswered entries after ackTimeout', () => {
        vi.useFakeTimers();
        const onExpire = vi.fn();
        const callback = vi.fn();
        const registry = new AckRegistry({ ackTimeout: 500, onExpire });
        const id = registry.register(callback);

        vi.advanceTimersByTime(499);
        expect(registry.has(id)).toBe(true);

        vi.advanceTimersByTime(1);
        expect(registry.has(id)).toBe(false);
        expect(onExpire).toHaveBeenCalledWith(id);

        expect(registry.resolve(id, 'late')).toBe(false);
        expect(callback).not.toHaveBeenCalled();
    });

    it('does not expire an entry that was answered in time', () => {
        vi.useFakeTimers();
        const onExpire = vi.fn();
        const registry = new AckRegistry({ ackTimeout: 500, onExpire });
        const id = registry.register(() => { });

        registry.resolve(id, null);
        vi.advanceTimersByTime(1000);
        expect(onExpire).not.toHaveBeenCalled();
    });

    it('clear() drops entries and cancels their timers', () => {
        vi.useFakeTimers();
        const onExpire = vi.fn();
        const registry = new AckRegistry({ ackTimeout: 500, onExpire });
        registry.register(() => { });
        registry.register(() => { });

        registry.clear();
        vi.advanceTimersByTime(1000);

        expect(registry.size).toBe(0);
        expect(onExpire).not.toHaveBeenCalled();
    });
});
