import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MemoryStore, isExpired } from '../MemoryStore.js';

interface Entry {
    value: string;
    expiresAt?: Date;
}

describe('MemoryStore', () => {
    let store: MemoryStore<Entry>;

    beforeEach(() => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
        store = new MemoryStore<Entry>('test');
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('should store frozen copies', () => {
        const input = { value: 'a' };
        const stored = store.set('k', input);

        input.value = 'changed';
        expect(store.get('k')?.value).toBe('a');
        expect(Object.isFrozen(stored)).toBe(true);
    });

    it('should treat a record as expired from its expiry instant', () => {
        const record = { value: 'a', expiresAt: new Date('2026-01-01T00:01:00Z') };
        expect(isExpired(record, new Date('2026-01-01T00:00:59.999Z').getTime())).toBe(false);
        expect(isExpired(record, new Date('2026-01-01T00:01:00Z').getTime())).toBe(true);
        expect(isExpired({ value: 'b' })).toBe(false);
    });

    it('should evict expired records on read but let peek see them', () => {
        store.set('k', { value: 'a', expiresAt: new Date('2026-01-01T00:01:00Z') });
        vi.setSystemTime(new Date('2026-01-01T00:01:00Z'));

        expect(store.peek('k')?.value).toBe('a');
        expect(store.has('k')).toBe(false);
        expect(store.size).toBe(0);
    });

    it('should hand a record to one taker only', () => {
        store.set('k', { value: 'a' });

        expect(store.take('k')?.value).toBe('a');
        expect(store.take('k')).toBeUndefined();
    });

    it('should report whether delete removed something', () => {
        store.set('k', { value: 'a' });

        expect(store.delete('k')).toBe(true);
        expect(store.delete('k')).toBe(false);
    });

    it('should purge expired records only', () => {
        store.set('old', { value: 'a', expiresAt: new Date('2026-01-01T00:00:30Z') });
        store.set('new', { value: 'b', expiresAt: new Date('2026-01-01T01:00:00Z') });
        store.set('forever', { value: 'c' });
        vi.setSystemTime(new Date('2026-01-01T00:05:00Z'));

        expect(store.purgeExpired()).toBe(1);
        expect(store.size).toBe(2);
        expect(store.get('new')?.value).toBe('b');
    });
});
