import { describe, it, expect, afterEach, vi } from 'vitest';
import { startStoreSweeper, type Purgeable } from '../sweeper.js';

describe('startStoreSweeper', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('should purge every store on each interval until stopped', () => {
        vi.useFakeTimers();
        const codes: Purgeable = { purgeExpired: vi.fn(() => 2) };
        const tokens: Purgeable = { purgeExpired: vi.fn(() => 0) };

        const stop = startStoreSweeper([codes, tokens], 60_000);
        vi.advanceTimersByTime(59_999);
        expect(codes.purgeExpired).not.toHaveBeenCalled();

        vi.advanceTimersByTime(1);
        expect(codes.purgeExpired).toHaveBeenCalledTimes(1);
        expect(tokens.purgeExpired).toHaveBeenCalledTimes(1);

        stop();
        vi.advanceTimersByTime(120_000);
        expect(codes.purgeExpired).toHaveBeenCalledTimes(1);
    });
});
