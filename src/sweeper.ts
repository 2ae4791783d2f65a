import debug from 'debug';

const log = debug('oauth:sweeper');

export interface Purgeable {
    purgeExpired(): number;
}

/**
 * Periodically drops expired records. Reads already ignore expired records; this only bounds
 * memory. The timer does not keep the process alive.
 *
 * @returns a function that stops the sweeper
 */
export function startStoreSweeper(stores: Purgeable[], intervalMs: number): () => void {
    const timer = setInterval(() => {
        const removed = stores.reduce((total, store) => total + store.purgeExpired(), 0);
        if (removed) {
            log('removed %d expired records', removed);
        }
    }, intervalMs);
    timer.unref();

    return () => clearInterval(timer);
}
