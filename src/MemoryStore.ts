import debug from 'debug';

const log = debug('oauth:MemoryStore');

export interface Expiring {
    expiresAt?: Date;
}

/**
 * Process-lifetime key/value store with expiry-aware reads.
 *
 * Every method is synchronous. Node runs one handler at a time on the event loop, so no other
 * request can observe or change a key between the read and the delete in {@link take}; that is
 * the compare-and-delete primitive single-use authorization codes rely on.
 *
 * Stored records are frozen: a record is either absent or complete.
 */
export class MemoryStore<T extends Expiring> {
    private records = new Map<string, Readonly<T>>();

    constructor(private readonly name: string) {}

    set(key: string, value: T): Readonly<T> {
        const record = Object.freeze({ ...value });
        this.records.set(key, record);
        return record;
    }

    /** Returns the record, or undefined when it is absent or expired. Expired records are evicted. */
    get(key: string): Readonly<T> | undefined {
        const record = this.records.get(key);
        if (!record) {
            return undefined;
        }
        if (isExpired(record)) {
            this.records.delete(key);
            log('%s: evicted expired record', this.name);
            return undefined;
        }
        return record;
    }

    /**
     * Returns the raw record even if expired, without evicting it.
     * Callers that need to distinguish "expired" from "unknown" use this.
     */
    peek(key: string): Readonly<T> | undefined {
        return this.records.get(key);
    }

    has(key: string): boolean {
        return this.get(key) !== undefined;
    }

    /** Removes and returns the record. Only one caller can ever take a given record. */
    take(key: string): Readonly<T> | undefined {
        const record = this.records.get(key);
        if (!record) {
            return undefined;
        }
        this.records.delete(key);
        return record;
    }

    delete(key: string): boolean {
        return this.records.delete(key);
    }

    purgeExpired(): number {
        let removed = 0;
        for (const [key, record] of this.records) {
            if (isExpired(record)) {
                this.records.delete(key);
                removed++;
            }
        }
        if (removed) {
            log('%s: purged %d expired records', this.name, removed);
        }
        return removed;
    }

    get size(): number {
        return this.records.size;
    }
}

export function isExpired(record: Expiring, now: number = Date.now()): boolean {
    return record.expiresAt !== undefined && now >= record.expiresAt.getTime();
}
