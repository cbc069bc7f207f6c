import { DateTime, Duration } from 'luxon';

interface CacheItem<T> {
    value: T;
    expiresAt: DateTime;
}

/**
 * In-memory map whose entries expire a fixed time after they were written.
 * Expiry is checked on read.
 */
export class TtlCache<T> {
    private items = new Map<string, CacheItem<T>>();

    constructor(private readonly ttl: Duration) {}

    get(key: string): T | undefined {
        const item = this.items.get(key);

        if (!item) {
            return undefined;
        }

        if (item.expiresAt.toMillis() <= DateTime.local().toMillis()) {
            this.items.delete(key);
            return undefined;
        }

        return item.value;
    }

    set(key: string, value: T): void {
        this.items.set(key, {
            value,
            expiresAt: DateTime.local().plus(this.ttl),
        });
    }
}
