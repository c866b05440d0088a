// src/services/aggregateCache.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { LoggingService } from './logging.service';
import { AggregateCacheEntries, AggregateKind } from '../types/dataset.types';

class CacheSlot<T> {
    private value?: T;

    get(): T | undefined {
        return this.value;
    }

    set(value: T): void {
        this.value = value;
    }

    clear(): void {
        this.value = undefined;
    }
}

type CacheSlots = { [K in AggregateKind]: CacheSlot<AggregateCacheEntries[K]> };

/**
 * Process-lifetime store for the normalized table and its derived views.
 *
 * Slots are filled lazily and only with complete results: a loader that throws
 * publishes nothing. Two concurrent first requests may both run their loader;
 * the later write wins. There is no TTL and no eviction, only explicit
 * `invalidate`/`reset`.
 */
@singleton()
export class AggregateCacheService {
    private readonly serviceLogger: Logger;
    private readonly slots: CacheSlots = {
        raw: new CacheSlot(),
        by_country: new CacheSlot(),
        by_date: new CacheSlot(),
    };

    constructor(@inject(LoggingService) private loggingService: LoggingService) {
        this.serviceLogger = this.loggingService.getLogger('pipeline', { service: 'AggregateCacheService' });
    }

    public has(kind: AggregateKind): boolean {
        return this.slots[kind].get() !== undefined;
    }

    public peek<K extends AggregateKind>(kind: K): AggregateCacheEntries[K] | undefined {
        const slot: CacheSlots[K] = this.slots[kind];
        return slot.get();
    }

    /**
     * Returns the cached value for `kind`, or runs `loader` and publishes its result.
     */
    public async getOrLoad<K extends AggregateKind>(
        kind: K,
        loader: () => Promise<AggregateCacheEntries[K]>
    ): Promise<AggregateCacheEntries[K]> {
        const slot: CacheSlots[K] = this.slots[kind];
        const cached = slot.get();
        if (cached !== undefined) {
            return cached;
        }
        this.serviceLogger.debug({ kind }, 'Cache miss. Loading.');
        const value = await loader();
        slot.set(value);
        return value;
    }

    /**
     * Publishes several fully built slots in one synchronous step.
     */
    public publish(values: Partial<AggregateCacheEntries>): void {
        if (values.raw !== undefined) this.slots.raw.set(values.raw);
        if (values.by_country !== undefined) this.slots.by_country.set(values.by_country);
        if (values.by_date !== undefined) this.slots.by_date.set(values.by_date);
        this.serviceLogger.debug({ kinds: Object.keys(values) }, 'Cache slots published.');
    }

    public invalidate(kind: AggregateKind): void {
        this.slots[kind].clear();
    }

    public reset(): void {
        for (const slot of Object.values(this.slots)) {
            slot.clear();
        }
        this.serviceLogger.info('Aggregate cache cleared.');
    }
}
