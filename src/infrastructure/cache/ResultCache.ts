import { LRUCache } from 'lru-cache';
import { OrderResult } from '../../core/orders/types';

interface CacheOptions {
    max?: number;
    ttl?: number;
}

/**
 * ResultCache
 * Terminal order results, keyed by order id. Results are immutable, so a hit
 * returns the same frozen object every time.
 */
export class ResultCache {
    private cache: LRUCache<string, OrderResult>;

    constructor(options?: CacheOptions) {
        this.cache = new LRUCache<string, OrderResult>({
            max: options?.max ?? 500,
            ttl: options?.ttl ?? 1000 * 60 * 60, // 1 Hour TTL
        });
    }

    public set(orderId: string, result: OrderResult): void {
        this.cache.set(orderId, result);
    }

    public get(orderId: string): OrderResult | undefined {
        return this.cache.get(orderId);
    }
}
