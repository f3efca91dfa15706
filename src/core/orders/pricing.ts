// src/core/orders/pricing.ts

import { DrinkSize, OrderRequest } from './types';

/**
 * Computes the amount of an order in minor currency units.
 *
 * Implementations run inside the order state machine and are re-run when an
 * instance is replayed, so they must be pure: no I/O, clock or randomness.
 */
export interface PricingPolicy {
    price(request: OrderRequest): number;
}

export interface PricingTable {
    readonly basePrices: Readonly<Record<DrinkSize, number>>;
    readonly surchargeKeywords: readonly string[];
    readonly surcharge: number;
}

export const STANDARD_PRICING: PricingTable = Object.freeze({
    basePrices: Object.freeze({ S: 300, M: 450, L: 600 }),
    surchargeKeywords: Object.freeze(['latte', 'mocha']),
    surcharge: 75,
});

/**
 * Base price by size, plus a surcharge for specialty drinks.
 *
 * - Small espresso: 300
 * - Medium latte: 450 + 75 = 525
 * - Large mocha: 600 + 75 = 675
 */
export class StandardPricingPolicy implements PricingPolicy {
    private readonly keywords: readonly string[];

    constructor(private readonly table: PricingTable = STANDARD_PRICING) {
        this.keywords = table.surchargeKeywords.map(keyword => keyword.toLowerCase());
    }

    public price(request: OrderRequest): number {
        const item = request.item.toLowerCase();
        const base = this.table.basePrices[request.size];
        return this.keywords.some(keyword => item.includes(keyword))
            ? base + this.table.surcharge
            : base;
    }
}
