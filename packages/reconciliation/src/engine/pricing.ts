import type { PricingSettings } from '../types/index.js';

export const DEFAULT_PRICING: PricingSettings = {
  markupDivisor: 0.8,
  priceMultiplier: 2,
};

/**
 * Shelf price and cost for one unit.
 *
 * The operation order is fixed so results are bit-for-bit reproducible:
 * divide first, then multiply.
 */
export function computePricing(
  unitPrice: number,
  pricing: PricingSettings = DEFAULT_PRICING
): { pricePerUnit: number; costPerUnit: number } {
  return {
    pricePerUnit: (unitPrice / pricing.markupDivisor) * pricing.priceMultiplier,
    costPerUnit: unitPrice,
  };
}
