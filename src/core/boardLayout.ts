import type { Premium } from './types';
import { STANDARD_VARIANT, type Variant } from './variant';

export function premiumKey(x: number, y: number): string {
  return `${x},${y}`;
}

/** Premium squares keyed by "x,y". A square listed twice keeps its first premium. */
export function buildPremiumMap(variant: Variant = STANDARD_VARIANT): Map<string, Premium> {
  const map = new Map<string, Premium>();
  for (const group of variant.premiums) {
    for (const [x, y] of group.squares) {
      const key = premiumKey(x, y);
      if (map.has(key)) continue;
      map.set(key, { kind: group.kind, multiplier: group.multiplier });
    }
  }
  return map;
}
