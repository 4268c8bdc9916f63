import type { Tile } from './types';
import { STANDARD_VARIANT, type Variant } from './variant';

export const BLANK_LETTER = ' ';

export type RandomSource = () => number;

export function getInitialBagSize(variant: Variant = STANDARD_VARIANT): number {
  return variant.tiles.reduce((sum, spec) => sum + spec.count, 0) + variant.blanks;
}

/** Every tile of the variant, in letter order, blanks last. */
export function buildTiles(variant: Variant = STANDARD_VARIANT): Tile[] {
  const tiles: Tile[] = [];
  let n = 0;
  const nextId = () => `t${(n += 1)}`;
  variant.tiles.forEach((spec) => {
    for (let i = 0; i < spec.count; i += 1) {
      tiles.push({ id: nextId(), letter: spec.letter, value: spec.value });
    }
  });
  for (let i = 0; i < variant.blanks; i += 1) {
    tiles.push({ id: nextId(), letter: BLANK_LETTER, value: 0, blank: true });
  }
  return tiles;
}

/**
 * Finite multiset of tiles. Tiles only ever leave the bag.
 */
export class TileBag {
  private readonly tiles: Tile[];

  constructor(tiles: Tile[], private readonly random: RandomSource = Math.random) {
    this.tiles = [...tiles];
  }

  static forVariant(variant: Variant = STANDARD_VARIANT, random: RandomSource = Math.random): TileBag {
    return new TileBag(buildTiles(variant), random);
  }

  /** Removes up to `count` tiles chosen uniformly at random. */
  draw(count: number): Tile[] {
    const drawn: Tile[] = [];
    while (drawn.length < count && this.tiles.length > 0) {
      const i = Math.floor(this.random() * this.tiles.length);
      const last = this.tiles.length - 1;
      [this.tiles[i], this.tiles[last]] = [this.tiles[last], this.tiles[i]];
      const tile = this.tiles.pop();
      if (tile) drawn.push(tile);
    }
    return drawn;
  }

  remaining(): number {
    return this.tiles.length;
  }

  isEmpty(): boolean {
    return this.tiles.length === 0;
  }

  /** Copy of the current contents, for inspection only. */
  peek(): Tile[] {
    return this.tiles.map((t) => ({ ...t }));
  }
}

export function rackValue(rack: readonly Tile[]): number {
  return rack.reduce((sum, t) => sum + (t.blank ? 0 : t.value), 0);
}

/** Repeatable random source (mulberry32) for seeded matches. */
export function seededRandom(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
