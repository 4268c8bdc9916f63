import { Lexicon } from '../dictionary/lexicon';
import { parseMove, passMove, renderMove } from '../core/move';
import { BLANK_LETTER, TileBag } from '../core/tiles';
import type { Move, Tile } from '../core/types';
import { letterValues, parseVariant, STANDARD_VARIANT, type Variant } from '../core/variant';
import type { Player } from '../players/types';
import { encodeRack } from '../protocol/lineProtocol';

export const TEST_WORDS = ['AT', 'CAT', 'CATS', 'DOG', 'DOGS', 'HI', 'HIS', 'IS', 'IT', 'OX', 'SH', 'TO', 'XI'];

export function testLexicon(extra: string[] = []): Lexicon {
  return new Lexicon([...TEST_WORDS, ...extra]);
}

/** 5x5 board, three-tile racks, DL left of the center, no bonuses. */
export const TINY_VARIANT: Variant = parseVariant({
  name: 'tiny',
  size: 5,
  rackSize: 3,
  bingoBonus: 0,
  center: { x: 2, y: 2 },
  tiles: [
    { letter: 'A', count: 2, value: 1 },
    { letter: 'C', count: 1, value: 3 },
    { letter: 'H', count: 1, value: 4 },
    { letter: 'I', count: 1, value: 1 },
    { letter: 'S', count: 1, value: 1 },
    { letter: 'T', count: 1, value: 1 }
  ],
  premiums: [{ kind: 'letter', multiplier: 2, squares: [[1, 2]] }]
});

/**
 * Bag that hands out `letters` in order ("*" is a blank): the first
 * `rackSize` go to seat 0, the next to seat 1, the rest to refills.
 */
export function stackedBag(letters: string, variant: Variant = STANDARD_VARIANT): TileBag {
  const values = letterValues(variant);
  const tiles: Tile[] = [...letters].map((ch, i) =>
    ch === '*'
      ? { id: `t${i + 1}`, letter: BLANK_LETTER, value: 0, blank: true }
      : { id: `t${i + 1}`, letter: ch, value: values.get(ch) ?? 0 }
  );
  // Always picking the last index makes draws pop from the end.
  return new TileBag(tiles.reverse(), () => 0.999999);
}

/** Plays a fixed list of wire-form moves (or throws the given errors), then passes. */
export class ScriptedPlayer implements Player {
  readonly calls: Array<{ rack: string; opponent: string | null }> = [];
  closed = false;

  constructor(
    readonly name: string,
    private readonly script: Array<string | Error> = []
  ) {}

  async requestMove(rack: readonly Tile[], opponentLastMove: Move | null): Promise<Move> {
    this.calls.push({ rack: encodeRack(rack), opponent: opponentLastMove ? renderMove(opponentLastMove) : null });
    const next = this.script.shift();
    if (next === undefined) return passMove();
    if (next instanceof Error) throw next;
    return parseMove(next);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
