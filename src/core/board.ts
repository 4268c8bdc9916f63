import { buildPremiumMap, premiumKey } from './boardLayout';
import { IllegalMoveError } from './errors';
import { cellsOf, columnName } from './move';
import type { BoardCell, Direction, FormedWord, Placement, PlayMove, PlayedLetter, Premium, Tile, WordCell } from './types';
import { STANDARD_VARIANT, type Variant } from './variant';

export interface ResolvedCell {
  x: number;
  y: number;
  letter: PlayedLetter;
  /** Tile already on the board at this cell, if any. */
  existing: Tile | null;
}

const NEIGHBOR_OFFSETS = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1]
] as const;

export class Board {
  readonly size: number;
  private readonly cells: BoardCell[][];
  private readonly premiums: Map<string, Premium>;
  private placed = 0;

  constructor(readonly variant: Variant = STANDARD_VARIANT) {
    this.size = variant.size;
    this.premiums = buildPremiumMap(variant);
    this.cells = Array.from({ length: this.size }, () =>
      Array.from({ length: this.size }, () => ({ tile: null }))
    );
  }

  get center(): { x: number; y: number } {
    return this.variant.center;
  }

  inBounds(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.size && y < this.size;
  }

  tileAt(x: number, y: number): Tile | null {
    if (!this.inBounds(x, y)) return null;
    return this.cells[y][x].tile;
  }

  premiumAt(x: number, y: number): Premium | undefined {
    return this.premiums.get(premiumKey(x, y));
  }

  isEmpty(): boolean {
    return this.placed === 0;
  }

  tileCount(): number {
    return this.placed;
  }

  touchesExisting(x: number, y: number): boolean {
    return NEIGHBOR_OFFSETS.some(([dx, dy]) => this.tileAt(x + dx, y + dy) !== null);
  }

  /** Empty cell next to a tile; on an empty board only the center. */
  isAnchor(x: number, y: number): boolean {
    if (!this.inBounds(x, y) || this.tileAt(x, y)) return false;
    if (this.isEmpty()) return x === this.center.x && y === this.center.y;
    return this.touchesExisting(x, y);
  }

  /**
   * Maps a play onto board cells. Throws IllegalMoveError when the word leaves
   * the board or disagrees with a letter already placed.
   */
  resolve(move: PlayMove): ResolvedCell[] {
    if (move.letters.length === 0) throw new IllegalMoveError('Move has no letters');
    return cellsOf(move).map(({ x, y, letter }) => {
      if (!this.inBounds(x, y)) {
        throw new IllegalMoveError('Placement outside board');
      }
      const existing = this.tileAt(x, y);
      if (existing && existing.letter !== letter.letter) {
        throw new IllegalMoveError(
          `Cell ${columnName(x)}${y + 1} holds ${existing.letter}, not ${letter.letter}`
        );
      }
      return { x, y, letter, existing };
    });
  }

  /** Applies validated placements. Placing onto an occupied cell is a caller bug. */
  place(placements: readonly Placement[]): void {
    for (const p of placements) {
      if (!this.inBounds(p.x, p.y)) {
        throw new Error(`Placement outside board at ${p.x},${p.y}`);
      }
      if (this.cells[p.y][p.x].tile) {
        throw new Error(`Cell already occupied at ${p.x},${p.y}`);
      }
    }
    placements.forEach((p) => {
      this.cells[p.y][p.x].tile = p.tile;
    });
    this.placed += placements.length;
  }

  /**
   * Words of two or more letters created by `placements` (not yet applied):
   * the primary word along `direction`, then each cross word.
   */
  wordsFormed(placements: readonly Placement[], direction?: Direction): FormedWord[] {
    if (placements.length === 0) return [];
    const overlay = new Map(placements.map((p) => [premiumKey(p.x, p.y), p.tile]));
    const at = (x: number, y: number): Tile | null => this.tileAt(x, y) ?? overlay.get(premiumKey(x, y)) ?? null;

    const primary = direction ?? inferDirection(placements) ?? this.longerDirection(placements[0], at);

    const wordsByKey = new Map<string, FormedWord>();
    const addWord = (dir: Direction, start: Placement) => {
      const word = this.collectWord(start, dir, at, overlay);
      if (word.cells.length < 2) return;
      const key = `${dir}:${word.x},${word.y}`;
      if (wordsByKey.has(key)) return;
      wordsByKey.set(key, word);
    };

    addWord(primary, placements[0]);
    const cross: Direction = primary === 'across' ? 'down' : 'across';
    for (const p of placements) addWord(cross, p);

    return [...wordsByKey.values()];
  }

  /**
   * Score of a move against the current board. Letter premiums count only
   * under new tiles; each word multiplies by the word premiums under its own
   * new tiles.
   */
  score(placements: readonly Placement[], words: readonly FormedWord[]): number {
    let total = 0;
    for (const { cells } of words) {
      total += scoreCells(cells);
    }
    // Bonus for a whole rack applies once per move, not per word.
    if (placements.length === this.variant.rackSize) total += this.variant.bingoBonus;
    if (this.isEmpty()) total += this.variant.firstMoveBonus;
    return total;
  }

  toString(): string {
    const header = '    ' + Array.from({ length: this.size }, (_, x) => ` ${columnName(x)} `).join('');
    const rows = this.cells.map((row, y) => {
      const label = String(y + 1).padStart(3, ' ') + ' ';
      const body = row
        .map((cell, x) => {
          if (cell.tile) {
            const letter = cell.tile.blank ? cell.tile.letter.toLowerCase() : cell.tile.letter;
            return ` ${letter} `;
          }
          const premium = this.premiumAt(x, y);
          if (!premium) return ' . ';
          return `${premium.multiplier}${premium.kind === 'word' ? 'W' : 'L'} `;
        })
        .join('');
      return (label + body).trimEnd();
    });
    return [header.trimEnd(), ...rows].join('\n');
  }

  private longerDirection(start: Placement, at: (x: number, y: number) => Tile | null): Direction {
    const run = (dx: number, dy: number) => {
      let n = 0;
      for (let i = 1; at(start.x + dx * i, start.y + dy * i); i += 1) n += 1;
      return n;
    };
    const across = run(1, 0) + run(-1, 0);
    const down = run(0, 1) + run(0, -1);
    return down > across ? 'down' : 'across';
  }

  private collectWord(
    start: Placement,
    direction: Direction,
    at: (x: number, y: number) => Tile | null,
    overlay: Map<string, Tile>
  ): FormedWord {
    const dx = direction === 'across' ? 1 : 0;
    const dy = direction === 'across' ? 0 : 1;
    let x = start.x;
    let y = start.y;
    while (at(x - dx, y - dy)) {
      x -= dx;
      y -= dy;
    }
    const originX = x;
    const originY = y;

    const cells: WordCell[] = [];
    let tile = at(x, y);
    while (tile) {
      cells.push({
        x,
        y,
        tile,
        premium: this.premiumAt(x, y),
        isNew: overlay.has(premiumKey(x, y)) && !this.tileAt(x, y)
      });
      x += dx;
      y += dy;
      tile = at(x, y);
    }
    return {
      word: cells.map((c) => c.tile.letter).join(''),
      x: originX,
      y: originY,
      direction,
      cells
    };
  }
}

/** Shared row or column of the placements; null when they are not in one line. */
export function inferDirection(placements: readonly Placement[]): Direction | null {
  if (placements.length < 2) return null;
  const sameRow = placements.every((p) => p.y === placements[0].y);
  const sameCol = placements.every((p) => p.x === placements[0].x);
  if (sameRow) return 'across';
  if (sameCol) return 'down';
  return null;
}

export function scoreCells(cells: readonly WordCell[]): number {
  let total = 0;
  let wordMultiplier = 1;

  cells.forEach((cell) => {
    const letterValue = cell.tile.blank ? 0 : cell.tile.value;

    if (cell.isNew && cell.premium) {
      if (cell.premium.kind === 'letter') total += letterValue * cell.premium.multiplier;
      else total += letterValue;

      if (cell.premium.kind === 'word') wordMultiplier *= cell.premium.multiplier;
    } else {
      total += letterValue;
    }
  });

  return total * wordMultiplier;
}
