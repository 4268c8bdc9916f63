import type { Board } from './board';
import { playMove } from './move';
import type { Direction, FormedWord, Placement, PlayMove, PlayedLetter, Tile } from './types';
import type { Lexicon, TrieNode } from '../dictionary/lexicon';

export interface CandidateMove {
  move: PlayMove;
  placements: Placement[];
  words: FormedWord[];
  score: number;
}

type Cell = { x: number; y: number };

/** Rack tiles grouped by letter; blanks kept apart. */
type RackPool = { byLetter: Map<string, Tile[]>; blanks: Tile[] };

function buildPool(rack: readonly Tile[]): RackPool {
  const byLetter = new Map<string, Tile[]>();
  const blanks: Tile[] = [];
  for (const t of rack) {
    if (t.blank) {
      blanks.push(t);
      continue;
    }
    const arr = byLetter.get(t.letter) ?? [];
    arr.push(t);
    byLetter.set(t.letter, arr);
  }
  return { byLetter, blanks };
}

/** Takes a tile for `letter`, preferring a real one over a blank; null when none is left. */
function takeTile(pool: RackPool, letter: string): { tile: Tile; release: () => void } | null {
  const exact = pool.byLetter.get(letter);
  const real = exact?.pop();
  if (exact && real) {
    return { tile: real, release: () => exact.push(real) };
  }
  const blank = pool.blanks.pop();
  if (blank) {
    return {
      tile: { id: blank.id, letter, value: 0, blank: true },
      release: () => pool.blanks.push(blank)
    };
  }
  return null;
}

/**
 * Every legal play for `rack` on `board`: anchor-based search over the lexicon
 * trie with cross-word checks, one pass per direction. Same placements found
 * in both directions are reported once.
 */
export function generateMoves(board: Board, lexicon: Lexicon, rack: readonly Tile[]): CandidateMove[] {
  const root = lexicon.node('');
  if (!root || rack.length === 0) return [];

  const found = new Map<string, CandidateMove>();
  for (const direction of ['across', 'down'] as const) {
    for (const candidate of scanDirection(board, lexicon, root, rack, direction)) {
      const key = candidate.placements
        .map((p) => `${p.x},${p.y}:${p.tile.letter}${p.tile.blank ? '*' : ''}`)
        .sort()
        .join('|');
      if (!found.has(key)) found.set(key, candidate);
    }
  }
  return [...found.values()];
}

function scanDirection(
  board: Board,
  lexicon: Lexicon,
  root: TrieNode,
  rack: readonly Tile[],
  direction: Direction
): CandidateMove[] {
  const size = board.size;
  const pool = buildPool(rack);
  const out: CandidateMove[] = [];

  // Position `i` on line `line`.
  const cellOf = (line: number, i: number): Cell => (direction === 'across' ? { x: i, y: line } : { x: line, y: i });
  const letterAt = (line: number, i: number): string | null => {
    if (i < 0 || i >= size) return null;
    const { x, y } = cellOf(line, i);
    return board.tileAt(x, y)?.letter ?? null;
  };

  const crossCache = new Map<string, Set<string> | null>();
  // Letters allowed at an empty cell by the perpendicular word; null means unconstrained.
  const crossCheck = (x: number, y: number): Set<string> | null => {
    const key = `${x},${y}`;
    const cached = crossCache.get(key);
    if (cached !== undefined) return cached;

    const dx = direction === 'across' ? 0 : 1;
    const dy = direction === 'across' ? 1 : 0;
    let before = '';
    for (let cx = x - dx, cy = y - dy; board.tileAt(cx, cy); cx -= dx, cy -= dy) {
      before = (board.tileAt(cx, cy)?.letter ?? '') + before;
    }
    let after = '';
    for (let cx = x + dx, cy = y + dy; board.tileAt(cx, cy); cx += dx, cy += dy) {
      after += board.tileAt(cx, cy)?.letter ?? '';
    }

    let allowed: Set<string> | null = null;
    if (before || after) {
      allowed = new Set<string>();
      for (const letter of root.children.keys()) {
        if (lexicon.contains(`${before}${letter}${after}`)) allowed.add(letter);
      }
    }
    crossCache.set(key, allowed);
    return allowed;
  };

  const record = (line: number, start: number, word: PlayedLetter[], placed: Placement[]) => {
    if (word.length < 2 || placed.length === 0) return;
    const origin = cellOf(line, start);
    const placements = placed.map((p) => ({ ...p }));
    const words = board.wordsFormed(placements, direction);
    out.push({
      move: playMove({ x: origin.x, y: origin.y, direction, letters: word }),
      placements,
      words,
      score: board.score(placements, words)
    });
  };

  for (let line = 0; line < size; line += 1) {
    const extendRight = (
      start: number,
      i: number,
      node: TrieNode,
      word: PlayedLetter[],
      placed: Placement[],
      anchor: number
    ): void => {
      const existing = letterAt(line, i);
      if (existing === null && node.end && i > anchor) {
        record(line, start, word, placed);
      }
      if (i >= size) return;

      if (existing !== null) {
        const next = node.children.get(existing);
        if (!next) return;
        word.push({ letter: existing, blank: false });
        extendRight(start, i + 1, next, word, placed, anchor);
        word.pop();
        return;
      }

      const { x, y } = cellOf(line, i);
      const allowed = crossCheck(x, y);
      for (const [letter, next] of node.children) {
        if (allowed && !allowed.has(letter)) continue;
        const taken = takeTile(pool, letter);
        if (!taken) continue;
        word.push({ letter, blank: taken.tile.blank === true });
        placed.push({ x, y, tile: taken.tile });
        extendRight(start, i + 1, next, word, placed, anchor);
        placed.pop();
        word.pop();
        taken.release();
      }
    };

    // Left part on empty, non-anchor cells; they carry no cross constraint.
    const leftPart = (
      anchor: number,
      node: TrieNode,
      word: PlayedLetter[],
      placed: Placement[],
      limit: number
    ): void => {
      const start = anchor - word.length;
      // Left-part cells are laid out only once their count is known.
      const laidOut = placed.map((p, k) => ({ ...p, ...cellOf(line, start + k) }));
      extendRight(start, anchor, node, [...word], laidOut, anchor);
      if (limit === 0) return;
      for (const [letter, next] of node.children) {
        const taken = takeTile(pool, letter);
        if (!taken) continue;
        word.push({ letter, blank: taken.tile.blank === true });
        placed.push({ x: 0, y: 0, tile: taken.tile });
        leftPart(anchor, next, word, placed, limit - 1);
        placed.pop();
        word.pop();
        taken.release();
      }
    };

    for (let anchor = 0; anchor < size; anchor += 1) {
      const { x, y } = cellOf(line, anchor);
      if (!board.isAnchor(x, y)) continue;

      if (letterAt(line, anchor - 1) !== null) {
        // Tiles right before the anchor are a fixed prefix.
        let start = anchor - 1;
        while (letterAt(line, start - 1) !== null) start -= 1;
        let prefix = '';
        for (let i = start; i < anchor; i += 1) prefix += letterAt(line, i) ?? '';
        const node = lexicon.node(prefix);
        if (!node) continue;
        const word = [...prefix].map((letter) => ({ letter, blank: false }));
        extendRight(start, anchor, node, word, [], anchor);
        continue;
      }

      let limit = 0;
      for (let i = anchor - 1; i >= 0; i -= 1) {
        const cell = cellOf(line, i);
        if (board.tileAt(cell.x, cell.y) || board.isAnchor(cell.x, cell.y)) break;
        limit += 1;
      }
      leftPart(anchor, root, [], [], limit);
    }
  }

  return out;
}
