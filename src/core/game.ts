import { Board, type ResolvedCell } from './board';
import { IllegalMoveError } from './errors';
import { columnName } from './move';
import { rackValue, TileBag, type RandomSource } from './tiles';
import type { FormedWord, Placement, PlayMove, Seat, TerminationReason, Tile } from './types';
import { STANDARD_VARIANT, type Variant } from './variant';
import type { Lexicon } from '../dictionary/lexicon';

export type MoveCheck =
  | { ok: true; placements: Placement[]; words: FormedWord[]; score: number }
  | { ok: false; error: IllegalMoveError };

export interface MoveResult {
  success: boolean;
  message?: string;
  scoreDelta?: number;
  words?: string[];
  placedTiles?: number;
  gameEnded?: { reason: TerminationReason; finalScores: [number, number] };
}

export interface GameOptions {
  variant?: Variant;
  /** Pre-built bag; racks are drawn from it. */
  bag?: TileBag;
  random?: RandomSource;
}

export function otherSeat(seat: Seat): Seat {
  return seat === 0 ? 1 : 0;
}

function reject(message: string): MoveCheck {
  return { ok: false, error: new IllegalMoveError(message) };
}

/**
 * Authoritative game state: board, bag, racks and scores. Moves are validated
 * in full before anything is mutated.
 */
export class Game {
  readonly variant: Variant;
  readonly board: Board;
  readonly bag: TileBag;
  private readonly racks: [Tile[], Tile[]];
  private readonly scores: [number, number] = [0, 0];
  private readonly initialTiles: number;
  private current: Seat = 0;
  private consecutivePasses = 0;
  private turn = 0;
  private ended: TerminationReason | null = null;
  private forfeited: Seat | null = null;

  constructor(readonly lexicon: Lexicon, options: GameOptions = {}) {
    this.variant = options.variant ?? STANDARD_VARIANT;
    this.board = new Board(this.variant);
    this.bag = options.bag ?? TileBag.forVariant(this.variant, options.random);
    this.initialTiles = this.bag.remaining();
    this.racks = [this.bag.draw(this.variant.rackSize), this.bag.draw(this.variant.rackSize)];
  }

  get currentSeat(): Seat {
    return this.current;
  }

  get turnNumber(): number {
    return this.turn;
  }

  get passCount(): number {
    return this.consecutivePasses;
  }

  get endReason(): TerminationReason | null {
    return this.ended;
  }

  get forfeitedSeat(): Seat | null {
    return this.forfeited;
  }

  isOver(): boolean {
    return this.ended !== null;
  }

  getRack(seat: Seat): Tile[] {
    return this.racks[seat].map((t) => ({ ...t }));
  }

  getScore(seat: Seat): number {
    return this.scores[seat];
  }

  getScores(): [number, number] {
    return [this.scores[0], this.scores[1]];
  }

  /** Tiles in the bag, on both racks and on the board. Constant over a game. */
  tileCount(): number {
    return this.bag.remaining() + this.racks[0].length + this.racks[1].length + this.board.tileCount();
  }

  get initialTileCount(): number {
    return this.initialTiles;
  }

  winner(): Seat | 'tie' {
    if (this.forfeited !== null) return otherSeat(this.forfeited);
    if (this.scores[0] === this.scores[1]) return 'tie';
    return this.scores[0] > this.scores[1] ? 0 : 1;
  }

  /** Validates a play for `seat` against the current state without mutating it. */
  checkMove(seat: Seat, move: PlayMove): MoveCheck {
    if (this.ended) return reject('Game is over');
    if (seat !== this.current) return reject('Not your turn');

    let cells: ResolvedCell[];
    try {
      cells = this.board.resolve(move);
    } catch (err) {
      if (err instanceof IllegalMoveError) return { ok: false, error: err };
      throw err;
    }

    // The declared word must be the whole run of tiles on its line.
    const dx = move.direction === 'across' ? 1 : 0;
    const dy = move.direction === 'across' ? 0 : 1;
    const last = cells[cells.length - 1];
    if (this.board.tileAt(move.x - dx, move.y - dy) || this.board.tileAt(last.x + dx, last.y + dy)) {
      return reject('Word must include adjoining tiles on its line');
    }

    const fresh = cells.filter((c) => c.existing === null);
    if (fresh.length === 0) return reject('Place at least one tile');

    if (this.board.isEmpty()) {
      const { x, y } = this.board.center;
      if (!fresh.some((c) => c.x === x && c.y === y)) {
        return reject(`First move must cover center ${columnName(x)}${y + 1}`);
      }
    } else {
      const connected = fresh.length < cells.length || fresh.some((c) => this.board.touchesExisting(c.x, c.y));
      if (!connected) return reject('Move must connect to existing tiles');
    }

    const pool = [...this.racks[seat]];
    const placements: Placement[] = [];
    for (const cell of fresh) {
      const { letter, blank } = cell.letter;
      const idx = pool.findIndex((t) => (blank ? t.blank === true : !t.blank && t.letter === letter));
      if (idx < 0) {
        return reject(blank ? 'No blank tile in rack' : `Tile not in rack: ${letter}`);
      }
      const [tile] = pool.splice(idx, 1);
      placements.push({
        x: cell.x,
        y: cell.y,
        tile: blank ? { id: tile.id, letter, value: 0, blank: true } : tile
      });
    }

    const words = this.board.wordsFormed(placements, move.direction);
    if (words.length === 0) return reject('No valid word formed');
    for (const { word } of words) {
      if (!this.lexicon.contains(word)) return reject(`Invalid word: ${word}`);
    }

    return { ok: true, placements, words, score: this.board.score(placements, words) };
  }

  placeMove(seat: Seat, move: PlayMove): MoveResult {
    const check = this.checkMove(seat, move);
    if (!check.ok) return { success: false, message: check.error.message };

    this.board.place(check.placements);
    const used = new Set(check.placements.map((p) => p.tile.id));
    this.racks[seat] = this.racks[seat].filter((t) => !used.has(t.id));
    const tilesNeeded = Math.max(0, this.variant.rackSize - this.racks[seat].length);
    if (tilesNeeded > 0) this.racks[seat].push(...this.bag.draw(tilesNeeded));

    this.scores[seat] += check.score;
    this.consecutivePasses = 0;
    this.turn += 1;

    const result: MoveResult = {
      success: true,
      scoreDelta: check.score,
      words: check.words.map((w) => w.word),
      placedTiles: check.placements.length
    };

    if (this.racks[seat].length === 0 && this.bag.isEmpty()) {
      const opponent = otherSeat(seat);
      const left = rackValue(this.racks[opponent]);
      this.scores[opponent] -= left;
      this.scores[seat] += left;
      result.gameEnded = this.finish('RackAndBagExhausted');
      return result;
    }

    this.current = otherSeat(seat);
    return result;
  }

  /** A voluntary or forced pass. Two in a row end the game. */
  passTurn(seat: Seat): MoveResult {
    if (this.ended) return { success: false, message: 'Game is over' };
    if (seat !== this.current) return { success: false, message: 'Not your turn' };

    this.consecutivePasses += 1;
    this.turn += 1;
    if (this.consecutivePasses >= 2) {
      this.applyEndGameScoring();
      return { success: true, gameEnded: this.finish('AllPassed') };
    }
    this.current = otherSeat(seat);
    return { success: true };
  }

  forfeit(seat: Seat): MoveResult {
    if (this.ended) return { success: false, message: 'Game is over' };
    this.forfeited = seat;
    return { success: true, gameEnded: this.finish('Forfeit') };
  }

  /** Each seat loses the value of the tiles left on its rack. */
  private applyEndGameScoring(): void {
    for (const seat of [0, 1] as const) {
      this.scores[seat] -= rackValue(this.racks[seat]);
    }
  }

  private finish(reason: TerminationReason): { reason: TerminationReason; finalScores: [number, number] } {
    this.ended = reason;
    return { reason, finalScores: this.getScores() };
  }
}
