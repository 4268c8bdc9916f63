import { Board } from '../core/board';
import { silentLogger, type Logger } from '../core/logger';
import { passMove, renderMove } from '../core/move';
import { generateMoves, type CandidateMove } from '../core/moveGenerator';
import type { Move, PlayMove, Tile } from '../core/types';
import { letterValues, STANDARD_VARIANT, type Variant } from '../core/variant';
import type { Lexicon } from '../dictionary/lexicon';
import { encodeRack } from '../protocol/lineProtocol';
import type { Player } from './types';

export const STRATEGIES = ['max-score', 'min-score', 'max-length'] as const;

export type StrategyName = (typeof STRATEGIES)[number];

type Preference = (a: CandidateMove, b: CandidateMove) => number;

// Negative when `a` is preferred.
const PREFERENCES: Record<StrategyName, Preference> = {
  'max-score': (a, b) => b.score - a.score,
  'min-score': (a, b) => a.score - b.score,
  'max-length': (a, b) => b.placements.length - a.placements.length || b.score - a.score
};

export function pickMove(candidates: readonly CandidateMove[], strategy: StrategyName): CandidateMove | null {
  let best: CandidateMove | null = null;
  for (const candidate of candidates) {
    if (!best || PREFERENCES[strategy](candidate, best) < 0) best = candidate;
  }
  return best;
}

export interface StrategyPlayerOptions {
  lexicon: Lexicon;
  variant?: Variant;
  strategy?: StrategyName;
  name?: string;
  logger?: Logger;
}

/**
 * In-process player. Keeps its own copy of the board, updated from the
 * opponent's relayed moves and its own plays.
 */
export class StrategyPlayer implements Player {
  readonly name: string;
  readonly strategy: StrategyName;
  private readonly lexicon: Lexicon;
  private readonly variant: Variant;
  private readonly values: Map<string, number>;
  private readonly logger: Logger;
  private readonly board: Board;
  private observed = 0;
  /** Last move sent, with the rack it came from, until the next request shows its fate. */
  private pending: { candidate: CandidateMove; rack: string } | null = null;

  constructor(options: StrategyPlayerOptions) {
    this.lexicon = options.lexicon;
    this.variant = options.variant ?? STANDARD_VARIANT;
    this.strategy = options.strategy ?? 'max-score';
    this.name = options.name ?? this.strategy;
    this.logger = options.logger ?? silentLogger;
    this.values = letterValues(this.variant);
    this.board = new Board(this.variant);
  }

  async requestMove(rack: readonly Tile[], opponentLastMove: Move | null): Promise<Move> {
    this.settlePending(rack);
    if (opponentLastMove?.kind === 'play') this.observe(opponentLastMove);

    const candidates = generateMoves(this.board, this.lexicon, rack);
    const best = pickMove(candidates, this.strategy);
    if (!best) {
      this.logger.debug('no legal move, passing');
      return passMove();
    }
    this.logger.debug(() => [`${candidates.length} candidates, playing`, renderMove(best.move), `+${best.score}`]);
    this.pending = { candidate: best, rack: encodeRack(rack) };
    return best.move;
  }

  /**
   * Commits the previous move to the replica if it was taken. A rejected or
   * timed-out move leaves the rack exactly as it was sent.
   */
  private settlePending(rack: readonly Tile[]): void {
    const pending = this.pending;
    this.pending = null;
    if (!pending) return;
    if (encodeRack(rack) === pending.rack) {
      this.logger.debug('previous move was not taken:', renderMove(pending.candidate.move));
      return;
    }
    this.board.place(pending.candidate.placements);
  }

  /** Copies the new tiles of an accepted opponent move onto the replica. */
  private observe(move: PlayMove): void {
    const fresh = this.board.resolve(move).filter((cell) => cell.existing === null);
    this.board.place(
      fresh.map(({ x, y, letter }) => {
        this.observed += 1;
        return {
          x,
          y,
          tile: letter.blank
            ? { id: `seen${this.observed}`, letter: letter.letter, value: 0, blank: true }
            : { id: `seen${this.observed}`, letter: letter.letter, value: this.values.get(letter.letter) ?? 0 }
        };
      })
    );
  }
}
