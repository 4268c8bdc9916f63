import type { Move, Tile } from '../core/types';

/**
 * Anything that can take a turn. Players see only their own rack and the
 * opponent's previous move; the referee owns the game state.
 */
export interface Player {
  readonly name: string;
  /** Acquire resources (e.g. spawn a process). Called once before the first turn. */
  start?(): Promise<void>;
  /**
   * Next move for `rack`. `opponentLastMove` is null on the very first turn
   * and a pass when the opponent passed or faulted.
   */
  requestMove(rack: readonly Tile[], opponentLastMove: Move | null): Promise<Move>;
  /** Release resources. Called on every exit path, also after a failed start. */
  close?(): Promise<void>;
}
