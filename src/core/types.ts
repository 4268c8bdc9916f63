export type Seat = 0 | 1;

export type Direction = 'across' | 'down';

export interface Premium {
  kind: 'letter' | 'word';
  multiplier: number;
}

export interface Tile {
  id: string;
  letter: string;
  value: number;
  blank?: boolean;
}

export interface Placement {
  x: number;
  y: number;
  tile: Tile;
}

export interface BoardCell {
  tile: Tile | null;
}

/** One letter of a played word; `blank` marks a letter played from a blank tile. */
export interface PlayedLetter {
  readonly letter: string;
  readonly blank: boolean;
}

export interface PassMove {
  readonly kind: 'pass';
}

export interface PlayMove {
  readonly kind: 'play';
  readonly x: number;
  readonly y: number;
  readonly direction: Direction;
  /** Every cell of the word from (x, y) onward, including cells already on the board. */
  readonly letters: readonly PlayedLetter[];
}

export type Move = PassMove | PlayMove;

export interface WordCell {
  x: number;
  y: number;
  tile: Tile;
  premium?: Premium;
  isNew: boolean;
}

export interface FormedWord {
  word: string;
  x: number;
  y: number;
  direction: Direction;
  cells: WordCell[];
}

export type TerminationReason = 'AllPassed' | 'RackAndBagExhausted' | 'Forfeit';

export type FaultKind = 'parse' | 'illegal-move' | 'protocol';

export interface Fault {
  seat: Seat;
  turn: number;
  kind: FaultKind;
  message: string;
}

export type GameHistoryEntry =
  | {
    type: 'MOVE';
    turn: number;
    seat: Seat;
    move: string;
    rack: string;
    scoreDelta: number;
    words: string[];
    placedTiles: number;
    elapsedMs: number;
  }
  | {
    type: 'PASS';
    turn: number;
    seat: Seat;
    rack: string;
    elapsedMs: number;
    fault?: FaultKind;
  };

export interface PlayerResult {
  seat: Seat;
  name: string;
  id?: string;
  score: number;
  rack: string;
  faults: number;
}

export interface GameResult {
  gameId?: string;
  players: [PlayerResult, PlayerResult];
  winner: Seat | 'tie';
  reason: TerminationReason;
  turns: number;
  history: GameHistoryEntry[];
  faults: Fault[];
}
