import { ParseError } from './errors';
import type { Direction, Move, PassMove, PlayMove, PlayedLetter } from './types';

const PASS: PassMove = Object.freeze<PassMove>({ kind: 'pass' });

export const PASS_TEXT = '--';

export function passMove(): PassMove {
  return PASS;
}

export function playMove(params: {
  x: number;
  y: number;
  direction: Direction;
  letters: readonly PlayedLetter[];
}): PlayMove {
  const move: PlayMove = {
    kind: 'play',
    x: params.x,
    y: params.y,
    direction: params.direction,
    letters: Object.freeze(params.letters.map((l) => Object.freeze<PlayedLetter>({ letter: l.letter, blank: l.blank })))
  };
  return Object.freeze(move);
}

/** "SUBWAy" -> letters, lowercase marking a blank. */
export function lettersFromWord(word: string): PlayedLetter[] {
  return [...word].map((ch) => ({ letter: ch.toUpperCase(), blank: ch !== ch.toUpperCase() }));
}

export function wordOf(move: PlayMove): string {
  return move.letters.map((l) => (l.blank ? l.letter.toLowerCase() : l.letter)).join('');
}

export function columnName(x: number): string {
  return String.fromCharCode(65 + x);
}

export function positionOf(move: PlayMove): string {
  const row = String(move.y + 1);
  const col = columnName(move.x);
  return move.direction === 'across' ? `${row}${col}` : `${col}${row}`;
}

/** Canonical wire form: "WORD 8H" across, "WORD H8" down, "--" for a pass. */
export function renderMove(move: Move): string {
  if (move.kind === 'pass') return PASS_TEXT;
  return `${wordOf(move)} ${positionOf(move)}`;
}

export function parseMove(line: string): Move {
  const text = line.trim();
  if (text === PASS_TEXT) return passMove();
  if (!text) throw new ParseError('empty move', line);

  const parts = text.split(/\s+/);
  if (parts.length !== 2) {
    throw new ParseError(`expected "WORD POSITION", got ${parts.length} field(s)`, line);
  }
  const [rawWord, position] = parts;
  if (position === PASS_TEXT) {
    throw new ParseError('tile exchanges are not supported', line);
  }

  // Letters already on the board may be wrapped in parentheses.
  const word = rawWord.replace(/[()]/g, '');
  if (!/^[A-Za-z]+$/.test(word)) {
    throw new ParseError(`invalid word: ${rawWord}`, line);
  }

  const down = /^([A-Z])([0-9]+)$/.exec(position);
  const across = /^([0-9]+)([A-Z])$/.exec(position);
  let direction: Direction;
  let row: number;
  let col: number;
  if (down) {
    direction = 'down';
    col = down[1].charCodeAt(0) - 65;
    row = Number(down[2]);
  } else if (across) {
    direction = 'across';
    row = Number(across[1]);
    col = across[2].charCodeAt(0) - 65;
  } else {
    throw new ParseError(`invalid position: ${position}`, line);
  }
  if (row < 1) throw new ParseError(`invalid position: ${position}`, line);

  return playMove({ x: col, y: row - 1, direction, letters: lettersFromWord(word) });
}

export function movesEqual(a: Move, b: Move): boolean {
  return renderMove(a) === renderMove(b);
}

export function cellsOf(move: PlayMove): Array<{ x: number; y: number; letter: PlayedLetter }> {
  return move.letters.map((letter, i) => ({
    x: move.direction === 'across' ? move.x + i : move.x,
    y: move.direction === 'across' ? move.y : move.y + i,
    letter
  }));
}
