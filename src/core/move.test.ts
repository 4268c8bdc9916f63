import { describe, it, expect } from 'vitest';
import { ParseError } from './errors';
import { cellsOf, lettersFromWord, movesEqual, parseMove, passMove, playMove, renderMove } from './move';
import type { PlayMove } from './types';

function play(move: ReturnType<typeof parseMove>): PlayMove {
  if (move.kind !== 'play') throw new Error('expected a play');
  return move;
}

describe('parseMove', () => {
  it('reads a down move as column then row', () => {
    const move = play(parseMove('NITROGEnASE H3'));
    expect(move.direction).toBe('down');
    expect(move.x).toBe(7);
    expect(move.y).toBe(2);
    expect(move.letters).toHaveLength(11);
    expect(move.letters[7]).toEqual({ letter: 'N', blank: true });
    expect(move.letters[6]).toEqual({ letter: 'E', blank: false });
  });

  it('reads an across move as row then column', () => {
    const move = play(parseMove('NITROGEnASE 3H'));
    expect(move.direction).toBe('across');
    expect(move.x).toBe(7);
    expect(move.y).toBe(2);
  });

  it('reads multi-digit rows', () => {
    const move = play(parseMove('OX 11E'));
    expect(move.x).toBe(4);
    expect(move.y).toBe(10);
  });

  it('treats "--" as a pass', () => {
    expect(parseMove('--')).toEqual({ kind: 'pass' });
    expect(parseMove('  --\n')).toEqual({ kind: 'pass' });
  });

  it('drops parentheses around letters already on the board', () => {
    expect(renderMove(parseMove('(F)OOD 8G'))).toBe('FOOD 8G');
  });

  it('rejects malformed input with a ParseError', () => {
    expect(() => parseMove('NITROGEnASE 33')).toThrow(ParseError);
    expect(() => parseMove('NITROGEnASE 33')).toThrow('invalid position: 33');
    expect(() => parseMove('??? 3H')).toThrow('invalid word: ???');
    expect(() => parseMove('NITROGEnASE')).toThrow(ParseError);
    expect(() => parseMove('')).toThrow('empty move');
    expect(() => parseMove('CAT 0H')).toThrow('invalid position: 0H');
    expect(() => parseMove('A B C')).toThrow(ParseError);
  });

  it('rejects tile exchanges', () => {
    expect(() => parseMove('DEW --')).toThrow('tile exchanges are not supported');
  });
});

describe('renderMove', () => {
  it('renders blanks in lowercase', () => {
    const move = playMove({ x: 2, y: 7, direction: 'across', letters: lettersFromWord('SUBWAy') });
    expect(renderMove(move)).toBe('SUBWAy 8C');
  });

  it('renders a pass as "--"', () => {
    expect(renderMove(passMove())).toBe('--');
  });

  it('round-trips parse(render(m))', () => {
    const moves = [
      playMove({ x: 0, y: 0, direction: 'across', letters: lettersFromWord('QI') }),
      playMove({ x: 14, y: 10, direction: 'down', letters: lettersFromWord('zaP') }),
      playMove({ x: 7, y: 14, direction: 'across', letters: lettersFromWord('a') }),
      passMove()
    ];
    for (const m of moves) {
      expect(parseMove(renderMove(m))).toEqual(m);
    }
  });
});

describe('move values', () => {
  it('are frozen', () => {
    const move = play(parseMove('CAT 8H'));
    expect(Object.isFrozen(move)).toBe(true);
    expect(Object.isFrozen(move.letters)).toBe(true);
  });

  it('compare by wire form', () => {
    expect(movesEqual(parseMove('CAT 8H'), parseMove('CAT 8H'))).toBe(true);
    expect(movesEqual(parseMove('CAT 8H'), parseMove('CAT H8'))).toBe(false);
    expect(movesEqual(parseMove('CaT 8H'), parseMove('CAT 8H'))).toBe(false);
  });

  it('lists the cells a move covers', () => {
    expect(cellsOf(play(parseMove('CAT H8'))).map(({ x, y }) => [x, y])).toEqual([
      [7, 7],
      [7, 8],
      [7, 9]
    ]);
  });
});
