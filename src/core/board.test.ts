import { describe, expect, it } from 'vitest';
import { Board } from './board';
import { IllegalMoveError } from './errors';
import { parseMove } from './move';
import type { Placement, PlayMove, Tile } from './types';
import { parseVariant } from './variant';

function makeTileFactory() {
    let n = 0;
    return (letter: string, value: number, blank = false): Tile => {
        n += 1;
        return blank ? { id: `t${n}`, letter, value: 0, blank } : { id: `t${n}`, letter, value };
    };
}

function play(text: string): PlayMove {
    const move = parseMove(text);
    if (move.kind !== 'play') throw new Error('expected a play');
    return move;
}

function scoreOf(board: Board, placements: Placement[]) {
    const words = board.wordsFormed(placements);
    return { score: board.score(placements, words), words: words.map((w) => w.word) };
}

const tinyVariant = parseVariant({
    name: 'tiny',
    size: 5,
    rackSize: 3,
    center: { x: 2, y: 2 },
    tiles: [
        { letter: 'A', count: 2, value: 1 },
        { letter: 'C', count: 1, value: 3 },
        { letter: 'T', count: 1, value: 1 }
    ],
    premiums: [{ kind: 'letter', multiplier: 2, squares: [[1, 2]] }]
});

describe('Board scoring: premiums (DL/TL/DW/TW)', () => {
    it('does not re-apply TL/DL for existing tiles when extending a word', () => {
        const t = makeTileFactory();
        const board = new Board();
        // A sits on the TL square at (5,5) but was placed earlier.
        board.place([
            { x: 5, y: 5, tile: t('A', 1) },
            { x: 6, y: 5, tile: t('T', 1) }
        ]);

        const result = scoreOf(board, [{ x: 7, y: 5, tile: t('E', 1) }]);
        expect(result.words).toEqual(['ATE']);
        expect(result.score).toBe(3);
    });

    it('applies DW per-word (does not globally multiply unrelated cross-words)', () => {
        const t = makeTileFactory();
        const board = new Board();
        board.place([
            { x: 5, y: 3, tile: t('I', 1) },
            { x: 5, y: 5, tile: t('E', 1) }
        ]);

        const result = scoreOf(board, [
            { x: 4, y: 4, tile: t('A', 1) }, // DW
            { x: 5, y: 4, tile: t('T', 1) }
        ]);

        // "AT" doubled = 4, "ITE" = 3
        expect(result.score).toBe(7);
        expect(result.words).toEqual(['AT', 'ITE']);
    });

    it('applies TL to the placed letter in each word it forms (primary + cross word)', () => {
        const t = makeTileFactory();
        const board = new Board();
        board.place([
            { x: 4, y: 5, tile: t('A', 1) },
            { x: 6, y: 5, tile: t('T', 1) },
            { x: 5, y: 4, tile: t('I', 1) },
            { x: 5, y: 6, tile: t('E', 1) }
        ]);

        const result = scoreOf(board, [{ x: 5, y: 5, tile: t('H', 4) }]);

        // "AHT" = 1 + 12 + 1, "IHE" = 1 + 12 + 1
        expect(result.score).toBe(28);
        expect(result.words).toEqual(['AHT', 'IHE']);
    });

    it('applies TW per-word (does not globally multiply unrelated cross-words)', () => {
        const t = makeTileFactory();
        const board = new Board();
        board.place([
            { x: 1, y: 6, tile: t('A', 1) },
            { x: 1, y: 8, tile: t('T', 1) }
        ]);

        const result = scoreOf(board, [
            { x: 0, y: 7, tile: t('H', 4) }, // TW
            { x: 1, y: 7, tile: t('I', 1) }
        ]);

        // "HI" tripled = 15, "AIT" = 3
        expect(result.score).toBe(18);
        expect(result.words).toEqual(['HI', 'AIT']);
    });

    it('complex: long word over TW + DL + center with multiple cross-words', () => {
        const t = makeTileFactory();
        const board = new Board();
        board.place([
            { x: 0, y: 6, tile: t('A', 1) },
            { x: 0, y: 8, tile: t('A', 1) },
            { x: 3, y: 6, tile: t('A', 1) },
            { x: 3, y: 8, tile: t('E', 1) },
            { x: 5, y: 6, tile: t('E', 1) },
            { x: 5, y: 8, tile: t('E', 1) },
            { x: 7, y: 6, tile: t('E', 1) },
            { x: 7, y: 8, tile: t('D', 2) }
        ]);

        const letters: Array<[string, number]> = [
            ['H', 4],
            ['E', 1],
            ['L', 1],
            ['L', 1],
            ['O', 1],
            ['W', 4],
            ['O', 1],
            ['R', 1]
        ];
        const placements = letters.map(([letter, value], x) => ({ x, y: 7, tile: t(letter, value) }));

        const result = scoreOf(board, placements);

        // HELLOWOR: 15 * 6 = 90; AHA 18; ALE 4; EWE 6; ERD 8
        expect(result.score).toBe(126);
        expect(result.words).toEqual(['HELLOWOR', 'AHA', 'ALE', 'EWE', 'ERD']);
    });

    it('scores a first word over the center and a one-tile extension on DL', () => {
        const t = makeTileFactory();
        const board = new Board();
        const hi: Placement[] = [
            { x: 7, y: 7, tile: t('H', 4) },
            { x: 7, y: 8, tile: t('I', 1) }
        ];
        expect(scoreOf(board, hi)).toEqual({ score: 10, words: ['HI'] });
        board.place(hi);

        // T on the DL at (8,8) forms "IT"
        expect(scoreOf(board, [{ x: 8, y: 8, tile: t('T', 1) }])).toEqual({ score: 3, words: ['IT'] });
    });

    it('adds the bingo bonus once when the whole rack is placed', () => {
        const t = makeTileFactory();
        const board = new Board();
        const placements = Array.from({ length: 7 }, (_, i) => ({ x: 4 + i, y: 7, tile: t('A', 1) }));
        // 7 * 2 (center DW) + 50
        expect(scoreOf(board, placements).score).toBe(64);
    });

    it('scores blanks as zero', () => {
        const t = makeTileFactory();
        const board = new Board();
        const result = scoreOf(board, [
            { x: 7, y: 7, tile: t('Z', 0, true) },
            { x: 8, y: 7, tile: t('A', 1) }
        ]);
        expect(result.score).toBe(2);
    });

    it('scores CAT over a DL on an empty board as 8, plus the first-move bonus', () => {
        const t = makeTileFactory();
        const placements = [
            { x: 1, y: 2, tile: t('C', 3) },
            { x: 2, y: 2, tile: t('A', 1) },
            { x: 3, y: 2, tile: t('T', 1) }
        ];
        expect(scoreOf(new Board({ ...tinyVariant, rackSize: 7 }), placements).score).toBe(8);
        expect(scoreOf(new Board({ ...tinyVariant, rackSize: 7, firstMoveBonus: 10 }), placements).score).toBe(18);
    });

    it('is a pure function of the board and the placements', () => {
        const t = makeTileFactory();
        const board = new Board();
        board.place([{ x: 7, y: 7, tile: t('A', 1) }]);
        const placements = [{ x: 8, y: 7, tile: t('X', 8) }];
        const first = scoreOf(board, placements);
        expect(scoreOf(board, placements)).toEqual(first);
        expect(board.tileAt(8, 7)).toBeNull();
        expect(board.tileCount()).toBe(1);
    });
});

describe('Board state', () => {
    it('refuses to place onto an occupied cell', () => {
        const t = makeTileFactory();
        const board = new Board();
        board.place([{ x: 7, y: 7, tile: t('A', 1) }]);
        expect(() => board.place([{ x: 7, y: 7, tile: t('B', 3) }])).toThrow('Cell already occupied');
        expect(board.tileAt(7, 7)?.letter).toBe('A');
        expect(board.tileCount()).toBe(1);
    });

    it('has only the center as anchor when empty, then cells next to tiles', () => {
        const t = makeTileFactory();
        const board = new Board();
        expect(board.isEmpty()).toBe(true);
        expect(board.isAnchor(7, 7)).toBe(true);
        expect(board.isAnchor(8, 7)).toBe(false);

        board.place([{ x: 7, y: 7, tile: t('A', 1) }]);
        expect(board.isEmpty()).toBe(false);
        expect(board.isAnchor(7, 7)).toBe(false);
        expect(board.isAnchor(8, 7)).toBe(true);
        expect(board.isAnchor(7, 6)).toBe(true);
        expect(board.isAnchor(8, 8)).toBe(false);
    });

    it('resolves a play onto new and existing cells', () => {
        const t = makeTileFactory();
        const board = new Board();
        board.place([{ x: 7, y: 7, tile: t('A', 1) }]);

        const cells = board.resolve(play('CAT 8G'));
        expect(cells.map((c) => [c.x, c.y, c.letter.letter, c.existing?.id ?? null])).toEqual([
            [6, 7, 'C', null],
            [7, 7, 'A', 't1'],
            [8, 7, 'T', null]
        ]);
    });

    it('rejects plays that leave the board or contradict placed letters', () => {
        const t = makeTileFactory();
        const board = new Board();
        board.place([{ x: 7, y: 7, tile: t('A', 1) }]);

        expect(() => board.resolve(play('CAT 8N'))).toThrow(IllegalMoveError);
        expect(() => board.resolve(play('COT 8G'))).toThrow('Cell H8 holds A, not O');
    });

    it('renders tiles, blanks and premiums as text', () => {
        const variant = parseVariant({
            name: 'mini',
            size: 3,
            rackSize: 2,
            center: { x: 1, y: 1 },
            tiles: [{ letter: 'E', count: 2, value: 1 }],
            premiums: [
                { kind: 'word', multiplier: 2, squares: [[1, 1]] },
                { kind: 'letter', multiplier: 3, squares: [[0, 0]] }
            ]
        });
        const board = new Board(variant);
        board.place([{ x: 0, y: 1, tile: { id: 't1', letter: 'E', value: 0, blank: true } }]);

        expect(board.toString().split('\n')).toEqual([
            '     A  B  C',
            '  1 3L  .  .',
            '  2  e 2W  .',
            '  3  .  .  .'
        ]);
    });
});
