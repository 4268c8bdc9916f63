import { ParseError, ProtocolError } from '../core/errors';
import { parseMove, PASS_TEXT, passMove, renderMove } from '../core/move';
import { BLANK_LETTER } from '../core/tiles';
import type { Move, Tile } from '../core/types';
import { letterValues, STANDARD_VARIANT, type Variant } from '../core/variant';

export const HELLO = 'HELLO';

export const BLANK_CHAR = '*';
export const WILDCARD_CHAR = '?';

const REQUEST_PATTERN = /^([A-Z?*]*):(.*)$/;

export interface MoveRequest {
  /** Rack letters as sent: uppercase, "*" for blanks, "?" for unknown tiles. */
  rack: string;
  opponentMove: Move | null;
}

export function encodeRack(rack: readonly Tile[]): string {
  return rack.map((t) => (t.blank ? BLANK_CHAR : t.letter)).join('');
}

/** "RACK:OPPONENT_MOVE"; the move part is empty before the opponent has moved. */
export function renderRequest(rack: readonly Tile[], opponentMove: Move | null): string {
  return `${encodeRack(rack)}:${opponentMove ? renderMove(opponentMove) : ''}`;
}

export function parseRequest(line: string): MoveRequest {
  const match = REQUEST_PATTERN.exec(line.trimEnd());
  if (!match) throw new ProtocolError(`malformed request: ${JSON.stringify(line)}`);
  const [, rack, moveText] = match;
  if (!moveText.trim()) return { rack, opponentMove: null };
  try {
    return { rack, opponentMove: parseMove(moveText) };
  } catch (err) {
    if (err instanceof ParseError) {
      throw new ProtocolError(`malformed opponent move in request: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

/** A reply line: a rendered move, or an empty line / "--" for a pass. Throws ParseError. */
export function parseResponse(line: string): Move {
  const text = line.trim();
  if (text === '' || text === PASS_TEXT) return passMove();
  return parseMove(text);
}

/** Tiles for a rack string; blanks and wildcards become blank tiles. */
export function rackTiles(rack: string, variant: Variant = STANDARD_VARIANT): Tile[] {
  const values = letterValues(variant);
  return [...rack].map((ch, i) => {
    const id = `r${i + 1}`;
    if (ch === BLANK_CHAR || ch === WILDCARD_CHAR) {
      return { id, letter: BLANK_LETTER, value: 0, blank: true };
    }
    return { id, letter: ch, value: values.get(ch) ?? 0 };
  });
}
