import { once } from 'node:events';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { silentLogger, type Logger } from '../core/logger';
import { PASS_TEXT, renderMove } from '../core/move';
import { STANDARD_VARIANT, type Variant } from '../core/variant';
import type { Player } from '../players/types';
import { HELLO, parseRequest, rackTiles } from './lineProtocol';

export interface ServeOptions {
  variant?: Variant;
  logger?: Logger;
}

/**
 * Process side of the line protocol: greets with HELLO, then answers every
 * request line with exactly one move line until the input ends.
 */
export async function serveProtocol(
  player: Player,
  input: Readable,
  output: Writable,
  options: ServeOptions = {}
): Promise<void> {
  const variant = options.variant ?? STANDARD_VARIANT;
  const logger = options.logger ?? silentLogger;
  const send = async (line: string) => {
    if (!output.write(`${line}\n`)) await once(output, 'drain');
  };

  await player.start?.();
  await send(HELLO);
  try {
    for await (const line of createInterface({ input, crlfDelay: Infinity })) {
      let reply = PASS_TEXT;
      try {
        const request = parseRequest(line);
        const move = await player.requestMove(rackTiles(request.rack, variant), request.opponentMove);
        reply = renderMove(move);
      } catch (err) {
        // one reply per request, whatever went wrong
        logger.warn(`passing: ${err instanceof Error ? err.message : String(err)}`);
      }
      logger.debug('<', line, '>', reply);
      await send(reply);
    }
  } finally {
    await player.close?.();
  }
}
