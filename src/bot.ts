#!/usr/bin/env tsx
/**
 * Strategy player speaking the line protocol on stdin/stdout, usable as an
 * `exec:` player by the referee.
 *
 * Usage:
 *   tsx src/bot.ts --dictionary words.txt
 *   tsx src/bot.ts --dictionary words.txt --strategy max-length
 *   tsx src/bot.ts --dictionary words.txt --variant variants/standard.json
 *
 * Logs go to stderr; stdout carries only protocol lines.
 */

import { Console } from 'node:console';
import { loadConfig } from './config';
import { ConfigurationError } from './core/errors';
import { createLogger } from './core/logger';
import { loadVariant, STANDARD_VARIANT } from './core/variant';
import { loadLexicon } from './dictionary/lexicon';
import { parsePlayerSpec } from './players/factory';
import { StrategyPlayer } from './players/strategyPlayer';
import { serveProtocol } from './protocol/server';

interface BotArgs {
  dictionary?: string;
  strategy: string;
  variant?: string;
}

function parseArgs(args: string[]): BotArgs {
  const parsed: BotArgs = { strategy: 'max-score' };
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === '--dictionary' && value) {
      parsed.dictionary = value;
      i++;
    } else if (args[i] === '--strategy' && value) {
      parsed.strategy = value;
      i++;
    } else if (args[i] === '--variant' && value) {
      parsed.variant = value;
      i++;
    } else {
      throw new ConfigurationError(`Unknown or incomplete option "${args[i]}"`);
    }
  }
  return parsed;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const logger = createLogger('bot', config.logLevel, new Console({ stdout: process.stderr, stderr: process.stderr }));

  if (!args.dictionary) throw new ConfigurationError('--dictionary is required');
  const spec = parsePlayerSpec(args.strategy);
  if (spec.kind !== 'strategy') throw new ConfigurationError(`"${args.strategy}" is not a strategy`);

  const variantPath = args.variant ?? config.variantPath;
  const variant = variantPath ? await loadVariant(variantPath) : STANDARD_VARIANT;
  const lexicon = await loadLexicon(args.dictionary);
  logger.info(`${lexicon.size} words, variant ${variant.name}, strategy ${spec.strategy}`);

  const player = new StrategyPlayer({ lexicon, variant, strategy: spec.strategy, logger: logger.child(spec.strategy) });
  await serveProtocol(player, process.stdin, process.stdout, { variant, logger });
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
  process.exit(1);
});
