#!/usr/bin/env tsx
/**
 * Play one match and print its result as JSON.
 *
 * Usage:
 *   tsx src/cli.ts --dictionary words.txt
 *   tsx src/cli.ts --dictionary words.txt --player1 max-score --player2 "exec:tsx src/bot.ts --dictionary words.txt"
 *   tsx src/cli.ts --dictionary words.txt --seed 42 --game-id g-1 --player1-id alice --player2-id bob
 *
 * Timeouts, the fault cap and the log level come from REFEREE_* variables.
 */

import { loadConfig } from './config';
import { ConfigurationError } from './core/errors';
import { createLogger } from './core/logger';
import { Referee } from './core/referee';
import { seededRandom } from './core/tiles';
import { loadVariant, STANDARD_VARIANT } from './core/variant';
import { loadLexicon } from './dictionary/lexicon';
import { createPlayer, parsePlayerSpec } from './players/factory';

interface CliArgs {
  dictionary?: string;
  players: [string, string];
  playerIds: [string | undefined, string | undefined];
  variant?: string;
  gameId?: string;
  seed?: number;
}

function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = { players: ['max-score', 'max-score'], playerIds: [undefined, undefined] };
  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    const value = args[i + 1];
    if (value === undefined) throw new ConfigurationError(`Missing value for ${flag}`);
    switch (flag) {
      case '--dictionary':
        parsed.dictionary = value;
        break;
      case '--player1':
        parsed.players[0] = value;
        break;
      case '--player2':
        parsed.players[1] = value;
        break;
      case '--player1-id':
        parsed.playerIds[0] = value;
        break;
      case '--player2-id':
        parsed.playerIds[1] = value;
        break;
      case '--variant':
        parsed.variant = value;
        break;
      case '--game-id':
        parsed.gameId = value;
        break;
      case '--seed':
        parsed.seed = parseInt(value, 10);
        if (Number.isNaN(parsed.seed)) throw new ConfigurationError(`--seed expects an integer, got "${value}"`);
        break;
      default:
        throw new ConfigurationError(`Unknown option "${flag}"`);
    }
    i++;
  }
  return parsed;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (!args.dictionary) throw new ConfigurationError('--dictionary is required');

  const config = loadConfig();
  // stdout is reserved for the result
  const logger = createLogger('referee', config.logLevel, {
    debug: console.error,
    info: console.error,
    warn: console.error,
    error: console.error
  });

  const variantPath = args.variant ?? config.variantPath;
  const variant = variantPath ? await loadVariant(variantPath) : STANDARD_VARIANT;
  const lexicon = await loadLexicon(args.dictionary);
  logger.info(`${lexicon.size} words, variant ${variant.name}`);

  const specs = [parsePlayerSpec(args.players[0]), parsePlayerSpec(args.players[1])] as const;
  const deps = { lexicon, variant, config, logger };
  const referee = new Referee([createPlayer(specs[0], deps), createPlayer(specs[1], deps)], {
    lexicon,
    variant,
    random: args.seed === undefined ? undefined : seededRandom(args.seed),
    gameId: args.gameId,
    playerIds: args.playerIds,
    maxConsecutiveFaults: config.maxConsecutiveFaults,
    logger
  });

  const result = await referee.run();
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
  process.exit(1);
});
