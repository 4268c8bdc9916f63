import { z } from 'zod';
import type { RefereeConfig } from '../config';
import { ConfigurationError } from '../core/errors';
import { silentLogger, type Logger } from '../core/logger';
import type { Variant } from '../core/variant';
import type { Lexicon } from '../dictionary/lexicon';
import { ExternalPlayer, type SpawnFn } from './externalPlayer';
import { StrategyPlayer, STRATEGIES } from './strategyPlayer';
import type { Player } from './types';

export const playerSpecSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('strategy'),
    strategy: z.enum(STRATEGIES),
    name: z.string().min(1).optional()
  }),
  z.object({
    kind: z.literal('external'),
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    name: z.string().min(1).optional()
  })
]);

export type PlayerSpec = z.infer<typeof playerSpecSchema>;

export interface PlayerDeps {
  lexicon: Lexicon;
  variant: Variant;
  config: Pick<RefereeConfig, 'moveTimeoutMs' | 'handshakeTimeoutMs' | 'closeGraceMs'>;
  logger?: Logger;
  spawn?: SpawnFn;
}

/**
 * Command-line form of a player:
 * `max-score`, `strategy:min-score`, or `exec:<program> [args...]` (split on
 * whitespace, never run through a shell).
 */
export function parsePlayerSpec(text: string): PlayerSpec {
  const trimmed = text.trim();
  const colon = trimmed.indexOf(':');
  const kind = colon < 0 ? 'strategy' : trimmed.slice(0, colon);
  const rest = colon < 0 ? trimmed : trimmed.slice(colon + 1).trim();

  let candidate: unknown;
  if (kind === 'strategy') {
    candidate = { kind: 'strategy', strategy: rest };
  } else if (kind === 'exec') {
    const [command, ...args] = rest.split(/\s+/).filter(Boolean);
    candidate = { kind: 'external', command, args };
  } else {
    throw new ConfigurationError(`Unknown player kind "${kind}" in "${text}"`);
  }

  const parsed = playerSpecSchema.safeParse(candidate);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid player "${text}": ${details.join('; ')}`, parsed.error);
  }
  return parsed.data;
}

export function createPlayer(spec: PlayerSpec, deps: PlayerDeps): Player {
  const logger = deps.logger ?? silentLogger;
  switch (spec.kind) {
    case 'strategy':
      return new StrategyPlayer({
        lexicon: deps.lexicon,
        variant: deps.variant,
        strategy: spec.strategy,
        name: spec.name,
        logger: logger.child(spec.name ?? spec.strategy)
      });
    case 'external':
      return new ExternalPlayer({
        command: spec.command,
        args: spec.args,
        name: spec.name,
        moveTimeoutMs: deps.config.moveTimeoutMs,
        handshakeTimeoutMs: deps.config.handshakeTimeoutMs,
        closeGraceMs: deps.config.closeGraceMs,
        spawn: deps.spawn,
        logger: logger.child(spec.name ?? spec.command)
      });
  }
}
