import { z } from 'zod';
import { ConfigurationError } from './core/errors';
import { LOG_LEVELS, type LogLevel } from './core/logger';

// Unset and empty variables both fall back to the default.
const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const millis = (fallback: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  REFEREE_MOVE_TIMEOUT_MS: millis(10_000),
  REFEREE_HANDSHAKE_TIMEOUT_MS: millis(5_000),
  REFEREE_CLOSE_GRACE_MS: millis(1_000),
  REFEREE_MAX_CONSECUTIVE_FAULTS: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().optional()),
  REFEREE_LOG_LEVEL: z.preprocess(blankAsUndefined, z.enum(LOG_LEVELS).default('info')),
  REFEREE_VARIANT: z.preprocess(blankAsUndefined, z.string().optional())
});

export interface RefereeConfig {
  /** Longest wait for one reply from an external player. */
  moveTimeoutMs: number;
  handshakeTimeoutMs: number;
  /** Time an external player gets to exit after its input is closed. */
  closeGraceMs: number;
  maxConsecutiveFaults?: number;
  logLevel: LogLevel;
  variantPath?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RefereeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment: ${details.join('; ')}`, parsed.error);
  }
  const data = parsed.data;
  return {
    moveTimeoutMs: data.REFEREE_MOVE_TIMEOUT_MS,
    handshakeTimeoutMs: data.REFEREE_HANDSHAKE_TIMEOUT_MS,
    closeGraceMs: data.REFEREE_CLOSE_GRACE_MS,
    maxConsecutiveFaults: data.REFEREE_MAX_CONSECUTIVE_FAULTS,
    logLevel: data.REFEREE_LOG_LEVEL,
    variantPath: data.REFEREE_VARIANT
  };
}
