/** Malformed wire-protocol line or move text. */
export class ParseError extends Error {
  constructor(message: string, readonly input?: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/** Well-formed move that breaks the rack, board or lexicon rules. */
export class IllegalMoveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IllegalMoveError';
  }
}

/**
 * External player misbehaved. `fatal` is set once the process can no longer
 * answer (closed stream, exit, failed handshake).
 */
export class ProtocolError extends Error {
  readonly fatal: boolean;

  constructor(message: string, options?: { fatal?: boolean; cause?: unknown }) {
    super(message);
    this.name = 'ProtocolError';
    this.fatal = options?.fatal ?? false;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/** Invalid configuration, variant or dictionary input. Fatal to the run. */
export class ConfigurationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
    if (cause !== undefined) this.cause = cause;
  }
}
