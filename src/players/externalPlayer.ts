import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { ProtocolError } from '../core/errors';
import { silentLogger, type Logger } from '../core/logger';
import type { Move, Tile } from '../core/types';
import { HELLO, parseResponse, renderRequest } from '../protocol/lineProtocol';
import type { Player } from './types';

/** The parts of a child process the player relies on. */
export interface ChildHandle {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
}

export type SpawnFn = (command: string, args: readonly string[]) => ChildHandle;

export const spawnProcess: SpawnFn = (command, args) => spawn(command, [...args], { stdio: ['pipe', 'pipe', 'pipe'] });

type Waiter = { resolve: (line: string) => void; reject: (err: ProtocolError) => void };

/** Queue of lines read from a stream, consumed one request at a time. */
export class LineReader {
  private readonly lines: string[] = [];
  private waiter: Waiter | null = null;
  private failure: ProtocolError | null = null;
  /** Timed-out reads whose reply has not shown up yet. */
  private owed = 0;

  constructor(
    input: Readable,
    private readonly onStale: (line: string) => void = () => {}
  ) {
    const rl = createInterface({ input, crlfDelay: Infinity });
    rl.on('line', (line) => this.push(line));
    rl.on('close', () => this.fail(new ProtocolError('output stream closed', { fatal: true })));
  }

  /** Next line within `timeoutMs`; rejects with a ProtocolError otherwise. */
  read(timeoutMs: number): Promise<string> {
    const queued = this.lines.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.failure) return Promise.reject(this.failure);

    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        this.owed += 1;
        reject(new ProtocolError(`no reply within ${timeoutMs} ms`));
      }, timeoutMs);
      this.waiter = {
        resolve: (line) => {
          clearTimeout(timer);
          resolve(line);
        },
        reject: (err) => {
          clearTimeout(timer);
          reject(err);
        }
      };
    });
  }

  /** Drops lines nobody asked for, such as extra replies to one request. */
  drain(): string[] {
    return this.lines.splice(0, this.lines.length);
  }

  /** First fatal error seen; later ones are ignored. */
  fail(err: ProtocolError): void {
    if (this.failure) return;
    this.failure = err;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.reject(err);
  }

  private push(line: string): void {
    if (this.owed > 0) {
      // the answer to a request that already timed out
      this.owed -= 1;
      this.onStale(line);
      return;
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve(line);
      return;
    }
    this.lines.push(line);
  }
}

export interface ExternalPlayerOptions {
  command: string;
  args?: readonly string[];
  name?: string;
  moveTimeoutMs?: number;
  handshakeTimeoutMs?: number;
  closeGraceMs?: number;
  spawn?: SpawnFn;
  logger?: Logger;
}

/**
 * Player backed by a child process speaking the line protocol on its
 * stdin/stdout. The process is spawned from an argument vector, never a shell.
 */
export class ExternalPlayer implements Player {
  readonly name: string;
  private readonly options: Required<Omit<ExternalPlayerOptions, 'name' | 'logger'>>;
  private readonly logger: Logger;
  private child: ChildHandle | null = null;
  private reader: LineReader | null = null;
  private exited = false;

  constructor(options: ExternalPlayerOptions) {
    this.name = options.name ?? [options.command, ...(options.args ?? [])].join(' ');
    this.logger = options.logger ?? silentLogger;
    this.options = {
      command: options.command,
      args: options.args ?? [],
      moveTimeoutMs: options.moveTimeoutMs ?? 10_000,
      handshakeTimeoutMs: options.handshakeTimeoutMs ?? 5_000,
      closeGraceMs: options.closeGraceMs ?? 1_000,
      spawn: options.spawn ?? spawnProcess
    };
  }

  /** Spawns the process and waits for its HELLO. Failures are fatal. */
  async start(): Promise<void> {
    if (this.child) throw new Error(`${this.name} already started`);

    let child: ChildHandle;
    try {
      child = this.options.spawn(this.options.command, this.options.args);
    } catch (err) {
      throw new ProtocolError(`cannot start ${this.options.command}: ${String(err)}`, { fatal: true, cause: err });
    }
    this.child = child;
    const reader = new LineReader(child.stdout, (line) => this.logger.warn('discarding late reply', line));
    this.reader = reader;

    child.once('exit', (code, signal) => {
      this.exited = true;
      reader.fail(new ProtocolError(`process exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})`, { fatal: true }));
    });
    child.once('error', (err) => {
      reader.fail(new ProtocolError(`process error: ${err.message}`, { fatal: true, cause: err }));
    });
    // Writes to a dead process surface here rather than at the write call.
    child.stdin.on('error', (err) => {
      reader.fail(new ProtocolError(`cannot write to process: ${err.message}`, { fatal: true, cause: err }));
    });
    if (child.stderr) {
      createInterface({ input: child.stderr, crlfDelay: Infinity }).on('line', (line) => {
        this.logger.debug('stderr:', line);
      });
    }

    let greeting: string;
    try {
      greeting = await reader.read(this.options.handshakeTimeoutMs);
    } catch (err) {
      if (err instanceof ProtocolError) {
        throw new ProtocolError(`handshake failed: ${err.message}`, { fatal: true, cause: err });
      }
      throw err;
    }
    if (greeting.trim() !== HELLO) {
      throw new ProtocolError(`expected ${HELLO}, got ${JSON.stringify(greeting)}`, { fatal: true });
    }
    this.logger.debug('handshake complete');
  }

  async requestMove(rack: readonly Tile[], opponentLastMove: Move | null): Promise<Move> {
    const { child, reader } = this;
    if (!child || !reader) throw new ProtocolError(`${this.name} is not running`, { fatal: true });

    const stale = reader.drain();
    if (stale.length > 0) this.logger.warn(`discarding ${stale.length} unrequested line(s)`, stale);

    const request = renderRequest(rack, opponentLastMove);
    this.logger.debug('>', request);
    child.stdin.write(`${request}\n`);

    const reply = await reader.read(this.options.moveTimeoutMs);
    this.logger.debug('<', reply);
    return parseResponse(reply);
  }

  /** Ends stdin, then kills the process if it has not exited within the grace period. */
  async close(): Promise<void> {
    const child = this.child;
    if (!child) return;
    this.child = null;
    this.reader = null;

    child.stdin.end();
    if (this.exited || child.exitCode !== null) return;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.logger.warn(`still running after ${this.options.closeGraceMs} ms, killing`);
        child.kill('SIGKILL');
        resolve();
      }, this.options.closeGraceMs);
      child.once('exit', () => {
        clearTimeout(timer);
        resolve();
      });
    });
  }
}
