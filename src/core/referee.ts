import { IllegalMoveError, ParseError, ProtocolError } from './errors';
import { Game, otherSeat } from './game';
import { silentLogger, type Logger } from './logger';
import { passMove, renderMove } from './move';
import type { RandomSource, TileBag } from './tiles';
import type {
  Fault,
  FaultKind,
  GameHistoryEntry,
  GameResult,
  Move,
  PlayMove,
  PlayerResult,
  Seat,
  TerminationReason
} from './types';
import type { Variant } from './variant';
import type { Lexicon } from '../dictionary/lexicon';
import { encodeRack } from '../protocol/lineProtocol';
import type { Player } from '../players/types';

export type RefereePhase =
  | { state: 'awaiting-move'; seat: Seat }
  | { state: 'validating'; seat: Seat }
  | { state: 'applying'; seat: Seat }
  | { state: 'game-over'; reason: TerminationReason };

export type RefereeEvent =
  | { type: 'turn'; entry: GameHistoryEntry; scores: [number, number] }
  | { type: 'fault'; fault: Fault }
  | { type: 'game-over'; result: GameResult };

export interface RefereeOptions {
  lexicon: Lexicon;
  variant?: Variant;
  bag?: TileBag;
  random?: RandomSource;
  gameId?: string;
  playerIds?: [string | undefined, string | undefined];
  /** End the match with Forfeit once a seat faults this many turns in a row. */
  maxConsecutiveFaults?: number;
  logger?: Logger;
  onEvent?: (event: RefereeEvent) => void;
  clock?: () => number;
}

type TurnFault = ParseError | IllegalMoveError | ProtocolError;

function faultKind(err: TurnFault): FaultKind {
  if (err instanceof ParseError) return 'parse';
  if (err instanceof IllegalMoveError) return 'illegal-move';
  return 'protocol';
}

/** Anything a player throws becomes a fault; unknown errors count as protocol faults. */
function asTurnFault(err: unknown): TurnFault {
  if (err instanceof ParseError || err instanceof IllegalMoveError || err instanceof ProtocolError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ProtocolError(`player failed: ${message}`, { cause: err });
}

/**
 * Runs one match between two players. The referee alone mutates the game;
 * every move is validated here whatever the player claims.
 */
export class Referee {
  readonly game: Game;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly history: GameHistoryEntry[] = [];
  private readonly faults: Fault[] = [];
  private readonly faultCounts: [number, number] = [0, 0];
  private readonly consecutiveFaults: [number, number] = [0, 0];
  /** What each seat did last, as relayed to the other seat. */
  private readonly lastMoves: [Move | null, Move | null] = [null, null];
  private current: RefereePhase = { state: 'awaiting-move', seat: 0 };
  private result: GameResult | null = null;

  constructor(
    private readonly players: [Player, Player],
    private readonly options: RefereeOptions
  ) {
    this.game = new Game(options.lexicon, { variant: options.variant, bag: options.bag, random: options.random });
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? Date.now;
  }

  get phase(): RefereePhase {
    return this.current;
  }

  /** Plays the match to the end. Players are closed on every path out. */
  async run(): Promise<GameResult> {
    if (this.result) return this.result;
    try {
      await this.startPlayers();
      while (!this.game.isOver()) {
        await this.playTurn();
      }
      return this.finish();
    } finally {
      await this.closePlayers();
    }
  }

  private async startPlayers(): Promise<void> {
    for (const seat of [0, 1] as const) {
      const player = this.players[seat];
      if (!player.start) continue;
      try {
        await player.start();
      } catch (err) {
        const fault = asTurnFault(err);
        this.recordFault(seat, 0, fault);
        this.logger.error(`${player.name} failed to start, forfeiting seat ${seat}`);
        this.game.forfeit(seat);
        return;
      }
    }
  }

  private async playTurn(): Promise<void> {
    const seat = this.game.currentSeat;
    const turn = this.game.turnNumber + 1;
    const player = this.players[seat];
    const rack = this.game.getRack(seat);
    const rackText = encodeRack(rack);
    const startedAt = this.clock();

    this.current = { state: 'awaiting-move', seat };
    let move: Move;
    try {
      move = await player.requestMove(rack, this.lastMoves[otherSeat(seat)]);
    } catch (err) {
      this.handleFault(seat, turn, rackText, startedAt, asTurnFault(err));
      return;
    }

    if (move.kind === 'pass') {
      this.consecutiveFaults[seat] = 0;
      this.recordPass(seat, turn, rackText, startedAt);
      return;
    }

    this.current = { state: 'validating', seat };
    const check = this.game.checkMove(seat, move);
    if (!check.ok) {
      this.handleFault(seat, turn, rackText, startedAt, check.error);
      return;
    }

    this.current = { state: 'applying', seat };
    this.applyMove(seat, turn, rackText, startedAt, move);
  }

  private applyMove(seat: Seat, turn: number, rackText: string, startedAt: number, move: PlayMove): void {
    const result = this.game.placeMove(seat, move);
    if (!result.success) {
      // checkMove passed a moment ago on the same state
      throw new Error(`validated move was rejected: ${result.message ?? 'unknown reason'}`);
    }
    this.consecutiveFaults[seat] = 0;
    this.lastMoves[seat] = move;
    const entry: GameHistoryEntry = {
      type: 'MOVE',
      turn,
      seat,
      move: renderMove(move),
      rack: rackText,
      scoreDelta: result.scoreDelta ?? 0,
      words: result.words ?? [],
      placedTiles: result.placedTiles ?? 0,
      elapsedMs: this.clock() - startedAt
    };
    this.pushEntry(entry);
    this.logger.info(
      `turn ${turn}: ${this.players[seat].name} plays ${entry.move} for ${entry.scoreDelta} (${entry.words.join(', ')})`
    );
  }

  private recordPass(seat: Seat, turn: number, rackText: string, startedAt: number, fault?: FaultKind): void {
    this.lastMoves[seat] = passMove();
    this.game.passTurn(seat);
    this.pushEntry({
      type: 'PASS',
      turn,
      seat,
      rack: rackText,
      elapsedMs: this.clock() - startedAt,
      ...(fault ? { fault } : {})
    });
    if (!fault) this.logger.info(`turn ${turn}: ${this.players[seat].name} passes`);
  }

  private handleFault(seat: Seat, turn: number, rackText: string, startedAt: number, err: TurnFault): void {
    const kind = this.recordFault(seat, turn, err);
    this.consecutiveFaults[seat] += 1;
    const cap = this.options.maxConsecutiveFaults;

    if (err instanceof ProtocolError && err.fatal) {
      this.logger.error(`${this.players[seat].name} can no longer play, forfeiting seat ${seat}`);
      this.lastMoves[seat] = passMove();
      this.pushEntry({ type: 'PASS', turn, seat, rack: rackText, elapsedMs: this.clock() - startedAt, fault: kind });
      this.game.forfeit(seat);
      return;
    }
    if (cap !== undefined && this.consecutiveFaults[seat] >= cap) {
      this.logger.error(`${this.players[seat].name} reached ${cap} faults in a row, forfeiting seat ${seat}`);
      this.lastMoves[seat] = passMove();
      this.pushEntry({ type: 'PASS', turn, seat, rack: rackText, elapsedMs: this.clock() - startedAt, fault: kind });
      this.game.forfeit(seat);
      return;
    }
    this.recordPass(seat, turn, rackText, startedAt, kind);
  }

  private recordFault(seat: Seat, turn: number, err: TurnFault): FaultKind {
    const fault: Fault = { seat, turn, kind: faultKind(err), message: err.message };
    this.faults.push(fault);
    this.faultCounts[seat] += 1;
    this.logger.warn(`turn ${turn}: ${fault.kind} fault by ${this.players[seat].name}: ${fault.message}`);
    this.options.onEvent?.({ type: 'fault', fault });
    return fault.kind;
  }

  private pushEntry(entry: GameHistoryEntry): void {
    this.history.push(entry);
    this.options.onEvent?.({ type: 'turn', entry, scores: this.game.getScores() });
  }

  private finish(): GameResult {
    const reason = this.game.endReason ?? 'AllPassed';
    this.current = { state: 'game-over', reason };
    const ids = this.options.playerIds ?? [undefined, undefined];
    const players = ([0, 1] as const).map((seat): PlayerResult => ({
      seat,
      name: this.players[seat].name,
      ...(ids[seat] !== undefined ? { id: ids[seat] } : {}),
      score: this.game.getScore(seat),
      rack: encodeRack(this.game.getRack(seat)),
      faults: this.faultCounts[seat]
    }));
    const result: GameResult = {
      ...(this.options.gameId !== undefined ? { gameId: this.options.gameId } : {}),
      players: [players[0], players[1]],
      winner: this.game.winner(),
      reason,
      turns: this.history.length,
      history: [...this.history],
      faults: [...this.faults]
    };
    this.result = result;
    this.logger.info(
      `game over (${reason}): ${players.map((p) => `${p.name} ${p.score}`).join(' vs ')}, winner ${result.winner}`
    );
    this.logger.debug(() => `\n${this.game.board.toString()}`);
    this.options.onEvent?.({ type: 'game-over', result });
    return result;
  }

  private async closePlayers(): Promise<void> {
    const outcomes = await Promise.allSettled(this.players.map((player) => player.close?.()));
    outcomes.forEach((outcome, seat) => {
      if (outcome.status === 'rejected') {
        this.logger.warn(`closing ${this.players[seat].name} failed:`, outcome.reason);
      }
    });
  }
}
