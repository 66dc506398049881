import { randomUUID } from 'node:crypto';
import type { ClientMessage, GameEvent, GamePhase, Player as PlayerInfo, ServerMessage } from '@trump304/shared';
import type { GameData, RulesOptions } from '../game/types.js';
import { GameErrors, type GameErrorCode } from '../game/errors.js';
import {
  createSession, addPlayer, getSeatByPlayerId, setConnected,
  dispatch, applyTimeout, turnInfo, type DispatchResult, type TimeoutSignal,
} from '../game/game.js';
import { toGameStateView, toPlayerInfo } from '../game/view.js';
import type { TurnScheduler, TimerToken } from './timer.js';
import { log } from '../utils/logger.js';

// Delivers a message to one player, wherever they are connected
export interface Broadcaster {
  send(playerId: string, message: ServerMessage): void;
}

export interface RoomOptions {
  code: string;
  mode: number;
  seed?: number;
  rules?: Partial<RulesOptions>;
  turnTimeoutMs: number;
  scheduler: TurnScheduler;
  broadcaster: Broadcaster;
  now?: () => number;
}

export type JoinResult =
  | { ok: true; player: PlayerInfo }
  | { ok: false; error: GameErrorCode };

interface ArmedTimer {
  signal: TimeoutSignal;
  phase: GamePhase;
  token: TimerToken;
}

export class Room {
  readonly code: string;
  private state: GameData;
  private queue: Promise<void> = Promise.resolve();
  private timer: ArmedTimer | null = null;
  private closed = false;
  private readonly turnTimeoutMs: number;
  private readonly scheduler: TurnScheduler;
  private readonly broadcaster: Broadcaster;
  private readonly now: () => number;
  readonly createdAt: number;
  private lastActive: number;

  constructor(options: RoomOptions) {
    this.code = options.code;
    this.state = createSession({
      code: options.code,
      mode: options.mode,
      seed: options.seed,
      rules: options.rules,
    });
    this.turnTimeoutMs = options.turnTimeoutMs;
    this.scheduler = options.scheduler;
    this.broadcaster = options.broadcaster;
    this.now = options.now ?? Date.now;
    this.createdAt = this.now();
    this.lastActive = this.createdAt;
  }

  // Current canonical state. Treat as read-only.
  get game(): GameData {
    return this.state;
  }

  get mode(): number {
    return this.state.mode;
  }

  playerCount(): number {
    return this.state.seats.length;
  }

  players(): PlayerInfo[] {
    return this.state.seats.map(toPlayerInfo);
  }

  getPlayer(playerId: string): PlayerInfo | undefined {
    const seat = getSeatByPlayerId(this.state, playerId);
    return seat ? toPlayerInfo(seat) : undefined;
  }

  hasConnectedSeats(): boolean {
    return this.state.seats.some((s) => s.connected);
  }

  // Last join, player action or connection change. Timeouts do not count.
  get lastActiveAt(): number {
    return this.lastActive;
  }

  join(name: string): Promise<JoinResult> {
    return this.enqueue<JoinResult>(() => {
      const draft = structuredClone(this.state);
      const playerId = randomUUID();
      const err = addPlayer(draft, playerId, name);
      if (err) {
        log.room.warn(`Join rejected in room ${this.code}`, { name, error: err });
        return { ok: false, error: err };
      }

      this.state = draft;
      this.lastActive = this.now();
      const seat = getSeatByPlayerId(draft, playerId);
      if (!seat) {
        return { ok: false, error: 'PlayerNotFound' };
      }
      const player = toPlayerInfo(seat);
      log.room.info(`${name} joined room ${this.code}`, { seat: player.seat, players: draft.seats.length });

      this.broadcast({ event: 'player_joined', player });
      this.publishViews();
      return { ok: true, player };
    });
  }

  // Apply a client message from `playerId`. Resolves to the rejection code, if any.
  submit(playerId: string, message: ClientMessage): Promise<GameErrorCode | null> {
    return this.enqueue<GameErrorCode | null>(() => {
      const seat = getSeatByPlayerId(this.state, playerId);
      if (!seat) {
        this.sendError(playerId, 'PlayerNotFound');
        return 'PlayerNotFound';
      }

      const result = dispatch(this.state, { seat: seat.seat, action: message, seq: message.seq });
      if (result.error) {
        log.room.debug(`Rejected ${message.action} from seat ${seat.seat} in room ${this.code}`, {
          error: result.error,
          seq: message.seq,
          actionSeq: this.state.actionSeq,
        });
        this.sendError(playerId, result.error);
        return result.error;
      }

      log.room.debug(`Seat ${seat.seat} ${message.action} in room ${this.code}`, { actionSeq: result.state.actionSeq });
      this.lastActive = this.now();
      this.commit(result, seat.seat);
      return null;
    });
  }

  // Timer callback. Stale signals fall through as no-ops.
  timeout(signal: TimeoutSignal): Promise<GameErrorCode | null> {
    return this.enqueue<GameErrorCode | null>(() => {
      if (this.timer && this.timer.signal.seq === signal.seq && this.timer.signal.seat === signal.seat) {
        this.timer = null;
      }

      const result = applyTimeout(this.state, signal);
      if (result.error) {
        log.room.debug(`Discarded stale timeout in room ${this.code}`, { ...signal });
        return result.error;
      }

      log.room.info(`Seat ${signal.seat} timed out in room ${this.code}`, { phase: this.state.phase });
      this.commit(result, signal.seat);
      return null;
    });
  }

  setConnected(playerId: string, connected: boolean): Promise<void> {
    return this.enqueue(() => {
      const seat = getSeatByPlayerId(this.state, playerId);
      if (!seat || seat.connected === connected) return;

      const draft = structuredClone(this.state);
      setConnected(draft, seat.seat, connected);
      this.state = draft;
      this.lastActive = this.now();
      log.room.info(`Seat ${seat.seat} ${connected ? 'reconnected' : 'disconnected'} in room ${this.code}`);

      if (!connected) {
        this.broadcast({ event: 'player_left', seat: seat.seat });
      }
      this.publishViews();
    });
  }

  // Push the current projection to a single player (used on connect)
  sendState(playerId: string): void {
    const seat = getSeatByPlayerId(this.state, playerId);
    if (!seat) return;
    this.broadcaster.send(playerId, { event: 'game_state', ...toGameStateView(this.state, seat.seat) });
  }

  // Resolves once everything queued so far has run
  drain(): Promise<void> {
    return this.enqueue(() => undefined);
  }

  close(): void {
    this.closed = true;
    this.disarm();
  }

  private enqueue<T>(task: () => T): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      (err: unknown) => {
        log.room.error(`Task failed in room ${this.code}`, { error: String(err) });
      },
    );
    return run;
  }

  private commit(result: DispatchResult, actor: number): void {
    this.state = result.state;
    for (const event of result.events) {
      this.logEvent(event);
      this.broadcast(event);
    }
    this.publishViews();
    this.syncTimer(actor);
  }

  private logEvent(event: GameEvent): void {
    switch (event.event) {
      case 'hand_scored':
        log.game.info(`Hand scored in room ${this.code}`, { ...event.result });
        break;
      case 'hand_spoilt':
        log.game.info(`Spoilt trump in room ${this.code}, redealing`, { trumper: event.trumper_seat });
        break;
      case 'rule_violation':
        log.game.warn(`Rule violation in room ${this.code}`, { seat: event.seat, card: event.card });
        break;
    }
  }

  private broadcast(message: ServerMessage): void {
    for (const seat of this.state.seats) {
      if (seat.connected) this.broadcaster.send(seat.playerId, message);
    }
  }

  private publishViews(): void {
    for (const seat of this.state.seats) {
      if (seat.connected) {
        this.broadcaster.send(seat.playerId, { event: 'game_state', ...toGameStateView(this.state, seat.seat) });
      }
    }
  }

  private sendError(playerId: string, code: GameErrorCode): void {
    this.broadcaster.send(playerId, { error: GameErrors[code], code });
  }

  // Keep exactly one timer armed for the seat currently to act. The deadline
  // restarts only when that seat acted or the turn moved on.
  private syncTimer(actor: number): void {
    const next = turnInfo(this.state);
    const timer = this.timer;
    if (timer && next && timer.signal.seat === next.seat && timer.phase === this.state.phase && actor !== next.seat) {
      timer.signal.seq = next.seq;
      return;
    }
    this.disarm();
    if (!next || this.closed) return;

    const signal: TimeoutSignal = { ...next };
    const token = this.scheduler.arm(this.turnTimeoutMs, () => {
      this.timeout({ ...signal }).catch((err: unknown) => {
        log.room.error(`Timeout handling failed in room ${this.code}`, { error: String(err) });
      });
    });
    this.timer = { signal, phase: this.state.phase, token };
  }

  private disarm(): void {
    if (this.timer) {
      this.scheduler.cancel(this.timer.token);
      this.timer = null;
    }
  }
}
