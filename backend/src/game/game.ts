import type { ClientAction, GameEvent, Mode } from '@trump304/shared';
import { isMode } from '@trump304/shared';
import type { GameData, RulesOptions, SeatState } from './types.js';
import { DEFAULT_RULES } from './types.js';
import { GameError, type GameErrorCode } from './errors.js';
import { mulberry32, deriveSeed, randomSeed, pickOne } from './rng.js';
import { dealHand, redeal } from './hand.js';
import { validateBid, placeBid } from './bidding.js';
import { selectTrump, exchangeCards, skipExchange, voluntaryReveal, askTrump } from './trump.js';
import { playCard, validCardsFor } from './trick.js';

export interface CreateSessionOptions {
  code: string;
  mode: number;
  seed?: number;
  rules?: Partial<RulesOptions>;
}

// An inbound action from a seated player. `seq` is the actionSeq the
// client last saw; a mismatch means the action was built on stale state.
export interface ActionEnvelope {
  seat: number;
  action: ClientAction;
  seq?: number;
}

export interface TimeoutSignal {
  seat: number;
  seq: number;
}

export interface DispatchResult {
  state: GameData;
  events: GameEvent[];
  error?: GameErrorCode;
}

export function createSession(options: CreateSessionOptions): GameData {
  if (!isMode(options.mode)) {
    throw new GameError('InvalidMode');
  }
  const mode: Mode = options.mode;

  return {
    code: options.code,
    mode,
    phase: 'WAITING',
    rules: {
      ...DEFAULT_RULES,
      ...options.rules,
      cutPolicy: { ...DEFAULT_RULES.cutPolicy, ...options.rules?.cutPolicy },
    },
    seed: options.seed ?? randomSeed(),
    handNumber: 0,
    seats: [],
    dealerSeat: 0,
    centerPile: [],
    bids: [],
    currentBid: null,
    bidTurnSeat: null,
    trumperSeat: null,
    trump: null,
    exchangeDone: false,
    currentTrick: { cards: [], leadSuit: null },
    turnSeat: null,
    trickNumber: 0,
    captured: Array.from({ length: mode }, () => []),
    scores: Array.from({ length: mode }, () => 0),
    bonusTokens: Array.from({ length: mode }, () => 0),
    gamesPlayed: 0,
    lastHand: null,
    actionSeq: 0,
  };
}

// Seat a new player in the lowest free seat
export function addPlayer(game: GameData, playerId: string, name: string): GameErrorCode | null {
  if (game.phase !== 'WAITING') {
    return 'InvalidPhase';
  }
  if (game.seats.length >= game.mode) {
    return 'GameFull';
  }

  const taken = new Set(game.seats.map((s) => s.seat));
  let seat = 0;
  while (taken.has(seat)) seat++;

  game.seats.push({ seat, playerId, name, connected: true, hand: [] });
  game.seats.sort((a, b) => a.seat - b.seat);
  return null;
}

export function getSeatByPlayerId(game: GameData, playerId: string): SeatState | undefined {
  return game.seats.find((s) => s.playerId === playerId);
}

export function setConnected(game: GameData, seat: number, connected: boolean): void {
  const player = game.seats.find((s) => s.seat === seat);
  if (player) player.connected = connected;
}

// Seat expected to act next, if any
export function seatToAct(game: GameData): number | null {
  switch (game.phase) {
    case 'BIDDING':
      return game.bidTurnSeat;
    case 'TRUMP_SELECTION':
    case 'CARD_EXCHANGE':
      return game.trumperSeat;
    case 'PLAYING':
      return game.turnSeat;
    default:
      return null;
  }
}

// Which turn a timer should be armed for (bidding and play only)
export function turnInfo(game: GameData): TimeoutSignal | null {
  if (game.phase !== 'BIDDING' && game.phase !== 'PLAYING') return null;
  const seat = seatToAct(game);
  return seat === null ? null : { seat, seq: game.actionSeq };
}

function startGame(game: GameData, events: GameEvent[]): GameErrorCode | null {
  if (game.phase !== 'WAITING') {
    return 'InvalidPhase';
  }
  if (game.seats.length !== game.mode) {
    return 'NotEnoughPlayers';
  }

  const rng = mulberry32(deriveSeed(game.seed, 0));
  game.dealerSeat = Math.floor(rng() * game.mode);
  events.push({ event: 'game_started' });
  dealHand(game, events);
  return null;
}

function nextHand(game: GameData, events: GameEvent[]): GameErrorCode | null {
  if (game.phase !== 'SCORING') {
    return 'InvalidPhase';
  }
  redeal(game, events);
  return null;
}

function applyAction(game: GameData, seat: number, action: ClientAction, events: GameEvent[]): GameErrorCode | null {
  switch (action.action) {
    case 'start_game':
      return startGame(game, events);
    case 'bid':
    case 'pass': {
      const amount = action.action === 'bid' ? action.amount : null;
      const err = validateBid(game, seat, amount);
      if (err) return err;
      placeBid(game, seat, amount, events);
      return null;
    }
    case 'select_trump':
      return selectTrump(game, seat, action.suit, action.card, events);
    case 'exchange_cards':
      return exchangeCards(game, seat, action.cards, events);
    case 'skip_exchange':
      return skipExchange(game, seat, events);
    case 'play_card':
      return playCard(game, seat, action.card, events);
    case 'ask_trump':
      return askTrump(game, seat, events);
    case 'reveal_trump':
      return voluntaryReveal(game, seat, events);
    case 'next_hand':
      return nextHand(game, events);
    default: {
      const unhandled: never = action;
      return unhandled;
    }
  }
}

// Pure transition: never mutates `game`. Rejections return the same state object.
export function dispatch(game: GameData, envelope: ActionEnvelope): DispatchResult {
  if (envelope.seq !== undefined && envelope.seq !== game.actionSeq) {
    return { state: game, events: [], error: 'StaleAction' };
  }
  if (!game.seats.some((s) => s.seat === envelope.seat)) {
    return { state: game, events: [], error: 'PlayerNotFound' };
  }

  const draft = structuredClone(game);
  const events: GameEvent[] = [];
  const err = applyAction(draft, envelope.seat, envelope.action, events);
  if (err) {
    return { state: game, events: [], error: err };
  }

  draft.actionSeq++;
  return { state: draft, events };
}

// A turn timer fired. Anything but the exact turn it was armed for is a no-op.
export function applyTimeout(game: GameData, signal: TimeoutSignal): DispatchResult {
  const current = turnInfo(game);
  if (!current || current.seat !== signal.seat || current.seq !== signal.seq) {
    return { state: game, events: [], error: 'StaleAction' };
  }

  const draft = structuredClone(game);
  const events: GameEvent[] = [];

  if (draft.phase === 'BIDDING') {
    events.push({ event: 'turn_timeout', seat: signal.seat, action: 'pass', card: null, timeout: true });
    placeBid(draft, signal.seat, null, events);
  } else {
    const rng = mulberry32(deriveSeed(draft.seed, draft.handNumber, draft.actionSeq + 1));
    const card = pickOne(validCardsFor(draft, signal.seat), rng);
    if (!card) {
      return { state: game, events: [], error: 'StaleAction' };
    }
    events.push({ event: 'turn_timeout', seat: signal.seat, action: 'play_card', card: card.id, timeout: true });
    const err = playCard(draft, signal.seat, card.id, events);
    if (err) {
      return { state: game, events: [], error: err };
    }
  }

  draft.actionSeq++;
  return { state: draft, events };
}
