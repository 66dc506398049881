import type { Card, Suit } from '@trump304/shared';
import type { GameData, RulesOptions } from './types.js';
import { createSession, addPlayer } from './game.js';
import { parseCardId } from './card.js';

export function card(id: string): Card {
  const parsed = parseCardId(id);
  if (!parsed) throw new Error(`bad card id: ${id}`);
  return parsed;
}

export function cards(...ids: string[]): Card[] {
  return ids.map(card);
}

export function ids(list: readonly Card[]): string[] {
  return list.map((c) => c.id);
}

// Session with every seat taken, still WAITING. Player ids are p0, p1, ...
export function seatedGame(mode: number, options: { seed?: number; rules?: Partial<RulesOptions> } = {}): GameData {
  const game = createSession({ code: 'TEST01', mode, seed: options.seed ?? 1, rules: options.rules });
  for (let i = 0; i < game.mode; i++) {
    addPlayer(game, `p${i}`, `Player ${i}`);
  }
  return game;
}

export function setHands(game: GameData, hands: readonly (readonly string[])[]): void {
  for (const seat of game.seats) {
    seat.hand = cards(...(hands[seat.seat] ?? []));
  }
}

export interface PlayingSetup {
  hands: string[][];
  trumper: number;
  trumpCard: string;
  bid: number;
  revealed?: boolean;
  dealer?: number;
  turn?: number;
  centerPile?: string[];
  rules?: Partial<RulesOptions>;
}

// A hand already in PLAYING with trump chosen, first trick not yet started
export function playingGame(mode: number, setup: PlayingSetup): GameData {
  const game = seatedGame(mode, { rules: setup.rules });
  const trumpCard = card(setup.trumpCard);
  const suit: Suit = trumpCard.suit;
  const dealer = setup.dealer ?? game.mode - 1;
  const turn = setup.turn ?? (dealer + 1) % game.mode;

  setHands(game, setup.hands);
  game.phase = 'PLAYING';
  game.handNumber = 1;
  game.dealerSeat = dealer;
  game.bids = [{ seat: setup.trumper, amount: setup.bid }];
  game.currentBid = { seat: setup.trumper, amount: setup.bid };
  game.trumperSeat = setup.trumper;
  game.trump = {
    suit,
    card: trumpCard,
    revealed: setup.revealed ?? false,
    revealReason: setup.revealed ? 'voluntary' : null,
  };
  game.exchangeDone = game.mode === 3;
  game.centerPile = cards(...(setup.centerPile ?? []));
  game.currentTrick = { cards: [], leadSuit: null };
  game.turnSeat = turn;
  game.trickNumber = 1;
  return game;
}
