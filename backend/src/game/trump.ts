import type { GameEvent, RevealReason, Suit } from '@trump304/shared';
import { MAX_BID, MAX_EXCHANGE_CARDS } from '@trump304/shared';
import type { GameData, SeatState } from './types.js';
import type { GameErrorCode } from './errors.js';
import { nextSeat } from './teams.js';

function seatOf(game: GameData, seat: number): SeatState | undefined {
  return game.seats.find((s) => s.seat === seat);
}

function takeFromHand(player: SeatState, cardId: string): boolean {
  const index = player.hand.findIndex((c) => c.id === cardId);
  if (index === -1) return false;
  player.hand.splice(index, 1);
  return true;
}

// Trumper secretly picks a suit and lays one card of it face-down
export function selectTrump(
  game: GameData,
  seat: number,
  suit: Suit,
  cardId: string,
  events: GameEvent[],
): GameErrorCode | null {
  if (game.phase !== 'TRUMP_SELECTION') {
    return 'InvalidPhase';
  }
  if (game.trumperSeat !== seat) {
    return 'OutOfTurn';
  }

  const player = seatOf(game, seat);
  const card = player?.hand.find((c) => c.id === cardId);
  if (!player || !card || card.suit !== suit) {
    return 'InvalidTrumpCard';
  }

  takeFromHand(player, cardId);
  game.trump = { suit, card, revealed: false, revealReason: null };
  events.push({ event: 'trump_selected', seat });

  if (game.mode === 3) {
    game.phase = 'CARD_EXCHANGE';
  } else {
    startPlay(game, events);
  }
  return null;
}

function validateExchangeTurn(game: GameData, seat: number): GameErrorCode | null {
  if (game.mode !== 3 || game.phase !== 'CARD_EXCHANGE' || game.exchangeDone) {
    return 'ExchangeNotAllowed';
  }
  if (game.trumperSeat !== seat) {
    return 'OutOfTurn';
  }
  return null;
}

// 3 players: swap one or two hand cards for the top of the center pile
export function exchangeCards(
  game: GameData,
  seat: number,
  cardIds: readonly string[],
  events: GameEvent[],
): GameErrorCode | null {
  const err = validateExchangeTurn(game, seat);
  if (err) return err;

  const player = seatOf(game, seat);
  if (!player) return 'ExchangeNotAllowed';

  const unique = new Set(cardIds);
  if (cardIds.length === 0 || cardIds.length > MAX_EXCHANGE_CARDS || unique.size !== cardIds.length) {
    return 'ExchangeNotAllowed';
  }
  if (cardIds.length > game.centerPile.length) {
    return 'ExchangeNotAllowed';
  }
  const given = cardIds.map((id) => player.hand.find((c) => c.id === id));
  if (given.some((c) => c === undefined)) {
    return 'ExchangeNotAllowed';
  }

  const taken = game.centerPile.splice(0, cardIds.length);
  for (const id of cardIds) {
    takeFromHand(player, id);
  }
  player.hand.push(...taken);
  for (const card of given) {
    if (card) game.centerPile.push(card);
  }

  game.exchangeDone = true;
  events.push({ event: 'cards_exchanged', seat, count: cardIds.length });
  startPlay(game, events);
  return null;
}

export function skipExchange(game: GameData, seat: number, events: GameEvent[]): GameErrorCode | null {
  const err = validateExchangeTurn(game, seat);
  if (err) return err;

  game.exchangeDone = true;
  events.push({ event: 'exchange_skipped', seat });
  startPlay(game, events);
  return null;
}

// Turn the trump face-up. The card goes back into the trumper's hand.
function revealTrump(game: GameData, requester: number, reason: RevealReason, events: GameEvent[]): void {
  const trump = game.trump;
  if (!trump || trump.revealed || game.trumperSeat === null) return;

  trump.revealed = true;
  trump.revealReason = reason;
  seatOf(game, game.trumperSeat)?.hand.push(trump.card);

  events.push({
    event: 'trump_revealed',
    seat: requester,
    reason,
    suit: trump.suit,
    card: trump.card.id,
  });
}

// Trumper shows the trump of their own accord
export function voluntaryReveal(game: GameData, seat: number, events: GameEvent[]): GameErrorCode | null {
  if (game.phase !== 'PLAYING') {
    return 'InvalidPhase';
  }
  if (!game.trump || game.trump.revealed || game.trumperSeat !== seat) {
    return 'RevealNotAllowed';
  }
  revealTrump(game, seat, 'voluntary', events);
  return null;
}

// A non-trumper asks for the trump so they can cut
export function askTrump(game: GameData, seat: number, events: GameEvent[]): GameErrorCode | null {
  if (game.phase !== 'PLAYING') {
    return 'InvalidPhase';
  }
  if (!game.trump || game.trump.revealed || game.trumperSeat === seat) {
    return 'RevealNotAllowed';
  }

  const policy = game.rules.cutPolicy;
  if (policy.requireTurn && game.turnSeat !== seat) {
    return 'RevealNotAllowed';
  }
  if (policy.requireVoidInLeadSuit) {
    const leadSuit = game.currentTrick.leadSuit;
    const player = seatOf(game, seat);
    if (leadSuit === null || !player || player.hand.some((c) => c.suit === leadSuit)) {
      return 'RevealNotAllowed';
    }
  }

  revealTrump(game, seat, 'cut_request', events);
  return null;
}

// Hand the turn to `seat`. A trumper down to the face-down card has to reveal it.
export function giveTurn(game: GameData, seat: number, events: GameEvent[]): void {
  game.turnSeat = seat;
  if (seat === game.trumperSeat && game.trump && !game.trump.revealed) {
    if (seatOf(game, seat)?.hand.length === 0) {
      revealTrump(game, seat, 'last_card', events);
    }
  }
}

// First trick: trumper leads on a 304 bid, otherwise the seat left of the dealer
export function startPlay(game: GameData, events: GameEvent[]): void {
  game.phase = 'PLAYING';
  game.trickNumber = 1;
  game.currentTrick = { cards: [], leadSuit: null };

  const leader = game.currentBid?.amount === MAX_BID && game.trumperSeat !== null
    ? game.trumperSeat
    : nextSeat(game, game.dealerSeat);
  giveTurn(game, leader, events);
}
