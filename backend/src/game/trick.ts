import type { Card, GameEvent } from '@trump304/shared';
import type { GameData, SeatState, TrickCard } from './types.js';
import type { GameErrorCode } from './errors.js';
import { cardBeats, handPoints } from './card.js';
import { nextSeat } from './teams.js';
import { giveTurn } from './trump.js';
import { isSpoilt, scoreHand, forfeitHand, spoilHand } from './scoring.js';

function seatOf(game: GameData, seat: number): SeatState | undefined {
  return game.seats.find((s) => s.seat === seat);
}

// Cards `seat` may legally play right now. Derived, never stored.
export function validCardsFor(game: GameData, seat: number): Card[] {
  if (game.phase !== 'PLAYING') return [];
  const hand = seatOf(game, seat)?.hand ?? [];
  const leadSuit = game.currentTrick.leadSuit;
  if (leadSuit === null) return [...hand];

  // Must follow suit if possible, otherwise anything goes
  const following = hand.filter((c) => c.suit === leadSuit);
  return following.length > 0 ? following : [...hand];
}

// Play a card into the current trick
export function playCard(game: GameData, seat: number, cardId: string, events: GameEvent[]): GameErrorCode | null {
  if (game.phase !== 'PLAYING') {
    return 'InvalidPhase';
  }
  if (game.turnSeat !== seat) {
    return 'OutOfTurn';
  }

  const player = seatOf(game, seat);
  const card = player?.hand.find((c) => c.id === cardId);
  if (!player || !card) {
    return 'IllegalCard';
  }

  const legal = validCardsFor(game, seat).some((c) => c.id === cardId);
  if (!legal) {
    if (game.rules.illegalPlayPolicy !== 'forfeit') {
      return 'IllegalCard';
    }
    // Committed anyway: the card hits the table and the hand is forfeited
    commitCard(game, player, card);
    forfeitHand(game, seat, card, events);
    return null;
  }

  const played = commitCard(game, player, card);
  events.push({ event: 'card_played', seat, card: card.id, trumped: played.trumped });

  if (game.currentTrick.cards.length === game.mode) {
    resolveTrick(game, events);
  } else {
    giveTurn(game, nextSeat(game, seat), events);
  }
  return null;
}

function commitCard(game: GameData, player: SeatState, card: Card): TrickCard {
  player.hand = player.hand.filter((c) => c.id !== card.id);

  const trick = game.currentTrick;
  if (trick.leadSuit === null) {
    trick.leadSuit = card.suit;
  }

  // Only a revealed trump has power, and only when it is not the suit led
  const trumped = game.trump !== null
    && game.trump.revealed
    && card.suit === game.trump.suit
    && card.suit !== trick.leadSuit;

  const played: TrickCard = { seat: player.seat, card, trumped };
  trick.cards.push(played);
  return played;
}

// Winner of a complete trick
export function trickWinner(cards: readonly TrickCard[]): TrickCard | undefined {
  const [first, ...rest] = cards;
  if (!first) return undefined;
  let winner = first;
  for (const tc of rest) {
    if (cardBeats(tc, winner, first.card.suit)) {
      winner = tc;
    }
  }
  return winner;
}

// Remaining cards to be played this hand, the face-down trump included
function cardsOutstanding(game: GameData): number {
  const inHands = game.seats.reduce((sum, s) => sum + s.hand.length, 0);
  const faceDown = game.trump && !game.trump.revealed ? 1 : 0;
  const toDraw = game.mode === 2 ? game.centerPile.length : 0;
  return inHands + faceDown + toDraw;
}

function resolveTrick(game: GameData, events: GameEvent[]): void {
  const winner = trickWinner(game.currentTrick.cards);
  if (!winner) return;

  const cards = game.currentTrick.cards.map((tc) => tc.card);
  game.captured[winner.seat].push(...cards);
  events.push({
    event: 'trick_won',
    winner_seat: winner.seat,
    points: handPoints(cards),
    trick_number: game.trickNumber,
  });
  game.currentTrick = { cards: [], leadSuit: null };

  if (isSpoilt(game)) {
    spoilHand(game, events);
    return;
  }

  if (game.mode === 2 && game.centerPile.length > 0) {
    drawFromCenter(game, winner.seat, events);
  }

  if (cardsOutstanding(game) === 0) {
    scoreHand(game, events);
    return;
  }

  game.trickNumber++;
  giveTurn(game, winner.seat, events);
}

// 2 players: winner draws first, then the other seat, while the pile lasts
function drawFromCenter(game: GameData, winnerSeat: number, events: GameEvent[]): void {
  const drawn: number[] = [];
  for (const seat of [winnerSeat, nextSeat(game, winnerSeat)]) {
    const card = game.centerPile.shift();
    if (!card) break;
    seatOf(game, seat)?.hand.push(card);
    drawn.push(seat);
  }
  events.push({ event: 'cards_drawn', seats: drawn, center_pile_count: game.centerPile.length });
}
