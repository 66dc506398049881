import type { GameEvent } from '@trump304/shared';
import type { GameData } from './types.js';
import { newDeck, shuffle, deal } from './deck.js';
import { mulberry32, deriveSeed } from './rng.js';
import { startBidding } from './bidding.js';

// Clear everything that belongs to a single hand
function resetHand(game: GameData): void {
  game.bids = [];
  game.currentBid = null;
  game.bidTurnSeat = null;
  game.trumperSeat = null;
  game.trump = null;
  game.exchangeDone = false;
  game.currentTrick = { cards: [], leadSuit: null };
  game.turnSeat = null;
  game.trickNumber = 0;
  game.captured = game.seats.map(() => []);
  game.centerPile = [];
}

// Shuffle, deal and open the bidding for a new hand
export function dealHand(game: GameData, events: GameEvent[]): void {
  resetHand(game);
  game.handNumber++;
  game.phase = 'DEALING';

  const rng = mulberry32(deriveSeed(game.seed, game.handNumber));
  const { hands, centerPile } = deal(shuffle(newDeck(), rng), game.mode, game.dealerSeat);
  for (const seat of game.seats) {
    seat.hand = hands[seat.seat];
  }
  game.centerPile = centerPile;

  events.push({ event: 'hand_dealt', dealer_seat: game.dealerSeat, hand_number: game.handNumber });
  startBidding(game);
}

// Move the deal one seat clockwise and deal again
export function redeal(game: GameData, events: GameEvent[]): void {
  game.dealerSeat = (game.dealerSeat + 1) % game.mode;
  dealHand(game, events);
}
