import type { Card } from '@trump304/shared';
import { SUITS, RANKS, CARDS_PER_SEAT, isMode } from '@trump304/shared';
import { createCard } from './card.js';
import { GameError } from './errors.js';
import type { Rng } from './rng.js';

export interface DealResult {
  hands: Card[][]; // indexed by seat
  centerPile: Card[]; // index 0 is the top card
}

// Create the 32-card deck (7-8-Q-K-10-A-9-J in all suits)
export function newDeck(): Card[] {
  const cards: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      cards.push(createCard(suit, rank));
    }
  }
  return cards;
}

// Fisher-Yates shuffle into a new array
export function shuffle<T>(cards: readonly T[], rng: Rng): T[] {
  const a = [...cards];
  for (let i = a.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}

// Deal in batches of four, starting left of the dealer.
// Whatever is left over becomes the face-down center pile.
export function deal(deck: readonly Card[], mode: number, dealerSeat: number): DealResult {
  if (!isMode(mode)) {
    throw new GameError('InvalidMode');
  }

  const hands: Card[][] = Array.from({ length: mode }, () => []);
  const order = Array.from({ length: mode }, (_, i) => (dealerSeat + 1 + i) % mode);
  const batches = CARDS_PER_SEAT[mode] / 4;

  let next = 0;
  for (let b = 0; b < batches; b++) {
    for (const seat of order) {
      hands[seat].push(...deck.slice(next, next + 4));
      next += 4;
    }
  }

  return { hands, centerPile: deck.slice(next) };
}
