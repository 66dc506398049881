import type { Card, Suit, Rank } from '@trump304/shared';
import { SUITS, RANKS, RANK_POINTS, RANK_STRENGTH } from '@trump304/shared';
import type { TrickCard } from './types.js';

// Create a card with its wire id ("J_spades")
export function createCard(suit: Suit, rank: Rank): Card {
  return {
    id: `${rank}_${suit}`,
    suit,
    rank,
  };
}

function isSuit(value: string): value is Suit {
  return SUITS.some((s) => s === value);
}

function isRank(value: string): value is Rank {
  return RANKS.some((r) => r === value);
}

// Parse a wire id back into a card, undefined if malformed
export function parseCardId(id: string): Card | undefined {
  const sep = id.lastIndexOf('_');
  if (sep <= 0) return undefined;
  const rank = id.slice(0, sep);
  const suit = id.slice(sep + 1);
  if (!isRank(rank) || !isSuit(suit)) return undefined;
  return createCard(suit, rank);
}

export function cardPoints(card: Card): number {
  return RANK_POINTS[card.rank];
}

export function cardStrength(card: Card): number {
  return RANK_STRENGTH[card.rank];
}

export function handPoints(cards: readonly Card[]): number {
  return cards.reduce((sum, c) => sum + cardPoints(c), 0);
}

// Does `a` beat the current winner `b`? `b` is always either trumped or of the lead suit.
export function cardBeats(a: TrickCard, b: TrickCard, leadSuit: Suit): boolean {
  if (a.trumped !== b.trumped) {
    return a.trumped;
  }
  if (a.card.suit === b.card.suit) {
    return cardStrength(a.card) > cardStrength(b.card);
  }
  // Different suits, neither trumped - only the lead suit counts
  return a.card.suit === leadSuit && b.card.suit !== leadSuit;
}
