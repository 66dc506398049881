import { Type, type Static } from '@sinclair/typebox';

// Suit schema and type
export const SuitSchema = Type.Union([
  Type.Literal('hearts'),
  Type.Literal('diamonds'),
  Type.Literal('clubs'),
  Type.Literal('spades'),
]);
export type Suit = Static<typeof SuitSchema>;

// Rank schema and type
export const RankSchema = Type.Union([
  Type.Literal('7'),
  Type.Literal('8'),
  Type.Literal('Q'),
  Type.Literal('K'),
  Type.Literal('10'),
  Type.Literal('A'),
  Type.Literal('9'),
  Type.Literal('J'),
]);
export type Rank = Static<typeof RankSchema>;

// Card schema and type. `id` is the wire identity: `{rank}_{suit}`
export const CardSchema = Type.Object({
  id: Type.String(),
  suit: SuitSchema,
  rank: RankSchema,
});
export type Card = Static<typeof CardSchema>;

// Wire card id, e.g. "J_spades" or "10_hearts"
export const CardIdSchema = Type.String({
  pattern: '^(7|8|Q|K|10|A|9|J)_(hearts|diamonds|clubs|spades)$',
});

export const SUITS: readonly Suit[] = ['hearts', 'diamonds', 'clubs', 'spades'];

// Weakest to strongest: 7 < 8 < Q < K < 10 < A < 9 < J
export const RANKS: readonly Rank[] = ['7', '8', 'Q', 'K', '10', 'A', '9', 'J'];

// Point value of each rank. A full deck is worth 304.
export const RANK_POINTS: Record<Rank, number> = {
  'J': 30,
  '9': 20,
  'A': 11,
  '10': 10,
  'K': 3,
  'Q': 2,
  '8': 0,
  '7': 0,
};

// Trick-taking strength within a suit (higher = better).
// Follows points except that 8 beats 7.
export const RANK_STRENGTH: Record<Rank, number> = {
  '7': 0,
  '8': 1,
  'Q': 2,
  'K': 3,
  '10': 4,
  'A': 5,
  '9': 6,
  'J': 7,
};

export const DECK_SIZE = 32;
export const DECK_POINTS = 304;
