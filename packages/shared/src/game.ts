import { Type, type Static } from '@sinclair/typebox';
import { CardIdSchema, SuitSchema } from './card.js';
import { PlayerSchema, ModeSchema } from './player.js';

// Game phase enum
export const GamePhaseSchema = Type.Union([
  Type.Literal('WAITING'),
  Type.Literal('DEALING'),
  Type.Literal('BIDDING'),
  Type.Literal('TRUMP_SELECTION'),
  Type.Literal('CARD_EXCHANGE'),
  Type.Literal('PLAYING'),
  Type.Literal('SCORING'),
]);
export type GamePhase = Static<typeof GamePhaseSchema>;

// A bid or a pass (amount = null)
export const BidInfoSchema = Type.Object({
  seat: Type.Number(),
  amount: Type.Union([Type.Number(), Type.Null()]),
});
export type BidInfo = Static<typeof BidInfoSchema>;

// A card played into the current trick
export const TrickCardInfoSchema = Type.Object({
  seat: Type.Number(),
  card: CardIdSchema,
});
export type TrickCardInfo = Static<typeof TrickCardInfoSchema>;

export const RevealReasonSchema = Type.Union([
  Type.Literal('voluntary'),
  Type.Literal('cut_request'),
  Type.Literal('last_card'),
]);
export type RevealReason = Static<typeof RevealReasonSchema>;

// Outcome of the last finished hand
export const HandResultSchema = Type.Object({
  outcome: Type.Union([Type.Literal('won'), Type.Literal('lost'), Type.Literal('forfeit')]),
  bid: Type.Number(),
  trumper_seat: Type.Number(),
  trumper_points: Type.Number(),
  opposing_points: Type.Number(),
  points_awarded: Type.Number(),
  awarded_seats: Type.Array(Type.Number()),
  bonus_tokens: Type.Number(),
  offender_seat: Type.Optional(Type.Number()),
});
export type HandResult = Static<typeof HandResultSchema>;

export const TeamPointsSchema = Type.Object({
  trumper: Type.Number(),
  opposing: Type.Number(),
});
export type TeamPoints = Static<typeof TeamPointsSchema>;

// Full game state as seen by one seat (sent to clients)
export const GameStateViewSchema = Type.Object({
  game_code: Type.String(),
  mode: ModeSchema,
  phase: GamePhaseSchema,
  players: Type.Array(PlayerSchema),
  dealer_seat: Type.Number(),
  your_seat: Type.Number(),
  your_hand: Type.Array(CardIdSchema),
  bids: Type.Array(BidInfoSchema),
  current_bid: Type.Union([BidInfoSchema, Type.Null()]),
  bid_turn_seat: Type.Union([Type.Number(), Type.Null()]),
  trumper_seat: Type.Union([Type.Number(), Type.Null()]),
  trump_revealed: Type.Boolean(),
  trump_suit: Type.Optional(SuitSchema),
  trump_card: Type.Optional(CardIdSchema),
  current_trick: Type.Array(TrickCardInfoSchema),
  turn_seat: Type.Union([Type.Number(), Type.Null()]),
  trick_number: Type.Number(),
  valid_cards: Type.Array(CardIdSchema),
  team_tricks_points: TeamPointsSchema,
  center_pile_count: Type.Number(),
  scores: Type.Record(Type.String(), Type.Number()),
  bonus_tokens: Type.Record(Type.String(), Type.Number()),
  games_played: Type.Number(),
  action_seq: Type.Number(),
  last_hand: Type.Union([HandResultSchema, Type.Null()]),
});
export type GameStateView = Static<typeof GameStateViewSchema>;

// Bidding limits
export const MIN_BID = 150;
export const MAX_BID = 304;
export const BID_STEP = 10;
// From this amount on, re-bids and partner overbids are allowed
export const SPECIAL_BID_THRESHOLD = 200;

// Cards the trumper may swap with the center pile (3 players)
export const MAX_EXCHANGE_CARDS = 2;

// Bonus tokens awarded to the wronged team on an illegal play
export const VIOLATION_BONUS_TOKENS = 2;

export const TURN_TIMEOUT_MS = 30_000;
