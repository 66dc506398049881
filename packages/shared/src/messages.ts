import { Type, type Static } from '@sinclair/typebox';
import { CardIdSchema, SuitSchema } from './card.js';
import { PlayerSchema } from './player.js';
import { GameStateViewSchema, HandResultSchema, RevealReasonSchema } from './game.js';

// ============================================
// Client -> Server Messages
// ============================================

export const StartGameMessage = Type.Object({
  action: Type.Literal('start_game'),
});

export const BidMessage = Type.Object({
  action: Type.Literal('bid'),
  amount: Type.Integer(),
});

export const PassMessage = Type.Object({
  action: Type.Literal('pass'),
});

export const SelectTrumpMessage = Type.Object({
  action: Type.Literal('select_trump'),
  suit: SuitSchema,
  card: CardIdSchema,
});

export const ExchangeCardsMessage = Type.Object({
  action: Type.Literal('exchange_cards'),
  cards: Type.Array(CardIdSchema),
});

export const SkipExchangeMessage = Type.Object({
  action: Type.Literal('skip_exchange'),
});

export const PlayCardMessage = Type.Object({
  action: Type.Literal('play_card'),
  card: CardIdSchema,
});

export const AskTrumpMessage = Type.Object({
  action: Type.Literal('ask_trump'),
});

export const RevealTrumpMessage = Type.Object({
  action: Type.Literal('reveal_trump'),
});

export const NextHandMessage = Type.Object({
  action: Type.Literal('next_hand'),
});

// Union of all client actions
export const ClientActionSchema = Type.Union([
  StartGameMessage,
  BidMessage,
  PassMessage,
  SelectTrumpMessage,
  ExchangeCardsMessage,
  SkipExchangeMessage,
  PlayCardMessage,
  AskTrumpMessage,
  RevealTrumpMessage,
  NextHandMessage,
]);
export type ClientAction = Static<typeof ClientActionSchema>;

// What actually travels over the socket: an action plus the sequence
// number of the state the client acted on
export const ClientMessageSchema = Type.Intersect([
  ClientActionSchema,
  Type.Object({ seq: Type.Optional(Type.Integer({ minimum: 0 })) }),
]);
export type ClientMessage = Static<typeof ClientMessageSchema>;

// ============================================
// Server -> Client Messages
// ============================================

export const GameStartedEvent = Type.Object({
  event: Type.Literal('game_started'),
});

export const HandDealtEvent = Type.Object({
  event: Type.Literal('hand_dealt'),
  dealer_seat: Type.Number(),
  hand_number: Type.Number(),
});

export const BidPlacedEvent = Type.Object({
  event: Type.Literal('bid_placed'),
  seat: Type.Number(),
  amount: Type.Union([Type.Number(), Type.Null()]),
});

export const BiddingCompleteEvent = Type.Object({
  event: Type.Literal('bidding_complete'),
  trumper_seat: Type.Number(),
  bid: Type.Number(),
  forced: Type.Boolean(),
});

export const TrumpSelectedEvent = Type.Object({
  event: Type.Literal('trump_selected'),
  seat: Type.Number(),
});

export const CardsExchangedEvent = Type.Object({
  event: Type.Literal('cards_exchanged'),
  seat: Type.Number(),
  count: Type.Number(),
});

export const ExchangeSkippedEvent = Type.Object({
  event: Type.Literal('exchange_skipped'),
  seat: Type.Number(),
});

export const TrumpRevealedEvent = Type.Object({
  event: Type.Literal('trump_revealed'),
  seat: Type.Number(),
  reason: RevealReasonSchema,
  suit: SuitSchema,
  card: CardIdSchema,
});

export const CardPlayedEvent = Type.Object({
  event: Type.Literal('card_played'),
  seat: Type.Number(),
  card: CardIdSchema,
  trumped: Type.Boolean(),
});

export const TrickWonEvent = Type.Object({
  event: Type.Literal('trick_won'),
  winner_seat: Type.Number(),
  points: Type.Number(),
  trick_number: Type.Number(),
});

// 2 players: who drew from the center pile (cards stay private)
export const CardsDrawnEvent = Type.Object({
  event: Type.Literal('cards_drawn'),
  seats: Type.Array(Type.Number()),
  center_pile_count: Type.Number(),
});

export const HandScoredEvent = Type.Object({
  event: Type.Literal('hand_scored'),
  result: HandResultSchema,
  scores: Type.Record(Type.String(), Type.Number()),
});

export const HandSpoiltEvent = Type.Object({
  event: Type.Literal('hand_spoilt'),
  trumper_seat: Type.Number(),
  trump_suit: SuitSchema,
  dealer_seat: Type.Number(),
});

export const RuleViolationEvent = Type.Object({
  event: Type.Literal('rule_violation'),
  seat: Type.Number(),
  card: CardIdSchema,
});

export const TurnTimeoutEvent = Type.Object({
  event: Type.Literal('turn_timeout'),
  seat: Type.Number(),
  action: Type.Union([Type.Literal('pass'), Type.Literal('play_card')]),
  card: Type.Union([CardIdSchema, Type.Null()]),
  timeout: Type.Literal(true),
});

// Everything the rules engine can emit
export const GameEventSchema = Type.Union([
  GameStartedEvent,
  HandDealtEvent,
  BidPlacedEvent,
  BiddingCompleteEvent,
  TrumpSelectedEvent,
  CardsExchangedEvent,
  ExchangeSkippedEvent,
  TrumpRevealedEvent,
  CardPlayedEvent,
  TrickWonEvent,
  CardsDrawnEvent,
  HandScoredEvent,
  HandSpoiltEvent,
  RuleViolationEvent,
  TurnTimeoutEvent,
]);
export type GameEvent = Static<typeof GameEventSchema>;

export const GameStateMessage = Type.Composite([
  Type.Object({ event: Type.Literal('game_state') }),
  GameStateViewSchema,
]);

export const PlayerJoinedMessage = Type.Object({
  event: Type.Literal('player_joined'),
  player: PlayerSchema,
});

export const PlayerLeftMessage = Type.Object({
  event: Type.Literal('player_left'),
  seat: Type.Number(),
});

export const ErrorMessage = Type.Object({
  error: Type.String(),
  code: Type.String(),
});

// Union of all server messages
export const ServerMessageSchema = Type.Union([
  GameEventSchema,
  GameStateMessage,
  PlayerJoinedMessage,
  PlayerLeftMessage,
  ErrorMessage,
]);
export type ServerMessage = Static<typeof ServerMessageSchema>;
