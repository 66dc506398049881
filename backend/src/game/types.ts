import type { Card, Suit, GamePhase, HandResult, Mode, RevealReason } from '@trump304/shared';

export interface SeatState {
  readonly seat: number;
  readonly playerId: string;
  name: string;
  connected: boolean;
  hand: Card[];
}

export interface BidEntry {
  seat: number;
  amount: number | null; // null = pass
}

export interface PlacedBid {
  seat: number;
  amount: number;
}

export interface TrumpState {
  suit: Suit;
  card: Card; // face-down until revealed, then back in the trumper's hand
  revealed: boolean;
  revealReason: RevealReason | null;
}

export interface TrickCard {
  seat: number;
  card: Card;
  trumped: boolean; // trump-suit card played off-suit after the reveal
}

export interface TrickState {
  cards: TrickCard[];
  leadSuit: Suit | null;
}

// Preconditions for a non-trumper's cut request
export interface CutPolicy {
  requireTurn: boolean;
  requireVoidInLeadSuit: boolean;
}

export type IllegalPlayPolicy = 'reject' | 'forfeit';

export interface RulesOptions {
  illegalPlayPolicy: IllegalPlayPolicy;
  cutPolicy: CutPolicy;
}

export const DEFAULT_RULES: RulesOptions = {
  illegalPlayPolicy: 'reject',
  cutPolicy: { requireTurn: true, requireVoidInLeadSuit: true },
};

// Canonical session state. Plain data only: it is cloned on every
// dispatch and can be persisted as JSON between invocations.
export interface GameData {
  code: string;
  mode: Mode;
  phase: GamePhase;
  rules: RulesOptions;
  seed: number;
  handNumber: number;
  seats: SeatState[];
  dealerSeat: number;
  centerPile: Card[];

  bids: BidEntry[];
  currentBid: PlacedBid | null;
  bidTurnSeat: number | null;

  trumperSeat: number | null;
  trump: TrumpState | null;
  exchangeDone: boolean;

  currentTrick: TrickState;
  turnSeat: number | null;
  trickNumber: number;
  captured: Card[][]; // per seat, cards won in completed tricks

  scores: number[];
  bonusTokens: number[];
  gamesPlayed: number;
  lastHand: HandResult | null;

  actionSeq: number;
}
