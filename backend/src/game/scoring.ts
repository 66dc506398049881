import type { Card, GameEvent, HandResult, TeamPoints } from '@trump304/shared';
import { MAX_BID, SPECIAL_BID_THRESHOLD, VIOLATION_BONUS_TOKENS } from '@trump304/shared';
import type { GameData } from './types.js';
import { handPoints } from './card.js';
import { trumperTeam, opposingTeam, opponentsOf } from './teams.js';
import { redeal } from './hand.js';

const TRUMP_SUIT_SIZE = 8;

// Points for making the bid / points conceded to the other side for failing it
export function scoringTier(bid: number): { win: number; lose: number } {
  if (bid >= MAX_BID) return { win: 10, lose: 7 };
  if (bid >= SPECIAL_BID_THRESHOLD) return { win: 6, lose: 5 };
  return { win: 5, lose: 3 };
}

// Card points held by each side so far. With 3 players the center pile left
// after the exchange belongs to the defenders.
export function teamTrickPoints(game: GameData): TeamPoints {
  const team = trumperTeam(game);
  let trumper = 0;
  let opposing = game.mode === 3 && game.exchangeDone ? handPoints(game.centerPile) : 0;
  game.captured.forEach((cards, seat) => {
    if (team.includes(seat)) {
      trumper += handPoints(cards);
    } else {
      opposing += handPoints(cards);
    }
  });
  return { trumper, opposing };
}

// All eight trump-suit cards captured by the trumper's own side
export function isSpoilt(game: GameData): boolean {
  const trump = game.trump;
  if (!trump) return false;
  const captured = trumperTeam(game).flatMap((seat) => game.captured[seat] ?? []);
  return captured.filter((c) => c.suit === trump.suit).length === TRUMP_SUIT_SIZE;
}

function award(game: GameData, seats: readonly number[], points: number, tokens = 0): void {
  for (const seat of seats) {
    game.scores[seat] += points;
    game.bonusTokens[seat] += tokens;
  }
}

function finishHand(game: GameData, result: HandResult, events: GameEvent[]): void {
  game.gamesPlayed++;
  game.lastHand = result;
  game.phase = 'SCORING';
  game.turnSeat = null;
  events.push({ event: 'hand_scored', result, scores: scoreRecord(game.scores) });
}

// Settle a fully played hand against the winning bid
export function scoreHand(game: GameData, events: GameEvent[]): void {
  if (!game.currentBid || game.trumperSeat === null) return;

  const points = teamTrickPoints(game);
  const bid = game.currentBid.amount;
  const tier = scoringTier(bid);
  const won = points.trumper >= bid;

  const awardedSeats = won ? trumperTeam(game) : opposingTeam(game);
  const awarded = won ? tier.win : tier.lose;
  award(game, awardedSeats, awarded);

  finishHand(game, {
    outcome: won ? 'won' : 'lost',
    bid,
    trumper_seat: game.trumperSeat,
    trumper_points: points.trumper,
    opposing_points: points.opposing,
    points_awarded: awarded,
    awarded_seats: awardedSeats,
    bonus_tokens: 0,
  }, events);
}

// An illegal play was committed: the other side takes the hand plus bonus tokens
export function forfeitHand(game: GameData, offender: number, card: Card, events: GameEvent[]): void {
  if (!game.currentBid || game.trumperSeat === null) return;

  const points = teamTrickPoints(game);
  const tier = scoringTier(game.currentBid.amount);
  const wronged = opponentsOf(game, offender);
  award(game, wronged, tier.win, VIOLATION_BONUS_TOKENS);

  events.push({ event: 'rule_violation', seat: offender, card: card.id });
  finishHand(game, {
    outcome: 'forfeit',
    bid: game.currentBid.amount,
    trumper_seat: game.trumperSeat,
    trumper_points: points.trumper,
    opposing_points: points.opposing,
    points_awarded: tier.win,
    awarded_seats: wronged,
    bonus_tokens: VIOLATION_BONUS_TOKENS,
    offender_seat: offender,
  }, events);
}

// Void hand: nothing is scored, the deal moves on
export function spoilHand(game: GameData, events: GameEvent[]): void {
  if (!game.trump || game.trumperSeat === null) return;

  events.push({
    event: 'hand_spoilt',
    trumper_seat: game.trumperSeat,
    trump_suit: game.trump.suit,
    dealer_seat: (game.dealerSeat + 1) % game.mode,
  });
  redeal(game, events);
}

export function scoreRecord(values: readonly number[]): Record<string, number> {
  return Object.fromEntries(values.map((v, seat) => [String(seat), v]));
}
