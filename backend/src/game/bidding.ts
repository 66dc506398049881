import type { GameEvent } from '@trump304/shared';
import { MIN_BID, MAX_BID, BID_STEP, SPECIAL_BID_THRESHOLD } from '@trump304/shared';
import type { GameData } from './types.js';
import type { GameErrorCode } from './errors.js';
import { nextSeat, partnerSeat } from './teams.js';

const CLOSED_PHASES = new Set(['TRUMP_SELECTION', 'CARD_EXCHANGE', 'PLAYING', 'SCORING']);

// Open the auction. First bidder sits left of the dealer.
export function startBidding(game: GameData): void {
  game.phase = 'BIDDING';
  game.bids = [];
  game.currentBid = null;
  game.trumperSeat = null;
  game.bidTurnSeat = nextSeat(game, game.dealerSeat);
}

function hasPassed(game: GameData, seat: number): boolean {
  return game.bids.some((b) => b.seat === seat && b.amount === null);
}

function hasBid(game: GameData, seat: number): boolean {
  return game.bids.some((b) => b.seat === seat && b.amount !== null);
}

export function isValidBidAmount(amount: number): boolean {
  if (!Number.isInteger(amount)) return false;
  if (amount < MIN_BID || amount > MAX_BID) return false;
  return amount === MAX_BID || amount % BID_STEP === 0;
}

// Validate a bid, or a pass when amount is null
export function validateBid(game: GameData, seat: number, amount: number | null): GameErrorCode | null {
  if (game.phase !== 'BIDDING') {
    return CLOSED_PHASES.has(game.phase) ? 'BiddingAlreadyClosed' : 'InvalidPhase';
  }

  if (game.bidTurnSeat !== seat) {
    return 'OutOfTurn';
  }

  if (amount === null) {
    return null;
  }

  if (!isValidBidAmount(amount)) {
    return 'InvalidBidAmount';
  }

  if (game.currentBid && amount <= game.currentBid.amount) {
    return 'InvalidBidAmount';
  }

  // Coming back after being overbid takes a 200+ bid
  if (hasBid(game, seat) && amount < SPECIAL_BID_THRESHOLD) {
    return 'InvalidBidAmount';
  }

  // Overbidding your own partner takes a 200+ bid
  const partner = partnerSeat(game, seat);
  if (partner !== null && game.currentBid?.seat === partner && amount < SPECIAL_BID_THRESHOLD) {
    return 'InvalidBidAmount';
  }

  return null;
}

// Record a validated bid or pass and move the auction on
export function placeBid(game: GameData, seat: number, amount: number | null, events: GameEvent[]): void {
  game.bids.push({ seat, amount });
  if (amount !== null) {
    game.currentBid = { seat, amount };
  }
  events.push({ event: 'bid_placed', seat, amount });

  const active = activeBidders(game);

  if (amount === MAX_BID) {
    concludeBidding(game, false, events);
    return;
  }

  if (active.length === 0) {
    // Everyone passed: the dealer is stuck with the minimum
    game.bids.push({ seat: game.dealerSeat, amount: MIN_BID });
    game.currentBid = { seat: game.dealerSeat, amount: MIN_BID };
    concludeBidding(game, true, events);
    return;
  }

  if (game.currentBid && active.length === 1) {
    concludeBidding(game, false, events);
    return;
  }

  game.bidTurnSeat = nextBidder(game, seat);
}

// Seats that have not passed
function activeBidders(game: GameData): number[] {
  const active: number[] = [];
  for (let s = 0; s < game.mode; s++) {
    if (!hasPassed(game, s)) active.push(s);
  }
  return active;
}

// Next seat clockwise that is still in and does not hold the high bid
function nextBidder(game: GameData, from: number): number | null {
  let seat = from;
  for (let i = 0; i < game.mode; i++) {
    seat = nextSeat(game, seat);
    if (hasPassed(game, seat)) continue;
    if (game.currentBid?.seat === seat) continue;
    return seat;
  }
  return null;
}

function concludeBidding(game: GameData, forced: boolean, events: GameEvent[]): void {
  if (!game.currentBid) return;

  game.trumperSeat = game.currentBid.seat;
  game.bidTurnSeat = null;
  game.phase = 'TRUMP_SELECTION';

  events.push({
    event: 'bidding_complete',
    trumper_seat: game.trumperSeat,
    bid: game.currentBid.amount,
    forced,
  });
}
