import type { GameStateView, Player as PlayerInfo } from '@trump304/shared';
import type { GameData, SeatState } from './types.js';
import { validCardsFor } from './trick.js';
import { teamTrickPoints, scoreRecord } from './scoring.js';

export function toPlayerInfo(player: SeatState): PlayerInfo {
  return {
    player_id: player.playerId,
    name: player.name,
    seat: player.seat,
    connected: player.connected,
    card_count: player.hand.length,
  };
}

// Everything `viewerSeat` is allowed to see. Other hands, the center pile
// and an unrevealed trump never leave the canonical state.
export function toGameStateView(game: GameData, viewerSeat: number): GameStateView {
  const viewer = game.seats.find((s) => s.seat === viewerSeat);
  const myTurn = game.phase === 'PLAYING' && game.turnSeat === viewerSeat;

  const view: GameStateView = {
    game_code: game.code,
    mode: game.mode,
    phase: game.phase,
    players: game.seats.map(toPlayerInfo),
    dealer_seat: game.dealerSeat,
    your_seat: viewerSeat,
    your_hand: viewer ? viewer.hand.map((c) => c.id) : [],
    bids: game.bids.map((b) => ({ seat: b.seat, amount: b.amount })),
    current_bid: game.currentBid ? { ...game.currentBid } : null,
    bid_turn_seat: game.phase === 'BIDDING' ? game.bidTurnSeat : null,
    trumper_seat: game.trumperSeat,
    trump_revealed: game.trump?.revealed ?? false,
    current_trick: game.currentTrick.cards.map((tc) => ({ seat: tc.seat, card: tc.card.id })),
    turn_seat: game.phase === 'PLAYING' ? game.turnSeat : null,
    trick_number: game.trickNumber,
    valid_cards: myTurn ? validCardsFor(game, viewerSeat).map((c) => c.id) : [],
    team_tricks_points: teamTrickPoints(game),
    center_pile_count: game.centerPile.length,
    scores: scoreRecord(game.scores),
    bonus_tokens: scoreRecord(game.bonusTokens),
    games_played: game.gamesPlayed,
    action_seq: game.actionSeq,
    last_hand: game.lastHand,
  };

  if (game.trump && (game.trump.revealed || game.trumperSeat === viewerSeat)) {
    view.trump_suit = game.trump.suit;
    view.trump_card = game.trump.card.id;
  }

  return view;
}
