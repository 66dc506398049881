import { describe, it, expect } from 'vitest';
import type { GameEvent } from '@trump304/shared';
import type { GameData } from './types.js';
import { selectTrump, exchangeCards, skipExchange, voluntaryReveal, askTrump, giveTurn } from './trump.js';
import { playCard } from './trick.js';
import { newDeck, deal } from './deck.js';
import { seatedGame, playingGame, ids } from './test-helpers.js';

// Unshuffled deal, bidding already won by `trumper`
function selectionGame(mode: number, dealer: number, trumper: number, bid = 160): GameData {
  const game = seatedGame(mode);
  const { hands, centerPile } = deal(newDeck(), mode, dealer);
  for (const seat of game.seats) seat.hand = hands[seat.seat];
  game.centerPile = centerPile;
  game.dealerSeat = dealer;
  game.handNumber = 1;
  game.phase = 'TRUMP_SELECTION';
  game.bids = [{ seat: trumper, amount: bid }];
  game.currentBid = { seat: trumper, amount: bid };
  game.trumperSeat = trumper;
  return game;
}

function hand(game: GameData, seat: number): string[] {
  return ids(game.seats[seat].hand);
}

describe('selectTrump', () => {
  it('only lets the trumper choose', () => {
    const game = selectionGame(4, 0, 1);
    expect(selectTrump(game, 2, 'hearts', '10_hearts', [])).toBe('OutOfTurn');
  });

  it('needs a card of the named suit from the hand', () => {
    const game = selectionGame(4, 0, 1);
    expect(selectTrump(game, 1, 'hearts', 'K_clubs', [])).toBe('InvalidTrumpCard');
    expect(selectTrump(game, 1, 'spades', 'J_spades', [])).toBe('InvalidTrumpCard');
    expect(game.trump).toBeNull();
  });

  it('puts the card face-down and starts play left of the dealer', () => {
    const game = selectionGame(4, 0, 1);
    const events: GameEvent[] = [];
    expect(selectTrump(game, 1, 'hearts', 'K_hearts', events)).toBeNull();

    expect(hand(game, 1)).toEqual(['7_hearts', '8_hearts', 'Q_hearts', '7_clubs', '8_clubs', 'Q_clubs', 'K_clubs']);
    expect(game.trump).toEqual({
      suit: 'hearts',
      card: { id: 'K_hearts', suit: 'hearts', rank: 'K' },
      revealed: false,
      revealReason: null,
    });
    expect(game.phase).toBe('PLAYING');
    expect(game.turnSeat).toBe(1);
    expect(game.trickNumber).toBe(1);
    expect(events).toEqual([{ event: 'trump_selected', seat: 1 }]);
  });

  it('lets a 304 bidder lead the first trick', () => {
    const game = selectionGame(4, 0, 2, 304);
    expect(selectTrump(game, 2, 'hearts', 'J_hearts', [])).toBeNull();
    expect(game.turnSeat).toBe(2);
  });

  it('is refused once play has started', () => {
    const game = selectionGame(4, 0, 1);
    selectTrump(game, 1, 'hearts', 'K_hearts', []);
    expect(selectTrump(game, 1, 'clubs', 'K_clubs', [])).toBe('InvalidPhase');
  });
});

describe('card exchange (3 players)', () => {
  function exchangeGame(): GameData {
    const game = selectionGame(3, 2, 1);
    selectTrump(game, 1, 'hearts', 'J_hearts', []);
    return game;
  }

  it('moves to the exchange after trump selection', () => {
    const game = exchangeGame();
    expect(game.phase).toBe('CARD_EXCHANGE');
    expect(hand(game, 1)).toEqual(['10_hearts', 'A_hearts', '9_hearts', '7_clubs', '8_clubs', 'Q_clubs', 'K_clubs']);
  });

  it('swaps cards with the top of the center pile', () => {
    const game = exchangeGame();
    const events: GameEvent[] = [];
    expect(exchangeCards(game, 1, ['7_clubs', '8_clubs'], events)).toBeNull();

    expect(hand(game, 1)).toEqual(['10_hearts', 'A_hearts', '9_hearts', 'Q_clubs', 'K_clubs', '7_spades', '8_spades']);
    expect(ids(game.centerPile)).toEqual([
      'Q_spades', 'K_spades', '10_spades', 'A_spades', '9_spades', 'J_spades', '7_clubs', '8_clubs',
    ]);
    expect(events).toEqual([{ event: 'cards_exchanged', seat: 1, count: 2 }]);
    expect(game.phase).toBe('PLAYING');
    expect(game.turnSeat).toBe(0);
  });

  it('rejects bad exchanges', () => {
    const game = exchangeGame();
    expect(exchangeCards(game, 1, [], [])).toBe('ExchangeNotAllowed');
    expect(exchangeCards(game, 1, ['7_clubs', '8_clubs', 'Q_clubs'], [])).toBe('ExchangeNotAllowed');
    expect(exchangeCards(game, 1, ['7_clubs', '7_clubs'], [])).toBe('ExchangeNotAllowed');
    expect(exchangeCards(game, 1, ['J_spades'], [])).toBe('ExchangeNotAllowed');
    expect(exchangeCards(game, 0, ['7_hearts'], [])).toBe('OutOfTurn');
    expect(game.phase).toBe('CARD_EXCHANGE');
  });

  it('can be skipped', () => {
    const game = exchangeGame();
    const events: GameEvent[] = [];
    expect(skipExchange(game, 1, events)).toBeNull();
    expect(events).toEqual([{ event: 'exchange_skipped', seat: 1 }]);
    expect(game.phase).toBe('PLAYING');
    expect(game.centerPile).toHaveLength(8);
  });

  it('does not exist with 4 players', () => {
    const game = selectionGame(4, 0, 1);
    selectTrump(game, 1, 'hearts', 'K_hearts', []);
    expect(exchangeCards(game, 1, ['7_clubs'], [])).toBe('ExchangeNotAllowed');
  });
});

describe('revealing trump', () => {
  function startedGame(): GameData {
    const game = selectionGame(4, 0, 1);
    selectTrump(game, 1, 'hearts', 'K_hearts', []);
    return game;
  }

  it('lets the trumper reveal voluntarily', () => {
    const game = startedGame();
    const events: GameEvent[] = [];
    expect(voluntaryReveal(game, 2, events)).toBe('RevealNotAllowed');
    expect(voluntaryReveal(game, 1, events)).toBeNull();

    expect(game.trump?.revealed).toBe(true);
    expect(game.trump?.revealReason).toBe('voluntary');
    expect(hand(game, 1)).toContain('K_hearts');
    expect(events).toEqual([
      { event: 'trump_revealed', seat: 1, reason: 'voluntary', suit: 'hearts', card: 'K_hearts' },
    ]);
    expect(voluntaryReveal(game, 1, [])).toBe('RevealNotAllowed');
  });

  it('reveals on a cut request from a player void in the lead suit', () => {
    const game = startedGame();
    playCard(game, 1, 'Q_clubs', []);
    playCard(game, 2, '10_clubs', []);
    expect(game.turnSeat).toBe(3);

    const events: GameEvent[] = [];
    expect(askTrump(game, 3, events)).toBeNull();
    expect(game.trump?.revealReason).toBe('cut_request');
    expect(events).toEqual([
      { event: 'trump_revealed', seat: 3, reason: 'cut_request', suit: 'hearts', card: 'K_hearts' },
    ]);
  });

  it('refuses cut requests that do not meet the policy', () => {
    const game = startedGame();
    // seat 2 is not to act yet
    expect(askTrump(game, 2, [])).toBe('RevealNotAllowed');

    playCard(game, 1, 'Q_clubs', []);
    // seat 2 still holds clubs
    expect(askTrump(game, 2, [])).toBe('RevealNotAllowed');
    // seat 0 is void but it is not their turn
    expect(askTrump(game, 0, [])).toBe('RevealNotAllowed');
    // the trumper never asks
    expect(askTrump(game, 1, [])).toBe('RevealNotAllowed');
    expect(game.trump?.revealed).toBe(false);
  });

  it('follows a relaxed cut policy', () => {
    const game = selectionGame(4, 0, 1);
    game.rules.cutPolicy = { requireTurn: false, requireVoidInLeadSuit: false };
    selectTrump(game, 1, 'hearts', 'K_hearts', []);
    expect(askTrump(game, 0, [])).toBeNull();
  });

  it('forces the reveal when the trumper has only the face-down card left', () => {
    const game = playingGame(4, {
      hands: [['7_clubs'], [], ['8_clubs'], ['Q_clubs']],
      trumper: 1,
      trumpCard: 'J_spades',
      bid: 160,
    });
    const events: GameEvent[] = [];
    giveTurn(game, 1, events);

    expect(game.turnSeat).toBe(1);
    expect(hand(game, 1)).toEqual(['J_spades']);
    expect(game.trump?.revealReason).toBe('last_card');
    expect(events).toEqual([
      { event: 'trump_revealed', seat: 1, reason: 'last_card', suit: 'spades', card: 'J_spades' },
    ]);
  });
});
