import { describe, it, expect } from 'vitest';
import type { GameEvent } from '@trump304/shared';
import { validCardsFor, playCard, trickWinner } from './trick.js';
import { playingGame, card, ids } from './test-helpers.js';

describe('validCardsFor', () => {
  const game = playingGame(4, {
    hands: [['J_hearts', '7_clubs'], ['9_hearts', '8_clubs'], ['A_spades', 'Q_clubs'], ['7_spades', 'K_clubs']],
    trumper: 1,
    trumpCard: 'J_spades',
    bid: 160,
    turn: 0,
  });

  it('allows the whole hand when leading', () => {
    expect(ids(validCardsFor(game, 0))).toEqual(['J_hearts', '7_clubs']);
  });

  it('forces following suit when possible', () => {
    const g = structuredClone(game);
    playCard(g, 0, 'J_hearts', []);
    expect(ids(validCardsFor(g, 1))).toEqual(['9_hearts']);
    expect(ids(validCardsFor(g, 2))).toEqual(['A_spades', 'Q_clubs']);
  });

  it('is empty outside of play', () => {
    const g = structuredClone(game);
    g.phase = 'SCORING';
    expect(validCardsFor(g, 0)).toEqual([]);
  });
});

describe('trickWinner', () => {
  it('takes the highest card of the lead suit', () => {
    const winner = trickWinner([
      { seat: 0, card: card('K_hearts'), trumped: false },
      { seat: 1, card: card('J_spades'), trumped: false },
      { seat: 2, card: card('A_hearts'), trumped: false },
    ]);
    expect(winner?.seat).toBe(2);
  });

  it('lets a trumped card take the trick', () => {
    const winner = trickWinner([
      { seat: 0, card: card('K_hearts'), trumped: false },
      { seat: 1, card: card('7_spades'), trumped: true },
      { seat: 2, card: card('J_hearts'), trumped: false },
    ]);
    expect(winner?.seat).toBe(1);
  });
});

describe('playCard', () => {
  function shortHand(rules?: { illegalPlayPolicy: 'reject' | 'forfeit' }) {
    // The trumper holds one card fewer: the eighth is face-down
    return playingGame(4, {
      hands: [['J_hearts', '7_clubs'], ['9_hearts'], ['A_hearts', 'Q_clubs'], ['7_spades', 'K_clubs']],
      trumper: 1,
      trumpCard: 'J_spades',
      bid: 160,
      dealer: 3,
      rules,
    });
  }

  it('rejects plays out of turn or of cards not held', () => {
    const game = shortHand();
    expect(playCard(game, 1, '9_hearts', [])).toBe('OutOfTurn');
    expect(playCard(game, 0, 'A_hearts', [])).toBe('IllegalCard');
  });

  it('rejects an off-suit card while holding the lead suit', () => {
    const game = playingGame(4, {
      hands: [['J_hearts'], ['9_hearts', '8_clubs'], ['A_hearts'], ['7_spades']],
      trumper: 2,
      trumpCard: 'J_spades',
      bid: 160,
      dealer: 3,
    });
    playCard(game, 0, 'J_hearts', []);
    expect(playCard(game, 1, '8_clubs', [])).toBe('IllegalCard');
    expect(ids(game.seats[1].hand)).toEqual(['9_hearts', '8_clubs']);
    expect(game.turnSeat).toBe(1);
  });

  it('plays a hand out through the forced reveal to scoring', () => {
    const game = shortHand();
    const events: GameEvent[] = [];

    playCard(game, 0, 'J_hearts', events);
    playCard(game, 1, '9_hearts', events);
    playCard(game, 2, 'A_hearts', events);
    playCard(game, 3, '7_spades', events);

    expect(events.at(-1)).toEqual({ event: 'trick_won', winner_seat: 0, points: 61, trick_number: 1 });
    expect(game.turnSeat).toBe(0);
    expect(game.trickNumber).toBe(2);

    events.length = 0;
    playCard(game, 0, '7_clubs', events);
    expect(events).toEqual([
      { event: 'card_played', seat: 0, card: '7_clubs', trumped: false },
      { event: 'trump_revealed', seat: 1, reason: 'last_card', suit: 'spades', card: 'J_spades' },
    ]);

    events.length = 0;
    playCard(game, 1, 'J_spades', events);
    playCard(game, 2, 'Q_clubs', events);
    playCard(game, 3, 'K_clubs', events);

    expect(events[0]).toEqual({ event: 'card_played', seat: 1, card: 'J_spades', trumped: true });
    expect(events).toContainEqual({ event: 'trick_won', winner_seat: 1, points: 35, trick_number: 2 });

    // Trumper side took 35 of a 160 bid: defenders get the low tier
    expect(game.phase).toBe('SCORING');
    expect(game.scores).toEqual([3, 0, 3, 0]);
    expect(game.gamesPlayed).toBe(1);
    expect(game.lastHand).toEqual({
      outcome: 'lost',
      bid: 160,
      trumper_seat: 1,
      trumper_points: 35,
      opposing_points: 61,
      points_awarded: 3,
      awarded_seats: [0, 2],
      bonus_tokens: 0,
    });
  });

  it('does not count an unrevealed trump-suit card as a cut', () => {
    const game = shortHand();
    const events: GameEvent[] = [];
    playCard(game, 0, 'J_hearts', events);
    playCard(game, 1, '9_hearts', events);
    playCard(game, 2, 'A_hearts', events);
    playCard(game, 3, '7_spades', events);
    expect(events).toContainEqual({ event: 'card_played', seat: 3, card: '7_spades', trumped: false });
  });

  it('forfeits the hand on an illegal card under the forfeit policy', () => {
    const game = playingGame(4, {
      hands: [['J_hearts', '7_clubs'], ['9_hearts', '8_clubs'], ['A_hearts', 'Q_clubs'], ['7_spades', 'K_clubs']],
      trumper: 2,
      trumpCard: 'J_spades',
      bid: 160,
      dealer: 3,
      rules: { illegalPlayPolicy: 'forfeit' },
    });
    const events: GameEvent[] = [];
    playCard(game, 0, 'J_hearts', events);
    expect(playCard(game, 1, '8_clubs', events)).toBeNull();

    expect(events.slice(1, 3)).toEqual([
      { event: 'rule_violation', seat: 1, card: '8_clubs' },
      {
        event: 'hand_scored',
        result: {
          outcome: 'forfeit',
          bid: 160,
          trumper_seat: 2,
          trumper_points: 0,
          opposing_points: 0,
          points_awarded: 5,
          awarded_seats: [0, 2],
          bonus_tokens: 2,
          offender_seat: 1,
        },
        scores: { '0': 5, '1': 0, '2': 5, '3': 0 },
      },
    ]);
    expect(game.phase).toBe('SCORING');
    expect(game.bonusTokens).toEqual([2, 0, 2, 0]);
  });
});

describe('2-player draws', () => {
  it('refills both hands from the center pile, winner first', () => {
    const game = playingGame(2, {
      hands: [['7_hearts', '8_hearts', 'Q_hearts'], ['J_clubs', '9_clubs', 'A_clubs', '10_clubs']],
      trumper: 0,
      trumpCard: 'A_hearts',
      bid: 160,
      dealer: 1,
      centerPile: ['7_spades', '8_spades', 'Q_spades', 'K_spades'],
    });
    const events: GameEvent[] = [];
    playCard(game, 0, '7_hearts', events);
    playCard(game, 1, 'J_clubs', events);

    expect(events.slice(-2)).toEqual([
      { event: 'trick_won', winner_seat: 0, points: 30, trick_number: 1 },
      { event: 'cards_drawn', seats: [0, 1], center_pile_count: 2 },
    ]);
    expect(ids(game.seats[0].hand)).toEqual(['8_hearts', 'Q_hearts', '7_spades']);
    expect(ids(game.seats[1].hand)).toEqual(['9_clubs', 'A_clubs', '10_clubs', '8_spades']);
    expect(game.turnSeat).toBe(0);
    expect(game.trickNumber).toBe(2);
  });
});
