import type { GameData } from './types.js';

// Team membership is derived from mode and trumper, never stored.

export function nextSeat(game: GameData, seat: number): number {
  return (seat + 1) % game.mode;
}

export function partnerSeat(game: GameData, seat: number): number | null {
  return game.mode === 4 ? (seat + 2) % 4 : null;
}

// Seats on the same side as `seat` for the current hand
export function teamOf(game: GameData, seat: number): number[] {
  if (game.mode === 4) {
    return [seat, (seat + 2) % 4].sort((a, b) => a - b);
  }
  if (game.mode === 3 && game.trumperSeat !== null && seat !== game.trumperSeat) {
    return allSeats(game).filter((s) => s !== game.trumperSeat);
  }
  return [seat];
}

export function trumperTeam(game: GameData): number[] {
  return game.trumperSeat === null ? [] : teamOf(game, game.trumperSeat);
}

export function opposingTeam(game: GameData): number[] {
  const team = trumperTeam(game);
  if (team.length === 0) return [];
  return allSeats(game).filter((s) => !team.includes(s));
}

// The side that profits when `seat` commits a rule violation
export function opponentsOf(game: GameData, seat: number): number[] {
  const team = teamOf(game, seat);
  return allSeats(game).filter((s) => !team.includes(s));
}

export function allSeats(game: GameData): number[] {
  return Array.from({ length: game.mode }, (_, i) => i);
}
