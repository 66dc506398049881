import { Type, type Static } from '@sinclair/typebox';

// Player info schema (public info visible to all players)
export const PlayerSchema = Type.Object({
  player_id: Type.String(),
  name: Type.String(),
  seat: Type.Number(),
  connected: Type.Boolean(),
  card_count: Type.Number(),
});
export type Player = Static<typeof PlayerSchema>;

// Supported table sizes
export const ModeSchema = Type.Union([Type.Literal(2), Type.Literal(3), Type.Literal(4)]);
export type Mode = Static<typeof ModeSchema>;

export const MODES: readonly Mode[] = [2, 3, 4];

export function isMode(value: number): value is Mode {
  return value === 2 || value === 3 || value === 4;
}

// Cards dealt to each seat at the start of a hand
export const CARDS_PER_SEAT: Record<Mode, number> = {
  2: 4,
  3: 8,
  4: 8,
};
