import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { TURN_TIMEOUT_MS } from '@trump304/shared';
import type { RulesOptions } from '../game/types.js';

export const LogLevelSchema = Type.Union([
  Type.Literal('debug'),
  Type.Literal('info'),
  Type.Literal('warn'),
  Type.Literal('error'),
]);
export type LogLevel = Static<typeof LogLevelSchema>;

export const ConfigSchema = Type.Object({
  PORT: Type.Integer({ minimum: 1, maximum: 65535, default: 8080 }),
  LOG_LEVEL: Type.Union(LogLevelSchema.anyOf, { default: 'info' }),
  TURN_TIMEOUT_MS: Type.Integer({ minimum: 1000, default: TURN_TIMEOUT_MS }),
  ILLEGAL_PLAY_POLICY: Type.Union([Type.Literal('reject'), Type.Literal('forfeit')], { default: 'reject' }),
  CUT_REQUIRES_VOID: Type.Boolean({ default: true }),
  CUT_REQUIRES_TURN: Type.Boolean({ default: true }),
  ROOM_IDLE_MS: Type.Integer({ minimum: 1000, default: 10 * 60_000 }),
  ROOM_TTL_MS: Type.Integer({ minimum: 1000, default: 24 * 60 * 60_000 }),
  ROOM_SWEEP_MS: Type.Integer({ minimum: 1000, default: 60_000 }),
});
export type Config = Static<typeof ConfigSchema>;

// Read and validate settings from the environment. Throws on bad values.
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(ConfigSchema.properties)) {
    const value = env[key];
    if (value !== undefined && value !== '') raw[key] = value;
  }

  const value = Value.Default(ConfigSchema, Value.Convert(ConfigSchema, raw));
  if (!Value.Check(ConfigSchema, value)) {
    const first = Value.Errors(ConfigSchema, value).First();
    const detail = first ? `${first.path.slice(1)}: ${first.message}` : 'unknown error';
    throw new Error(`Invalid configuration (${detail})`);
  }
  return value;
}

export function rulesFromConfig(config: Config): RulesOptions {
  return {
    illegalPlayPolicy: config.ILLEGAL_PLAY_POLICY,
    cutPolicy: {
      requireTurn: config.CUT_REQUIRES_TURN,
      requireVoidInLeadSuit: config.CUT_REQUIRES_VOID,
    },
  };
}

export const config = loadConfig();
