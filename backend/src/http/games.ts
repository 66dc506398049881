import { Elysia, t } from 'elysia';
import { GameErrors, GameError, type GameErrorCode } from '../game/errors.js';
import type { RoomManager } from '../room/manager.js';
import type { Room } from '../room/room.js';
import { log } from '../utils/logger.js';

function errorBody(code: GameErrorCode) {
  return { error: GameErrors[code], code };
}

function statusFor(code: GameErrorCode): number {
  return code === 'RoomNotFound' || code === 'PlayerNotFound' ? 404 : 400;
}

function tryCreateRoom(manager: RoomManager, mode: number): Room | GameErrorCode {
  try {
    return manager.createRoom(mode);
  } catch (err) {
    if (err instanceof GameError) return err.code;
    throw err;
  }
}

const PlayerName = t.String({ minLength: 1, maxLength: 32 });

export function gameRoutes(manager: RoomManager) {
  return new Elysia({ prefix: '/games' })
    .post('/', async ({ body, set }) => {
      const room = tryCreateRoom(manager, body.mode);
      if (typeof room === 'string') {
        set.status = statusFor(room);
        return errorBody(room);
      }

      const joined = await room.join(body.player_name);
      if (!joined.ok) {
        manager.removeRoom(room.code);
        set.status = statusFor(joined.error);
        return errorBody(joined.error);
      }

      log.http.info(`Game ${room.code} created`, { mode: room.mode });
      set.status = 201;
      return {
        game_code: room.code,
        player_id: joined.player.player_id,
        seat: joined.player.seat,
        mode: room.mode,
      };
    }, {
      body: t.Object({
        mode: t.Integer(),
        player_name: PlayerName,
      }),
    })
    .post('/:code/join', async ({ params, body, set }) => {
      const room = manager.getRoom(params.code);
      if (!room) {
        set.status = 404;
        return errorBody('RoomNotFound');
      }

      const joined = await room.join(body.player_name);
      if (!joined.ok) {
        set.status = statusFor(joined.error);
        return errorBody(joined.error);
      }

      return {
        game_code: room.code,
        player_id: joined.player.player_id,
        seat: joined.player.seat,
        mode: room.mode,
        players: room.players(),
      };
    }, {
      body: t.Object({ player_name: PlayerName }),
    })
    .get('/:code', ({ params, set }) => {
      const room = manager.getRoom(params.code);
      if (!room) {
        set.status = 404;
        return errorBody('RoomNotFound');
      }

      return {
        game_code: room.code,
        mode: room.mode,
        phase: room.game.phase,
        player_count: room.playerCount(),
        players: room.players(),
      };
    });
}
