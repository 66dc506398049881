import { Elysia, t } from 'elysia';
import { ClientMessageSchema } from '@trump304/shared';
import type { RoomManager } from '../room/manager.js';
import type { ConnectionRegistry, PlayerSocket } from './connections.js';
import { sendError } from './broadcast.js';
import { log } from '../utils/logger.js';

interface SocketLike {
  readonly id: string;
  send(data: string): unknown;
  close(): unknown;
}

function wrap(ws: SocketLike): PlayerSocket {
  return { id: ws.id, send: (data: string) => ws.send(data) };
}

// Game channel: /ws?game_code=…&player_id=… identifies an already seated player
export function createWsHandler(manager: RoomManager, connections: ConnectionRegistry) {
  return new Elysia().ws('/ws', {
    query: t.Object({
      game_code: t.String(),
      player_id: t.String(),
    }),
    body: ClientMessageSchema,

    open(ws) {
      const socket = wrap(ws);
      const { game_code, player_id } = ws.data.query;

      const room = manager.getRoom(game_code);
      if (!room) {
        log.ws.warn(`Connection for unknown room ${game_code}`);
        sendError(socket, 'RoomNotFound');
        ws.close();
        return;
      }
      if (!room.getPlayer(player_id)) {
        log.ws.warn(`Unknown player in room ${room.code}`, { player_id });
        sendError(socket, 'PlayerNotFound');
        ws.close();
        return;
      }

      connections.register(socket, { playerId: player_id, gameCode: room.code });
      log.ws.info(`Player connected to room ${room.code}`, { connId: ws.id });

      room.setConnected(player_id, true)
        .then(() => room.sendState(player_id))
        .catch((err: unknown) => {
          log.ws.error(`Failed to attach player to room ${room.code}`, { error: String(err) });
        });
    },

    message(ws, message) {
      const socket = wrap(ws);
      const info = connections.lookup(socket);
      const room = info ? manager.getRoom(info.gameCode) : undefined;
      if (!info || !room) {
        sendError(socket, 'RoomNotFound');
        return;
      }

      room.submit(info.playerId, message).catch((err: unknown) => {
        log.ws.error(`Failed to apply ${message.action} in room ${room.code}`, { error: String(err) });
      });
    },

    close(ws) {
      const info = connections.unregister(wrap(ws));
      if (!info) return;

      log.ws.info(`Player disconnected from room ${info.gameCode}`, { connId: ws.id });
      const room = manager.getRoom(info.gameCode);
      room?.setConnected(info.playerId, false).catch((err: unknown) => {
        log.ws.error(`Failed to detach player from room ${info.gameCode}`, { error: String(err) });
      });
    },
  });
}
