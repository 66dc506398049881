import type { ServerMessage } from '@trump304/shared';
import { GameErrors, type GameErrorCode } from '../game/errors.js';
import type { PlayerSocket } from './connections.js';

export function send(socket: PlayerSocket, msg: ServerMessage): void {
  socket.send(JSON.stringify(msg));
}

export function sendError(socket: PlayerSocket, code: GameErrorCode): void {
  send(socket, { error: GameErrors[code], code });
}
