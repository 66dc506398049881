import type { ServerMessage } from '@trump304/shared';
import type { Broadcaster } from '../room/room.js';

// The slice of a WebSocket the server relies on
export interface PlayerSocket {
  readonly id: string;
  send(data: string): unknown;
}

export interface ConnectionInfo {
  playerId: string;
  gameCode: string;
}

// Tracks which socket currently speaks for which player. A reconnect
// replaces the previous socket; closing a superseded socket is ignored.
export class ConnectionRegistry implements Broadcaster {
  private sockets = new Map<string, PlayerSocket>(); // playerId -> socket
  private connections = new Map<string, ConnectionInfo>(); // socket id -> player

  register(socket: PlayerSocket, info: ConnectionInfo): void {
    this.sockets.set(info.playerId, socket);
    this.connections.set(socket.id, info);
  }

  // Returns the player the socket spoke for, if it was still the live one
  unregister(socket: PlayerSocket): ConnectionInfo | null {
    const info = this.connections.get(socket.id);
    if (!info) return null;
    this.connections.delete(socket.id);

    if (this.sockets.get(info.playerId)?.id !== socket.id) return null;
    this.sockets.delete(info.playerId);
    return info;
  }

  lookup(socket: PlayerSocket): ConnectionInfo | undefined {
    return this.connections.get(socket.id);
  }

  send(playerId: string, message: ServerMessage): void {
    this.sockets.get(playerId)?.send(JSON.stringify(message));
  }
}
