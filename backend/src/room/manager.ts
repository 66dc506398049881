import { isMode } from '@trump304/shared';
import type { RulesOptions } from '../game/types.js';
import { GameError } from '../game/errors.js';
import { Room, type Broadcaster } from './room.js';
import type { TurnScheduler } from './timer.js';
import { log } from '../utils/logger.js';

const CODE_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const CODE_LENGTH = 6;

export interface RoomManagerOptions {
  scheduler: TurnScheduler;
  broadcaster: Broadcaster;
  turnTimeoutMs: number;
  rules?: Partial<RulesOptions>;
  // Remove a room once no seat has been connected for this long
  idleMs?: number;
  // Remove every room this long after it was created
  ttlMs?: number;
  random?: () => number;
  now?: () => number;
}

export class RoomManager {
  private rooms: Map<string, Room> = new Map();
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(private readonly options: RoomManagerOptions) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  // Create a new room with a random code. Throws on an unsupported mode.
  createRoom(mode: number, seed?: number): Room {
    if (!isMode(mode)) {
      throw new GameError('InvalidMode');
    }
    const code = this.generateCode();
    const room = new Room({
      code,
      mode,
      seed,
      rules: this.options.rules,
      turnTimeoutMs: this.options.turnTimeoutMs,
      scheduler: this.options.scheduler,
      broadcaster: this.options.broadcaster,
      now: this.now,
    });
    this.rooms.set(code, room);
    log.room.info(`Room ${code} created`, { mode });
    return room;
  }

  // Get a room by code (case-insensitive)
  getRoom(code: string): Room | undefined {
    return this.rooms.get(code.toUpperCase());
  }

  removeRoom(code: string): void {
    const key = code.toUpperCase();
    const room = this.rooms.get(key);
    if (!room) return;
    room.close();
    this.rooms.delete(key);
    log.room.info(`Room ${key} removed`);
  }

  // Drop abandoned and expired rooms. Returns the removed codes.
  cleanupIdleRooms(): string[] {
    const now = this.now();
    const { idleMs, ttlMs } = this.options;
    const removed: string[] = [];
    for (const [code, room] of this.rooms) {
      const expired = ttlMs !== undefined && now - room.createdAt >= ttlMs;
      const abandoned = idleMs !== undefined && !room.hasConnectedSeats() && now - room.lastActiveAt >= idleMs;
      if (expired || abandoned) {
        this.removeRoom(code);
        removed.push(code);
      }
    }
    return removed;
  }

  roomCount(): number {
    return this.rooms.size;
  }

  private generateCode(): string {
    let code: string;
    do {
      code = '';
      for (let i = 0; i < CODE_LENGTH; i++) {
        code += CODE_CHARS[Math.floor(this.random() * CODE_CHARS.length)];
      }
    } while (this.rooms.has(code));
    return code;
  }
}
