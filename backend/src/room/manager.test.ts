import { describe, it, expect } from 'vitest';
import { RoomManager, type RoomManagerOptions } from './manager.js';
import { GameError } from '../game/errors.js';
import { ManualScheduler, RecordingBroadcaster } from './test-helpers.js';

function manager(random?: () => number, extra: Partial<RoomManagerOptions> = {}) {
  const scheduler = new ManualScheduler();
  return {
    scheduler,
    rooms: new RoomManager({ scheduler, broadcaster: new RecordingBroadcaster(), turnTimeoutMs: 30000, random, ...extra }),
  };
}

const MINUTE = 60_000;

// Rooms whose clock is moved by hand
function clockedManager() {
  const clock = { now: 0 };
  const setup = manager(undefined, { idleMs: 10 * MINUTE, ttlMs: 60 * MINUTE, now: () => clock.now });
  return { ...setup, clock };
}

async function seatTwo(rooms: RoomManager) {
  const room = rooms.createRoom(2);
  const a = await room.join('Ann');
  const b = await room.join('Ben');
  if (!a.ok || !b.ok) throw new Error('join failed');
  return { room, ids: [a.player.player_id, b.player.player_id] };
}

describe('RoomManager', () => {
  it('creates rooms with six-character codes', () => {
    const { rooms } = manager();
    const room = rooms.createRoom(4);
    expect(room.code).toMatch(/^[A-Z0-9]{6}$/);
    expect(room.mode).toBe(4);
    expect(rooms.roomCount()).toBe(1);
  });

  it('looks codes up case-insensitively', () => {
    const { rooms } = manager();
    const room = rooms.createRoom(3);
    expect(rooms.getRoom(room.code.toLowerCase())).toBe(room);
    expect(rooms.getRoom('ZZZZZZZ')).toBeUndefined();
  });

  it('never hands out a live code twice', () => {
    const draws = [...Array<number>(12).fill(0), ...Array<number>(6).fill(0.03)];
    const { rooms } = manager(() => draws.shift() ?? 0.5);
    expect(rooms.createRoom(2).code).toBe('AAAAAA');
    expect(rooms.createRoom(2).code).toBe('BBBBBB');
  });

  it('rejects unsupported table sizes', () => {
    const { rooms } = manager();
    expect(() => rooms.createRoom(6)).toThrow(GameError);
    expect(rooms.roomCount()).toBe(0);
  });

  it('stops a removed room and forgets it', async () => {
    const { rooms, scheduler } = manager();
    const room = rooms.createRoom(2);
    const a = await room.join('Ann');
    await room.join('Ben');
    if (!a.ok) throw new Error(a.error);
    await room.submit(a.player.player_id, { action: 'start_game' });
    expect(scheduler.armed.size).toBe(1);

    rooms.removeRoom(room.code.toLowerCase());
    expect(scheduler.armed.size).toBe(0);
    expect(rooms.getRoom(room.code)).toBeUndefined();
    expect(rooms.roomCount()).toBe(0);
  });

  it('removes a room nobody has been connected to for the idle window', async () => {
    const { rooms, scheduler, clock } = clockedManager();
    const { room, ids } = await seatTwo(rooms);
    await room.submit(ids[0], { action: 'start_game' });
    await room.setConnected(ids[0], false);
    await room.setConnected(ids[1], false);

    clock.now = 10 * MINUTE - 1;
    expect(rooms.cleanupIdleRooms()).toEqual([]);
    expect(scheduler.armed.size).toBe(1);

    clock.now = 10 * MINUTE;
    expect(rooms.cleanupIdleRooms()).toEqual([room.code]);
    expect(rooms.roomCount()).toBe(0);
    expect(scheduler.armed.size).toBe(0);
  });

  it('keeps idle rooms that still have a connected seat', async () => {
    const { rooms, clock } = clockedManager();
    const { room, ids } = await seatTwo(rooms);
    await room.setConnected(ids[1], false);

    clock.now = 30 * MINUTE;
    expect(rooms.cleanupIdleRooms()).toEqual([]);
    expect(rooms.getRoom(room.code)).toBe(room);
  });

  it('measures the idle window from the last disconnect', async () => {
    const { rooms, clock } = clockedManager();
    const { room, ids } = await seatTwo(rooms);
    clock.now = 20 * MINUTE;
    await room.setConnected(ids[0], false);
    await room.setConnected(ids[1], false);

    clock.now = 25 * MINUTE;
    expect(rooms.cleanupIdleRooms()).toEqual([]);
    clock.now = 30 * MINUTE;
    expect(rooms.cleanupIdleRooms()).toEqual([room.code]);
  });

  it('expires every room after its lifetime', async () => {
    const { rooms, clock } = clockedManager();
    const { room } = await seatTwo(rooms);
    clock.now = 30 * MINUTE;
    const later = rooms.createRoom(3);
    await later.join('Cat');

    clock.now = 60 * MINUTE;
    expect(rooms.cleanupIdleRooms()).toEqual([room.code]);
    expect(rooms.getRoom(later.code)).toBe(later);
  });
});
