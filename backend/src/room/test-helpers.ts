import type { ServerMessage } from '@trump304/shared';
import type { Broadcaster } from './room.js';
import type { TurnScheduler, TimerToken } from './timer.js';

// Scheduler driven by hand from tests
export class ManualScheduler implements TurnScheduler {
  readonly armed = new Map<TimerToken, { delayMs: number; fire: () => void }>();
  private nextToken = 0;

  arm(delayMs: number, fire: () => void): TimerToken {
    const token = ++this.nextToken;
    this.armed.set(token, { delayMs, fire });
    return token;
  }

  cancel(token: TimerToken): void {
    this.armed.delete(token);
  }

  fireAll(): void {
    const pending = [...this.armed.values()];
    this.armed.clear();
    for (const timer of pending) timer.fire();
  }
}

export class RecordingBroadcaster implements Broadcaster {
  readonly sent: { playerId: string; message: ServerMessage }[] = [];

  send(playerId: string, message: ServerMessage): void {
    this.sent.push({ playerId, message });
  }

  to(playerId: string): ServerMessage[] {
    return this.sent.filter((s) => s.playerId === playerId).map((s) => s.message);
  }

  clear(): void {
    this.sent.length = 0;
  }
}
