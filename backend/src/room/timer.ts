// One-shot turn timers. The room decides when to arm and cancel;
// the scheduler only knows how to wait.

export type TimerToken = number;

export interface TurnScheduler {
  arm(delayMs: number, fire: () => void): TimerToken;
  cancel(token: TimerToken): void;
}

export class TimeoutScheduler implements TurnScheduler {
  private timers = new Map<TimerToken, ReturnType<typeof setTimeout>>();
  private nextToken = 0;

  arm(delayMs: number, fire: () => void): TimerToken {
    const token = ++this.nextToken;
    const handle = setTimeout(() => {
      this.timers.delete(token);
      fire();
    }, delayMs);
    this.timers.set(token, handle);
    return token;
  }

  cancel(token: TimerToken): void {
    const handle = this.timers.get(token);
    if (handle) {
      clearTimeout(handle);
      this.timers.delete(token);
    }
  }

  // Number of armed timers
  pending(): number {
    return this.timers.size;
  }
}
