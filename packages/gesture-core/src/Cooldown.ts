import type { GestureType } from "./gestures";

/**
 * Minimum interval between discrete emissions. One instance is shared by
 * every recognizer of an engine so composite and single-hand gestures are
 * spaced against each other.
 */
export class Cooldown {
  private lastTimestamp: number | null = null;
  private last: GestureType = "NONE";

  constructor(readonly intervalMs: number) {}

  ready(now: number): boolean {
    return this.lastTimestamp === null || now - this.lastTimestamp >= this.intervalMs;
  }

  /** Records the emission when the cooldown has elapsed; reports whether it did. */
  tryTrigger(gesture: GestureType, now: number): boolean {
    if (!this.ready(now)) return false;
    this.last = gesture;
    this.lastTimestamp = now;
    return true;
  }

  get lastGesture(): GestureType {
    return this.last;
  }

  get lastEmission(): number | null {
    return this.lastTimestamp;
  }

  reset(): void {
    this.lastTimestamp = null;
    this.last = "NONE";
  }
}
