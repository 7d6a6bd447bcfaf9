import { z } from "zod";
import { parseOptions } from "./options";

const dwellOptionsSchema = z.object({
  dwellMs: z.number().positive().default(800),
});

export type DwellTrackerOptions = z.input<typeof dwellOptionsSchema>;

export type DwellUpdate =
  | { type: "idle" }
  | { type: "hovering"; target: string; progress: number }
  | { type: "select"; target: string };

/**
 * Selects a target once the pointer has rested on it for `dwellMs`.
 * A target fires at most once per hover; leaving it re-arms.
 */
export class DwellTracker {
  private readonly dwellMs: number;
  private target: string | null = null;
  private enteredAt = 0;
  private fired = false;

  constructor(opts?: DwellTrackerOptions) {
    this.dwellMs = parseOptions(dwellOptionsSchema, opts, "dwell").dwellMs;
  }

  update(target: string | null, now: number): DwellUpdate {
    if (target === null) {
      this.target = null;
      return { type: "idle" };
    }
    if (target !== this.target) {
      this.target = target;
      this.enteredAt = now;
      this.fired = false;
    }

    const elapsed = now - this.enteredAt;
    if (!this.fired && elapsed >= this.dwellMs) {
      this.fired = true;
      return { type: "select", target };
    }
    return { type: "hovering", target, progress: Math.min(1, elapsed / this.dwellMs) };
  }

  reset(): void {
    this.target = null;
    this.fired = false;
  }
}
