import { Cooldown } from "./Cooldown";
import { noGesture } from "./gestures";
import type { GestureEvent } from "./gestures";
import { distance2D } from "./HandPoseClassifier";
import type { HandPoseState } from "./types";

export interface TwoHandTrackerOptions {
  /** Pixels of fingertip-distance change that produce one zoom tick. */
  distanceThreshold: number;
  /** Radians of angle change that produce one rotate tick. */
  rotationThreshold: number;
  cooldownMs: number;
}

const DEFAULTS: TwoHandTrackerOptions = {
  distanceThreshold: 50,
  rotationThreshold: 0.3,
  cooldownMs: 250,
};

export interface TwoHandBaseline {
  distance: number;
  angle: number;
}

/**
 * Zoom/rotate from two index fingertips, measured against a baseline that
 * is re-captured after every emission, so a sustained motion produces
 * repeated ticks.
 */
export class TwoHandCompositeTracker {
  private readonly options: TwoHandTrackerOptions;
  private readonly cooldown: Cooldown;
  private baseline: TwoHandBaseline | null = null;

  constructor(opts?: Partial<TwoHandTrackerOptions>, cooldown?: Cooldown) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
    this.cooldown = cooldown ?? new Cooldown(this.options.cooldownMs);
  }

  /** `first` and `second` must be given in a stable order (Left, then Right). */
  update(first: HandPoseState, second: HandPoseState, now: number): GestureEvent {
    if (!(first.valid && second.valid && first.fingers[1] && second.fingers[1])) {
      this.baseline = null;
      return noGesture(now);
    }

    const distance = distance2D(first.position, second.position);
    const angle = Math.atan2(second.position.y - first.position.y, second.position.x - first.position.x);

    if (!this.baseline) {
      this.baseline = { distance, angle };
      return noGesture(now);
    }

    const distanceDelta = distance - this.baseline.distance;
    if (Math.abs(distanceDelta) > this.options.distanceThreshold) {
      const type = distanceDelta > 0 ? "ZOOM_IN" : "ZOOM_OUT";
      if (!this.cooldown.tryTrigger(type, now)) return noGesture(now);
      this.baseline.distance = distance;
      return { type, timestamp: now, distanceDelta };
    }

    const angleDelta = normalizeAngle(angle - this.baseline.angle);
    if (Math.abs(angleDelta) > this.options.rotationThreshold) {
      const type = angleDelta > 0 ? "ROTATE_CCW" : "ROTATE_CW";
      if (!this.cooldown.tryTrigger(type, now)) return noGesture(now);
      this.baseline.angle = angle;
      return { type, timestamp: now, angleDelta };
    }

    return noGesture(now);
  }

  getBaseline(): TwoHandBaseline | null {
    return this.baseline ? { ...this.baseline } : null;
  }

  reset(): void {
    this.baseline = null;
  }
}

/** Wraps an angle into (-PI, PI]. */
export function normalizeAngle(angle: number): number {
  let a = angle;
  while (a > Math.PI) a -= 2 * Math.PI;
  while (a <= -Math.PI) a += 2 * Math.PI;
  return a;
}
