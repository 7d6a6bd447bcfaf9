import { AttentionGate } from "./AttentionGate";
import { Cooldown } from "./Cooldown";
import { noGesture } from "./gestures";
import type { GestureEvent } from "./gestures";
import { classifyHand } from "./HandPoseClassifier";
import { resolveGestureOptions } from "./options";
import type { GestureEngineOptions, ResolvedGestureOptions } from "./options";
import { SingleHandGestureMachine } from "./SingleHandGestureMachine";
import { TwoHandCompositeTracker } from "./TwoHandCompositeTracker";
import type { TwoHandBaseline } from "./TwoHandCompositeTracker";
import type { HandFrame, Handedness, HandObservation, HandPoseState, Logger, Point } from "./types";

export type GestureMode = "IDLE" | "INATTENTIVE" | "SINGLE" | "TWO_HAND";

export interface GestureDebugState {
  mode: GestureMode;
  dominantHand?: Handedness;
  dragging: Handedness[];
  baseline: TwoHandBaseline | null;
  attending: boolean;
}

export interface GestureFrameResult {
  event: GestureEvent;
  attending: boolean;
  poses: Partial<Record<Handedness, HandPoseState>>;
  dominant?: Handedness;
  /** A drag ended without DRAG_END (attention lost, hand lost or dominance changed). */
  releasedDrag: boolean;
}

/**
 * Frame-at-a-time recognition pipeline. Frames must arrive in timestamp
 * order; older frames and frames without a finite timestamp are dropped.
 */
export class GestureEngine {
  private readonly options: ResolvedGestureOptions;
  private readonly logger: Logger;
  private readonly cooldown: Cooldown;
  private readonly attention: AttentionGate;
  private readonly tracker: TwoHandCompositeTracker;
  private machines = new Map<Handedness, SingleHandGestureMachine>();
  private mode: GestureMode = "IDLE";
  private dominantHand?: Handedness;
  private cursor: Point | null = null;
  private attending = false;
  private lastTimestamp: number | null = null;

  constructor(opts?: GestureEngineOptions) {
    this.options = resolveGestureOptions(opts);
    this.logger = opts?.logger ?? console;
    this.cooldown = new Cooldown(this.options.cooldownMs);
    this.attention = new AttentionGate(this.options.attention);
    this.tracker = new TwoHandCompositeTracker(
      {
        distanceThreshold: this.options.twoHandDistanceThreshold,
        rotationThreshold: this.options.twoHandRotationThreshold,
      },
      this.cooldown
    );
  }

  update(frame: HandFrame): GestureFrameResult {
    const now = frame.timestamp;
    if (!Number.isFinite(now) || (this.lastTimestamp !== null && now < this.lastTimestamp)) {
      const last = this.lastTimestamp === null ? "none" : `${this.lastTimestamp}ms`;
      this.logger.warn(`gesture-core: dropping frame at ${now}ms (last ${last})`);
      return { event: noGesture(now), attending: this.attending, poses: {}, releasedDrag: false };
    }
    this.lastTimestamp = now;

    this.attending = this.options.enableFaceTracking ? this.attention.update(frame.face) : true;
    const observed = this.assignSlots(frame.hands);
    let releasedDrag = this.dropMissingSlots(observed);

    const poses: Partial<Record<Handedness, HandPoseState>> = {};
    for (const [hand, observation] of observed) {
      const machine = this.ensureMachine(hand);
      const pose = classifyHand(observation, frame, machine.history, this.options);
      machine.observePinch(pose);
      poses[hand] = pose;
    }

    const result = (event: GestureEvent): GestureFrameResult => ({
      event,
      attending: this.attending,
      poses,
      dominant: this.dominantHand,
      releasedDrag,
    });

    if (observed.size === 0) {
      this.tracker.reset();
      this.mode = "IDLE";
      this.dominantHand = undefined;
      this.cursor = null;
      return result(noGesture(now));
    }

    if (!this.attending) {
      this.tracker.reset();
      this.mode = "INATTENTIVE";
      for (const [hand, machine] of this.machines) {
        const pose = poses[hand];
        if (machine.isDragging) releasedDrag = true;
        if (pose) machine.step(pose, false, now);
        else machine.releaseDrag();
      }
      return result(noGesture(now));
    }

    const left = poses.Left;
    const right = poses.Right;
    if (this.options.enableTwoHand && left && right) {
      const composite = this.tracker.update(left, right, now);
      if (composite.type !== "NONE") {
        this.mode = "TWO_HAND";
        this.dominantHand = undefined;
        return result(composite);
      }
    } else {
      this.tracker.reset();
    }

    const dominant = observed.has(this.options.dominantHand) ? this.options.dominantHand : firstKey(observed);
    this.dominantHand = dominant;
    this.mode = "SINGLE";
    for (const [hand, machine] of this.machines) {
      if (hand !== dominant && machine.releaseDrag()) releasedDrag = true;
    }

    const pose = poses[dominant];
    const machine = this.machines.get(dominant);
    if (!pose || !machine) return result(noGesture(now));
    if (pose.valid) this.cursor = { ...pose.position };
    return result(machine.step(pose, true, now));
  }

  /** Index fingertip of the dominant hand in camera pixels, from the last frame that had one. */
  getCursor(): Point | null {
    return this.cursor ? { ...this.cursor } : null;
  }

  getDebugState(): GestureDebugState {
    return {
      mode: this.mode,
      dominantHand: this.dominantHand,
      dragging: [...this.machines.values()].filter((m) => m.isDragging).map((m) => m.hand),
      baseline: this.tracker.getBaseline(),
      attending: this.attending,
    };
  }

  reset(): void {
    this.machines.clear();
    this.tracker.reset();
    this.attention.reset();
    this.cooldown.reset();
    this.mode = "IDLE";
    this.dominantHand = undefined;
    this.cursor = null;
    this.attending = false;
    this.lastTimestamp = null;
  }

  private assignSlots(hands: HandObservation[]): Map<Handedness, HandObservation> {
    const observed = new Map<Handedness, HandObservation>();
    for (const hand of hands) {
      if (observed.has(hand.handedness)) {
        this.logger.debug(`gesture-core: ignoring second ${hand.handedness} hand in frame`);
        continue;
      }
      observed.set(hand.handedness, hand);
    }
    return observed;
  }

  private dropMissingSlots(observed: Map<Handedness, HandObservation>): boolean {
    let released = false;
    for (const [hand, machine] of this.machines) {
      if (observed.has(hand)) continue;
      if (machine.releaseDrag()) released = true;
      this.machines.delete(hand);
    }
    return released;
  }

  private ensureMachine(hand: Handedness): SingleHandGestureMachine {
    let machine = this.machines.get(hand);
    if (!machine) {
      machine = new SingleHandGestureMachine(hand, this.options, this.cooldown);
      this.machines.set(hand, machine);
    }
    return machine;
  }
}

function firstKey<K, V>(map: Map<K, V>): K {
  const [key] = map.keys();
  return key;
}
