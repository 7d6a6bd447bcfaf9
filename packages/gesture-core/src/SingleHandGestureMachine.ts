import { Cooldown } from "./Cooldown";
import { noGesture } from "./gestures";
import type { GestureEvent, GestureType } from "./gestures";
import { matchesFingers, PositionHistory } from "./HandPoseClassifier";
import type { FingerFlags, Handedness, HandPoseState } from "./types";

export const INDEX_ONLY: FingerFlags = [false, true, false, false, false];
export const PEACE: FingerFlags = [false, true, true, false, false];
export const THUMB_ONLY: FingerFlags = [true, false, false, false, false];

export interface SingleHandMachineOptions {
  pinchThreshold: number;
  scrollVelocityMin: number;
  multiClickWindowMs: number;
  clickHistorySize: number;
  velocityHistory: number;
  cooldownMs: number;
}

const DEFAULTS: SingleHandMachineOptions = {
  pinchThreshold: 20,
  scrollVelocityMin: 5,
  multiClickWindowMs: 500,
  clickHistorySize: 3,
  velocityHistory: 5,
  cooldownMs: 250,
};

export interface GestureMachineState {
  hand: Handedness;
  lastGesture: GestureType;
  lastEmission: number | null;
  dragging: boolean;
  pinchEngaged: boolean;
  clickEdges: number[];
}

type RuleContext = {
  pose: HandPoseState;
  now: number;
  pinchRisingEdge: boolean;
};

type GestureRule = {
  name: string;
  matches: (ctx: RuleContext) => boolean;
  fire: (ctx: RuleContext) => GestureEvent;
};

/**
 * Per-hand-slot recognizer. Each frame the first matching rule in
 * {@link SingleHandGestureMachine.rules} decides the event.
 */
export class SingleHandGestureMachine {
  readonly history: PositionHistory;
  private readonly options: SingleHandMachineOptions;
  private readonly cooldown: Cooldown;
  private dragging = false;
  private pinchEngaged = false;
  private observed: { pose: HandPoseState; risingEdge: boolean } | null = null;
  private clickEdges: number[] = [];

  constructor(
    readonly hand: Handedness,
    opts?: Partial<SingleHandMachineOptions>,
    cooldown?: Cooldown
  ) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
    this.cooldown = cooldown ?? new Cooldown(this.options.cooldownMs);
    this.history = new PositionHistory(this.options.velocityHistory);
  }

  readonly rules: readonly GestureRule[] = [
    {
      name: "neutral",
      matches: ({ pose }) => !pose.valid,
      fire: ({ now }) => noGesture(now),
    },
    {
      name: "cursor",
      matches: ({ pose }) => matchesFingers(pose.fingers, INDEX_ONLY),
      fire: ({ pose, now }) => this.cursorMove(pose, now),
    },
    {
      name: "drag",
      matches: ({ pose }) => matchesFingers(pose.fingers, PEACE),
      fire: ({ pose, now }) => {
        if (this.dragging) return this.cursorMove(pose, now);
        if (!this.cooldown.tryTrigger("DRAG_START", now)) return this.cursorMove(pose, now);
        this.dragging = true;
        return { type: "DRAG_START", timestamp: now, hand: this.hand, position: { ...pose.position } };
      },
    },
    {
      name: "drag-end",
      matches: () => this.dragging,
      fire: ({ now }) => {
        if (!this.cooldown.tryTrigger("DRAG_END", now)) return noGesture(now);
        this.dragging = false;
        return { type: "DRAG_END", timestamp: now, hand: this.hand };
      },
    },
    {
      name: "pause",
      matches: ({ pose }) => pose.palm,
      fire: ({ now }) => this.discrete("PAUSE", now),
    },
    {
      name: "confirm",
      matches: ({ pose }) => matchesFingers(pose.fingers, THUMB_ONLY) && pose.thumbTip.y < pose.wrist.y,
      fire: ({ now }) => this.discrete("CONFIRM", now),
    },
    {
      name: "cancel",
      matches: ({ pose }) => matchesFingers(pose.fingers, THUMB_ONLY) && pose.thumbTip.y > pose.wrist.y,
      fire: ({ now }) => this.discrete("CANCEL", now),
    },
    {
      name: "click",
      matches: ({ pinchRisingEdge }) => pinchRisingEdge,
      fire: ({ now }) => this.pinchEdge(now),
    },
    {
      name: "scroll",
      matches: ({ pose }) => pose.fist && Math.abs(pose.velocity.vy) > this.options.scrollVelocityMin,
      fire: ({ pose, now }) => ({ type: "SCROLL", timestamp: now, hand: this.hand, velocity: { ...pose.velocity } }),
    },
  ];

  /**
   * Tracks pinch engagement for one frame and reports a rising edge. Call it
   * for every frame the hand is seen, including frames it is not stepped.
   */
  observePinch(pose: HandPoseState): boolean {
    const pinching = pose.valid && pose.pinchDistance < this.options.pinchThreshold;
    const risingEdge = pinching && !this.pinchEngaged;
    this.pinchEngaged = pinching;
    this.observed = { pose, risingEdge };
    return risingEdge;
  }

  step(pose: HandPoseState, attending: boolean, now: number): GestureEvent {
    const pinchRisingEdge = this.observed?.pose === pose ? this.observed.risingEdge : this.observePinch(pose);
    this.observed = null;

    if (!attending) {
      this.dragging = false;
      return noGesture(now);
    }

    const ctx: RuleContext = { pose, now, pinchRisingEdge };
    const rule = this.rules.find((r) => r.matches(ctx));
    return rule ? rule.fire(ctx) : noGesture(now);
  }

  get isDragging(): boolean {
    return this.dragging;
  }

  /** Clears an active drag without emitting DRAG_END; reports whether one was active. */
  releaseDrag(): boolean {
    const wasDragging = this.dragging;
    this.dragging = false;
    return wasDragging;
  }

  getState(): GestureMachineState {
    return {
      hand: this.hand,
      lastGesture: this.cooldown.lastGesture,
      lastEmission: this.cooldown.lastEmission,
      dragging: this.dragging,
      pinchEngaged: this.pinchEngaged,
      clickEdges: [...this.clickEdges],
    };
  }

  reset(): void {
    this.dragging = false;
    this.pinchEngaged = false;
    this.observed = null;
    this.clickEdges = [];
    this.history.clear();
  }

  private cursorMove(pose: HandPoseState, now: number): GestureEvent {
    return { type: "CURSOR_MOVE", timestamp: now, hand: this.hand, position: { ...pose.position } };
  }

  private discrete(type: "PAUSE" | "CONFIRM" | "CANCEL" | "CLICK" | "DOUBLE_CLICK", now: number): GestureEvent {
    if (!this.cooldown.tryTrigger(type, now)) return noGesture(now);
    return { type, timestamp: now, hand: this.hand };
  }

  private pinchEdge(now: number): GestureEvent {
    this.clickEdges.push(now);
    if (this.clickEdges.length > this.options.clickHistorySize) {
      this.clickEdges.shift();
    }
    const [previous, latest] = this.clickEdges.slice(-2);
    if (this.clickEdges.length >= 2 && latest - previous < this.options.multiClickWindowMs) {
      this.clickEdges = [];
      return this.discrete("DOUBLE_CLICK", now);
    }
    return this.discrete("CLICK", now);
  }
}
