import type { FingerFlags, FrameSize, HandObservation, HandPoseState, Landmark, Point, Velocity } from "./types";

export const HandLandmark = {
  WRIST: 0,
  THUMB_IP: 3,
  THUMB_TIP: 4,
  INDEX_PIP: 6,
  INDEX_TIP: 8,
  MIDDLE_PIP: 10,
  MIDDLE_TIP: 12,
  RING_PIP: 14,
  RING_TIP: 16,
  PINKY_PIP: 18,
  PINKY_TIP: 20,
} as const;

export const HAND_LANDMARK_COUNT = 21;

export interface ClassifierOptions {
  fingerExtensionRatio: number;
  thumbExtensionRatio: number;
}

const DEFAULTS: ClassifierOptions = {
  fingerExtensionRatio: 1.15,
  thumbExtensionRatio: 1.2,
};

/** Bounded FIFO of fingertip positions feeding the velocity estimate. */
export class PositionHistory {
  private readonly points: Point[] = [];

  constructor(private readonly capacity = 5) {
    if (capacity < 2) {
      throw new Error(`PositionHistory capacity must be at least 2, got ${capacity}`);
    }
  }

  push(point: Point): void {
    this.points.push({ ...point });
    if (this.points.length > this.capacity) {
      this.points.shift();
    }
  }

  velocity(): Velocity {
    if (this.points.length < 2) return { vx: 0, vy: 0 };
    const first = this.points[0];
    const last = this.points[this.points.length - 1];
    const frames = this.points.length - 1;
    return { vx: (last.x - first.x) / frames, vy: (last.y - first.y) / frames };
  }

  get size(): number {
    return this.points.length;
  }

  clear(): void {
    this.points.length = 0;
  }
}

export function neutralPose(): HandPoseState {
  return {
    position: { x: 0, y: 0 },
    fingers: [false, false, false, false, false],
    fist: false,
    palm: false,
    pinchDistance: Number.POSITIVE_INFINITY,
    velocity: { vx: 0, vy: 0 },
    thumbTip: { x: 0, y: 0 },
    wrist: { x: 0, y: 0 },
    valid: false,
  };
}

/**
 * Derives the instantaneous pose of one hand. Never throws: malformed
 * observations yield {@link neutralPose} and leave the history untouched.
 */
export function classifyHand(
  observation: HandObservation,
  frame: FrameSize,
  history: PositionHistory,
  opts: Partial<ClassifierOptions> = {}
): HandPoseState {
  const options = { ...DEFAULTS, ...opts };
  const landmarks = observation.landmarks;
  if (!isWellFormed(landmarks) || !isValidFrame(frame)) {
    return neutralPose();
  }

  const wrist = landmarks[HandLandmark.WRIST];
  const isExtended = (tip: number, joint: number, ratio: number) =>
    distance2D(landmarks[tip], wrist) > distance2D(landmarks[joint], wrist) * ratio;

  const fingers: FingerFlags = [
    isExtended(HandLandmark.THUMB_TIP, HandLandmark.THUMB_IP, options.thumbExtensionRatio),
    isExtended(HandLandmark.INDEX_TIP, HandLandmark.INDEX_PIP, options.fingerExtensionRatio),
    isExtended(HandLandmark.MIDDLE_TIP, HandLandmark.MIDDLE_PIP, options.fingerExtensionRatio),
    isExtended(HandLandmark.RING_TIP, HandLandmark.RING_PIP, options.fingerExtensionRatio),
    isExtended(HandLandmark.PINKY_TIP, HandLandmark.PINKY_PIP, options.fingerExtensionRatio),
  ];

  const position = toPixels(landmarks[HandLandmark.INDEX_TIP], frame);
  const thumbTip = toPixels(landmarks[HandLandmark.THUMB_TIP], frame);
  history.push(position);

  return {
    position,
    fingers,
    fist: fingers.every((f) => !f),
    palm: fingers.every((f) => f),
    pinchDistance: distance2D(thumbTip, position),
    velocity: history.velocity(),
    thumbTip,
    wrist: toPixels(wrist, frame),
    valid: true,
  };
}

export function toPixels(landmark: Landmark, frame: FrameSize): Point {
  return { x: Math.trunc(landmark.x * frame.width), y: Math.trunc(landmark.y * frame.height) };
}

export function distance2D(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function matchesFingers(fingers: FingerFlags, pattern: FingerFlags): boolean {
  return fingers.every((f, i) => f === pattern[i]);
}

function isWellFormed(landmarks: Landmark[] | undefined): landmarks is Landmark[] {
  if (!Array.isArray(landmarks) || landmarks.length < HAND_LANDMARK_COUNT) return false;
  return landmarks.every((l) => l !== undefined && l !== null && Number.isFinite(l.x) && Number.isFinite(l.y));
}

function isValidFrame(frame: FrameSize): boolean {
  return Number.isFinite(frame.width) && Number.isFinite(frame.height) && frame.width > 0 && frame.height > 0;
}
