export type Handedness = "Left" | "Right";

export interface Landmark {
  x: number;
  y: number;
  z?: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface Velocity {
  vx: number;
  vy: number;
}

export interface HandObservation {
  handedness: Handedness;
  landmarks: Landmark[];
  confidence: number;
}

/** Gaze-relevant subset of a face mesh. Any point may be missing. */
export interface FaceObservation {
  leftEye?: Landmark;
  leftIris?: Landmark;
  rightEye?: Landmark;
  rightIris?: Landmark;
  noseTip?: Landmark;
  leftBoundary?: Landmark;
  rightBoundary?: Landmark;
}

export interface FrameSize {
  width: number;
  height: number;
}

export interface HandFrame extends FrameSize {
  hands: HandObservation[];
  face?: FaceObservation | null;
  /** Milliseconds, monotonically increasing. */
  timestamp: number;
}

/** [thumb, index, middle, ring, pinky] */
export type FingerFlags = readonly [boolean, boolean, boolean, boolean, boolean];

export interface HandPoseState {
  /** Index fingertip in pixels. */
  position: Point;
  fingers: FingerFlags;
  /** No finger extended. Always false when `valid` is false. */
  fist: boolean;
  palm: boolean;
  /** Thumb tip to index tip, pixels. */
  pinchDistance: number;
  /** Pixels per frame. */
  velocity: Velocity;
  thumbTip: Point;
  wrist: Point;
  /** False for the neutral pose substituted for malformed observations. */
  valid: boolean;
}

export interface Logger {
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}
