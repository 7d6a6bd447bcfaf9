import type { FaceObservation, FingerFlags, Handedness, HandObservation, HandPoseState, Landmark } from "../src";

// x offset of each finger column from the wrist: thumb, index, middle, ring, pinky
const FINGER_COLUMNS = [-0.15, -0.05, 0, 0.05, 0.1];
const JOINTS = [3, 6, 10, 14, 18];
const TIPS = [4, 8, 12, 16, 20];

export const NONE_EXTENDED: FingerFlags = [false, false, false, false, false];
export const ALL_EXTENDED: FingerFlags = [true, true, true, true, true];

type HandSpec = {
  handedness?: Handedness;
  fingers?: FingerFlags;
  offset?: [number, number];
  thumbTip?: [number, number];
};

/**
 * Wrist at (0.5, 0.8) + offset; joints at y=0.7, extended tips at y=0.55,
 * curled tips at y=0.75.
 */
export function buildHand({ handedness = "Right", fingers = NONE_EXTENDED, offset = [0, 0], thumbTip }: HandSpec = {}): HandObservation {
  const [ox, oy] = offset;
  const wrist: Landmark = { x: 0.5 + ox, y: 0.8 + oy, z: 0 };
  const landmarks: Landmark[] = Array.from({ length: 21 }, () => ({ ...wrist }));
  fingers.forEach((extended, i) => {
    const x = 0.5 + FINGER_COLUMNS[i] + ox;
    landmarks[JOINTS[i]] = { x, y: 0.7 + oy, z: 0 };
    landmarks[TIPS[i]] = { x, y: (extended ? 0.55 : 0.75) + oy, z: 0 };
  });
  if (thumbTip) {
    landmarks[4] = { x: thumbTip[0], y: thumbTip[1], z: 0 };
  }
  return { handedness, landmarks, confidence: 0.9 };
}

/** Fist with the thumb tip resting on the curled index tip. */
export function pinchingHand(handedness: Handedness = "Right"): HandObservation {
  return buildHand({ handedness, thumbTip: [0.45, 0.75] });
}

export function pose(overrides: Partial<HandPoseState> = {}): HandPoseState {
  const fingers = overrides.fingers ?? NONE_EXTENDED;
  return {
    position: { x: 100, y: 100 },
    fingers,
    fist: fingers.every((f) => !f),
    palm: fingers.every((f) => f),
    pinchDistance: 100,
    velocity: { vx: 0, vy: 0 },
    thumbTip: { x: 80, y: 60 },
    wrist: { x: 100, y: 200 },
    valid: true,
    ...overrides,
  };
}

export function lookingFace(overrides: Partial<FaceObservation> = {}): FaceObservation {
  return {
    leftEye: { x: 0.4, y: 0.4 },
    leftIris: { x: 0.4, y: 0.405 },
    rightEye: { x: 0.6, y: 0.4 },
    rightIris: { x: 0.6, y: 0.405 },
    noseTip: { x: 0.5, y: 0.5 },
    leftBoundary: { x: 0.3, y: 0.45 },
    rightBoundary: { x: 0.7, y: 0.45 },
    ...overrides,
  };
}

/** Deterministic pseudo-random sequence for property-style tests. */
export function lcg(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}
