import { attentionOptionsSchema, parseOptions } from "./options";
import type { AttentionGateOptions, ResolvedAttentionOptions } from "./options";
import type { FaceObservation, Landmark } from "./types";

/** Indices into a refined (iris-enabled) 478-point face mesh. */
export const FaceMeshLandmark = {
  LEFT_EYE: 33,
  LEFT_IRIS: 468,
  RIGHT_EYE: 263,
  RIGHT_IRIS: 473,
  NOSE_TIP: 1,
  LEFT_BOUNDARY: 234,
  RIGHT_BOUNDARY: 454,
} as const;

export function faceObservationFromMesh(mesh: readonly Landmark[]): FaceObservation {
  return {
    leftEye: mesh[FaceMeshLandmark.LEFT_EYE],
    leftIris: mesh[FaceMeshLandmark.LEFT_IRIS],
    rightEye: mesh[FaceMeshLandmark.RIGHT_EYE],
    rightIris: mesh[FaceMeshLandmark.RIGHT_IRIS],
    noseTip: mesh[FaceMeshLandmark.NOSE_TIP],
    leftBoundary: mesh[FaceMeshLandmark.LEFT_BOUNDARY],
    rightBoundary: mesh[FaceMeshLandmark.RIGHT_BOUNDARY],
  };
}

/**
 * Single-frame gaze heuristic: eyes roughly centred horizontally, slightly
 * downward vertically, nose inside the central band and the face wide
 * enough to rule out a strong head turn. Missing points mean "not looking".
 */
export function isLookingAtSurface(
  face: FaceObservation | null | undefined,
  opts: ResolvedAttentionOptions
): boolean {
  if (!face) return false;
  const { leftEye, leftIris, rightEye, rightIris, noseTip, leftBoundary, rightBoundary } = face;
  if (!leftEye || !leftIris || !rightEye || !rightIris || !noseTip || !leftBoundary || !rightBoundary) {
    return false;
  }

  const gazeX = (leftIris.x - leftEye.x + (rightIris.x - rightEye.x)) / 2;
  const gazeY = (leftIris.y - leftEye.y + (rightIris.y - rightEye.y)) / 2;
  const faceWidth = Math.abs(rightBoundary.x - leftBoundary.x);
  if (![gazeX, gazeY, noseTip.x, faceWidth].every(Number.isFinite)) return false;

  const lookingForward = Math.abs(gazeX) < opts.maxHorizontalGaze;
  const lookingAtSurface = gazeY > opts.minVerticalGaze && gazeY < opts.maxVerticalGaze;
  const faceCentered = noseTip.x > opts.noseMinX && noseTip.x < opts.noseMaxX;
  const facingCamera = faceWidth > opts.minFaceWidth;

  return lookingForward && lookingAtSurface && faceCentered && facingCamera;
}

export class AttentionGate {
  private readonly options: ResolvedAttentionOptions;
  private readonly votes: boolean[] = [];

  constructor(opts?: AttentionGateOptions) {
    this.options = parseOptions(attentionOptionsSchema, opts, "attention");
  }

  /** Feeds one frame and returns the smoothed attention signal. */
  update(face: FaceObservation | null | undefined): boolean {
    return this.push(isLookingAtSurface(face, this.options));
  }

  push(looking: boolean): boolean {
    this.votes.push(looking);
    if (this.votes.length > this.options.bufferSize) {
      this.votes.shift();
    }
    return this.attending;
  }

  get attending(): boolean {
    if (this.votes.length < this.options.minSamples) return false;
    return this.votes.filter(Boolean).length >= this.options.threshold;
  }

  reset(): void {
    this.votes.length = 0;
  }
}
