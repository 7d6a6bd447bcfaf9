import { faceObservationFromMesh } from "@handcue/gesture-core";
import type { FaceObservation, FrameSize, Handedness, HandObservation, Landmark, Logger } from "@handcue/gesture-core";
import type { HandDetector } from "@tensorflow-models/hand-pose-detection";

export type DetectorInput = Parameters<HandDetector["estimateHands"]>[0];

export interface HandModel {
  /** Resolves to no hands when detection fails; never rejects. */
  estimateHands(input: DetectorInput, size: FrameSize): Promise<HandObservation[]>;
}

export interface TFJSHandModelOptions {
  modelType?: "lite" | "full";
  maxHands?: number;
  solutionPath?: string;
  flipHorizontal?: boolean;
  runtime?: Runtime;
  logger?: Logger;
  /** Replaces the MediaPipe Hands loader, e.g. with a preloaded detector. */
  loadDetector?: DetectorLoader;
}

/** Structural subset of a hand-pose-detection keypoint. */
export interface DetectedKeypoint {
  x: number;
  y: number;
  z?: number;
  score?: number;
  name?: string;
}

export interface DetectedHand {
  keypoints: DetectedKeypoint[];
  handedness: string;
  score?: number;
}

type Runtime = "mediapipe" | "tfjs";
type EstimatingDetector = Pick<HandDetector, "estimateHands">;
export type DetectorLoader = (runtime: Runtime, options: TFJSHandModelOptions) => Promise<EstimatingDetector>;

let tfBackendReady: Promise<void> | null = null;

const loadMediaPipeHands: DetectorLoader = async (runtime, options) => {
  if (runtime === "tfjs") {
    await ensureTfjsBackend(options.logger ?? console);
  }
  const handPoseDetection = await import("@tensorflow-models/hand-pose-detection");
  const { SupportedModels, createDetector } = handPoseDetection;
  const maxHands = options.maxHands ?? 2;
  if (runtime === "tfjs") {
    return createDetector(SupportedModels.MediaPipeHands, {
      runtime: "tfjs",
      modelType: options.modelType ?? "full",
      maxHands,
    });
  }
  return createDetector(SupportedModels.MediaPipeHands, {
    runtime: "mediapipe",
    modelType: options.modelType ?? "lite",
    maxHands,
    solutionPath: options.solutionPath ?? "https://cdn.jsdelivr.net/npm/@mediapipe/hands@0.4.1675469240",
  });
};

class TFJSHandModel implements HandModel {
  private currentRuntime: Runtime;
  private readonly allowFallback: boolean;
  private readonly logger: Logger;
  private detector: Promise<EstimatingDetector> | null = null;

  constructor(private readonly options: TFJSHandModelOptions = {}) {
    this.currentRuntime = options.runtime ?? "mediapipe";
    this.allowFallback = !options.runtime;
    this.logger = options.logger ?? console;
  }

  async estimateHands(input: DetectorInput, size: FrameSize): Promise<HandObservation[]> {
    if (!(size.width > 0 && size.height > 0)) {
      return [];
    }
    try {
      const detector = await this.loadDetector();
      const predictions = await detector.estimateHands(input, { flipHorizontal: !!this.options.flipHorizontal });
      return mapDetectionsToObservations(predictions, size);
    } catch (err) {
      // AbortError happens when video playback is interrupted; skip the frame.
      if (err instanceof Error && err.name === "AbortError") {
        return [];
      }
      this.logger.error(`handtracking-tfjs: estimateHands failed on ${this.currentRuntime}`, err);
      // Re-create the detector next frame, on tfjs when the runtime was not pinned.
      this.detector = null;
      if (this.allowFallback && this.currentRuntime === "mediapipe") {
        this.currentRuntime = "tfjs";
      }
      return [];
    }
  }

  get runtime(): Runtime {
    return this.currentRuntime;
  }

  private loadDetector(): Promise<EstimatingDetector> {
    if (!this.detector) {
      const load = this.options.loadDetector ?? loadMediaPipeHands;
      this.detector = load(this.currentRuntime, this.options);
    }
    return this.detector;
  }
}

export function mapDetectionsToObservations(detections: DetectedHand[], size: FrameSize): HandObservation[] {
  return detections.map((detection) => ({
    handedness: toHandedness(detection.handedness),
    landmarks: normalizeKeypoints(detection.keypoints, size),
    confidence: clamp01(detection.score ?? 0),
  }));
}

/** Face-mesh keypoints (pixels or normalized) to the gaze landmarks. */
export function mapFaceKeypoints(keypoints: DetectedKeypoint[], size: FrameSize): FaceObservation {
  return faceObservationFromMesh(normalizeKeypoints(keypoints, size));
}

function normalizeKeypoints(keypoints: DetectedKeypoint[], size: FrameSize): Landmark[] {
  const width = size.width || 1;
  const height = size.height || 1;
  const normalized = keypoints.every((kp) => kp.x >= 0 && kp.x <= 1 && kp.y >= 0 && kp.y <= 1);
  return keypoints.map((kp) => ({
    x: clamp01(normalized ? kp.x : kp.x / width),
    y: clamp01(normalized ? kp.y : kp.y / height),
    z: kp.z,
  }));
}

function toHandedness(label: string): Handedness {
  return label === "Left" ? "Left" : "Right";
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

async function ensureTfjsBackend(logger: Logger): Promise<void> {
  if (tfBackendReady) return tfBackendReady;
  tfBackendReady = (async () => {
    const tf = await import("@tensorflow/tfjs-core");
    await import("@tensorflow/tfjs-backend-cpu");
    await import("@tensorflow/tfjs-backend-webgl");
    try {
      if (tf.getBackend() !== "webgl" && !(await tf.setBackend("webgl"))) {
        throw new Error("webgl backend unavailable");
      }
      await tf.ready();
    } catch (err) {
      logger.warn("handtracking-tfjs: falling back to the cpu backend", err);
      await tf.setBackend("cpu");
      await tf.ready();
    }
  })();
  return tfBackendReady;
}

export async function createTFJSHandModel(options?: TFJSHandModelOptions): Promise<HandModel> {
  return new TFJSHandModel(options);
}

export class StubHandModel implements HandModel {
  async estimateHands(_input: DetectorInput, _size: FrameSize): Promise<HandObservation[]> {
    return [];
  }
}
