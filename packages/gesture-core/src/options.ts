import { z } from "zod";
import type { Logger } from "./types";

export class GestureConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(label: string, issues: z.ZodIssue[]) {
    const details = issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
    super(`Invalid ${label} options: ${details}`);
    this.name = "GestureConfigError";
    this.issues = issues;
  }
}

export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new GestureConfigError(label, result.error.issues);
  }
  return result.data;
}

export const attentionOptionsSchema = z
  .object({
    bufferSize: z.number().int().min(1).default(10),
    /** Looking votes in the buffer needed to report attention. */
    threshold: z.number().int().min(1).default(3),
    /** Samples required before the gate can open at all. */
    minSamples: z.number().int().min(1).default(3),
    maxHorizontalGaze: z.number().positive().default(0.015),
    minVerticalGaze: z.number().default(-0.005),
    maxVerticalGaze: z.number().default(0.02),
    noseMinX: z.number().min(0).max(1).default(0.3),
    noseMaxX: z.number().min(0).max(1).default(0.7),
    minFaceWidth: z.number().min(0).default(0.15),
  })
  .superRefine((opts, ctx) => {
    if (opts.threshold > opts.bufferSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["threshold"],
        message: "must not exceed bufferSize",
      });
    }
    if (opts.minSamples > opts.bufferSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["minSamples"],
        message: "must not exceed bufferSize",
      });
    }
    if (opts.minVerticalGaze >= opts.maxVerticalGaze) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["minVerticalGaze"],
        message: "must be below maxVerticalGaze",
      });
    }
  });

export const gestureOptionsSchema = z.object({
  /** Thumb-to-index distance in pixels below which a pinch is engaged. */
  pinchThreshold: z.number().positive().default(20),
  cooldownMs: z.number().min(0).default(250),
  fingerExtensionRatio: z.number().min(1).default(1.15),
  thumbExtensionRatio: z.number().min(1).default(1.2),
  velocityHistory: z.number().int().min(2).default(5),
  /** Minimum |vy| in pixels per frame for a fist to scroll. */
  scrollVelocityMin: z.number().min(0).default(5),
  multiClickWindowMs: z.number().positive().default(500),
  clickHistorySize: z.number().int().min(2).default(3),
  twoHandDistanceThreshold: z.number().positive().default(50),
  /** Radians. */
  twoHandRotationThreshold: z.number().positive().max(Math.PI).default(0.3),
  enableTwoHand: z.boolean().default(true),
  enableFaceTracking: z.boolean().default(true),
  dominantHand: z.enum(["Left", "Right"]).default("Right"),
  attention: attentionOptionsSchema.default({}),
});

export type AttentionGateOptions = z.input<typeof attentionOptionsSchema>;
export type ResolvedAttentionOptions = z.output<typeof attentionOptionsSchema>;

export type GestureEngineOptions = z.input<typeof gestureOptionsSchema> & { logger?: Logger };
export type ResolvedGestureOptions = z.output<typeof gestureOptionsSchema>;

export function resolveGestureOptions(opts?: GestureEngineOptions): ResolvedGestureOptions {
  const { logger: _logger, ...rest } = opts ?? {};
  return parseOptions(gestureOptionsSchema, rest, "gesture engine");
}

export const defaultGestureOptions: ResolvedGestureOptions = resolveGestureOptions();

export const presets = {
  /** Single hand, no face tracking, light smoothing downstream. */
  fastMode: (): GestureEngineOptions => ({
    enableTwoHand: false,
    enableFaceTracking: false,
  }),
  accurateMode: (): GestureEngineOptions => ({
    attention: { threshold: 5, minSamples: 5 },
  }),
  twoHandMode: (): GestureEngineOptions => ({
    enableTwoHand: true,
    enableFaceTracking: true,
  }),
};
