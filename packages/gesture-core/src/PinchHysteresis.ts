import { z } from "zod";
import { parseOptions } from "./options";

const hysteresisOptionsSchema = z.object({
  /** Pixels; a hold starts below this distance. */
  engageThreshold: z.number().positive().default(40),
  /** The hold ends above engageThreshold × releaseMultiplier. */
  releaseMultiplier: z.number().min(1).default(1.5),
});

export type PinchHysteresisOptions = z.input<typeof hysteresisOptionsSchema>;

export type PinchTransition = "engaged" | "released" | null;

/** Pick-and-hold pinch with a strict engage and a loose release threshold. */
export class PinchHysteresis {
  readonly engageThreshold: number;
  readonly releaseThreshold: number;
  private holding = false;

  constructor(opts?: PinchHysteresisOptions) {
    const options = parseOptions(hysteresisOptionsSchema, opts, "pinch hysteresis");
    this.engageThreshold = options.engageThreshold;
    this.releaseThreshold = options.engageThreshold * options.releaseMultiplier;
  }

  update(pinchDistance: number): PinchTransition {
    if (this.holding) {
      if (pinchDistance < this.releaseThreshold) return null;
      this.holding = false;
      return "released";
    }
    if (pinchDistance < this.engageThreshold) {
      this.holding = true;
      return "engaged";
    }
    return null;
  }

  get isHolding(): boolean {
    return this.holding;
  }

  reset(): void {
    this.holding = false;
  }
}
