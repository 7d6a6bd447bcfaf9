import { parseOptions } from "@handcue/gesture-core";
import type { FrameSize, Point } from "@handcue/gesture-core";
import { z } from "zod";
import type { CursorMapperConfig, TargetSize } from "./types";

const cursorMapperSchema = z.object({
  target: z.object({
    width: z.number().min(1),
    height: z.number().min(1),
  }),
  mirror: z.boolean().default(true),
  smoothing: z.number().int().min(1).default(5),
});

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/** Camera pixels to target pixels, clamped to the target bounds. */
export function mapToTarget(point: Point, frame: FrameSize, target: TargetSize, mirror: boolean): Point {
  const nx = point.x / frame.width;
  const ny = point.y / frame.height;
  const x = Math.trunc((mirror ? 1 - nx : nx) * target.width);
  const y = Math.trunc(ny * target.height);
  return {
    x: clamp(Number.isFinite(x) ? x : 0, 0, target.width - 1),
    y: clamp(Number.isFinite(y) ? y : 0, 0, target.height - 1),
  };
}

export class CursorMapper {
  private readonly target: TargetSize;
  private readonly mirror: boolean;
  private readonly smoothing: number;
  private window: Point[] = [];

  constructor(config: CursorMapperConfig) {
    const options = parseOptions(cursorMapperSchema, config, "cursor mapper");
    this.target = options.target;
    this.mirror = options.mirror;
    this.smoothing = options.smoothing;
  }

  /** Maps one position and returns the mean of the recent mapped positions. */
  map(point: Point, frame: FrameSize): Point {
    this.window.push(mapToTarget(point, frame, this.target, this.mirror));
    if (this.window.length > this.smoothing) {
      this.window.shift();
    }
    const sum = this.window.reduce((acc, p) => ({ x: acc.x + p.x, y: acc.y + p.y }), { x: 0, y: 0 });
    return { x: Math.floor(sum.x / this.window.length), y: Math.floor(sum.y / this.window.length) };
  }

  reset(): void {
    this.window = [];
  }
}
