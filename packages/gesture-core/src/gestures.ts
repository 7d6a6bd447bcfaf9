import type { Handedness, Point, Velocity } from "./types";

export const GESTURE_TYPES = [
  "NONE",
  "CURSOR_MOVE",
  "CLICK",
  "DOUBLE_CLICK",
  "SCROLL",
  "DRAG_START",
  "DRAG_END",
  "PAUSE",
  "CONFIRM",
  "CANCEL",
  "ZOOM_IN",
  "ZOOM_OUT",
  "ROTATE_CW",
  "ROTATE_CCW",
] as const;

export type GestureType = (typeof GESTURE_TYPES)[number];

type HandEvent<T extends GestureType> = { type: T; timestamp: number; hand: Handedness };
type CompositeEvent<T extends GestureType> = { type: T; timestamp: number };

export type GestureEvent =
  | { type: "NONE"; timestamp: number }
  | (HandEvent<"CURSOR_MOVE"> & { position: Point })
  | (HandEvent<"SCROLL"> & { velocity: Velocity })
  | HandEvent<"CLICK">
  | HandEvent<"DOUBLE_CLICK">
  | (HandEvent<"DRAG_START"> & { position: Point })
  | HandEvent<"DRAG_END">
  | HandEvent<"PAUSE">
  | HandEvent<"CONFIRM">
  | HandEvent<"CANCEL">
  | (CompositeEvent<"ZOOM_IN"> & { distanceDelta: number })
  | (CompositeEvent<"ZOOM_OUT"> & { distanceDelta: number })
  | (CompositeEvent<"ROTATE_CW"> & { angleDelta: number })
  | (CompositeEvent<"ROTATE_CCW"> & { angleDelta: number });

export type ContinuousGestureType = "CURSOR_MOVE" | "SCROLL";

/** Continuous gestures repeat every frame and bypass the cooldown. */
export function isContinuousGesture(type: GestureType): type is ContinuousGestureType {
  return type === "CURSOR_MOVE" || type === "SCROLL";
}

export function noGesture(timestamp: number): GestureEvent {
  return { type: "NONE", timestamp };
}
