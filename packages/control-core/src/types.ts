import type { FrameSize } from "@handcue/gesture-core";

export type ActionCommand =
  | { type: "MOVE_POINTER"; x: number; y: number }
  | { type: "POINTER_DOWN" }
  | { type: "POINTER_UP" }
  | { type: "CLICK" }
  | { type: "DOUBLE_CLICK" }
  | { type: "SCROLL"; amount: number }
  | { type: "HOTKEY"; keys: string[] }
  | { type: "PRESS"; key: string }
  | { type: "ROTATE"; direction: "CW" | "CCW" };

/** Performs the side effect (OS input, game logic) for one command. */
export interface ActionSink {
  execute(command: ActionCommand): void;
}

export type TargetSize = FrameSize;

export interface CursorMapperConfig {
  target: TargetSize;
  /** Flip horizontally to undo a front camera's mirror image. Default: true */
  mirror?: boolean;
  /** Moving-average window over mapped positions. Default: 5 */
  smoothing?: number;
}

export interface GestureActionConfig extends CursorMapperConfig {
  /** Scroll amount per pixel/frame of vertical fist velocity. Default: 2 */
  scrollScale?: number;
  /** Modifier used for zoom hotkeys. Default: "command" on macOS, "ctrl" elsewhere */
  modifierKey?: string;
}
