import type { FrameSize, GestureEvent, GestureFrameResult, Logger, Point } from "@handcue/gesture-core";
import { CursorMapper } from "./CursorMapper";
import type { ActionCommand, ActionSink, GestureActionConfig } from "./types";

const DEFAULT_CONFIG = {
  scrollScale: 2,
  modifierKey: process.platform === "darwin" ? "command" : "ctrl",
};

function assertNever(value: never): never {
  throw new Error(`Unhandled gesture: ${JSON.stringify(value)}`);
}

export class GestureActionController {
  private readonly config: Required<Pick<GestureActionConfig, "scrollScale" | "modifierKey">>;
  private readonly cursor: CursorMapper;
  private pointerDown = false;

  constructor(
    private readonly sink: ActionSink,
    config: GestureActionConfig,
    private readonly logger: Logger = console
  ) {
    this.config = {
      scrollScale: config.scrollScale ?? DEFAULT_CONFIG.scrollScale,
      modifierKey: config.modifierKey ?? DEFAULT_CONFIG.modifierKey,
    };
    this.cursor = new CursorMapper(config);
  }

  /** Applies one engine result, releasing the pointer first when a drag was dropped. */
  handleFrame(result: GestureFrameResult, frame: FrameSize): void {
    if (result.releasedDrag) {
      this.releasePointer();
    }
    this.handle(result.event, frame);
  }

  handle(event: GestureEvent, frame: FrameSize): void {
    switch (event.type) {
      case "NONE":
        break;
      case "CURSOR_MOVE":
        this.moveTo(event.position, frame);
        break;
      case "CLICK":
        this.dispatch({ type: "CLICK" });
        break;
      case "DOUBLE_CLICK":
        this.dispatch({ type: "DOUBLE_CLICK" });
        break;
      case "DRAG_START":
        this.moveTo(event.position, frame);
        if (!this.pointerDown && this.dispatch({ type: "POINTER_DOWN" })) {
          this.pointerDown = true;
        }
        break;
      case "DRAG_END":
        this.releasePointer();
        break;
      case "SCROLL": {
        // upward hand motion scrolls up
        const amount = Math.trunc(-event.velocity.vy * this.config.scrollScale);
        if (amount !== 0) this.dispatch({ type: "SCROLL", amount });
        break;
      }
      case "ZOOM_IN":
        this.dispatch({ type: "HOTKEY", keys: [this.config.modifierKey, "plus"] });
        break;
      case "ZOOM_OUT":
        this.dispatch({ type: "HOTKEY", keys: [this.config.modifierKey, "minus"] });
        break;
      case "ROTATE_CW":
        this.dispatch({ type: "ROTATE", direction: "CW" });
        break;
      case "ROTATE_CCW":
        this.dispatch({ type: "ROTATE", direction: "CCW" });
        break;
      case "PAUSE":
        this.dispatch({ type: "PRESS", key: "space" });
        break;
      case "CONFIRM":
        this.dispatch({ type: "PRESS", key: "enter" });
        break;
      case "CANCEL":
        this.dispatch({ type: "PRESS", key: "escape" });
        break;
      default:
        assertNever(event);
    }
  }

  get isPointerDown(): boolean {
    return this.pointerDown;
  }

  reset(): void {
    this.releasePointer();
    this.cursor.reset();
  }

  private moveTo(position: Point, frame: FrameSize): void {
    const { x, y } = this.cursor.map(position, frame);
    this.dispatch({ type: "MOVE_POINTER", x, y });
  }

  private releasePointer(): void {
    if (!this.pointerDown) return;
    // cleared even if the sink fails, so a later DRAG_START can press again
    this.pointerDown = false;
    this.dispatch({ type: "POINTER_UP" });
  }

  private dispatch(command: ActionCommand): boolean {
    try {
      this.sink.execute(command);
      return true;
    } catch (err) {
      this.logger.error(`control-core: ${command.type} failed`, err);
      return false;
    }
  }
}
