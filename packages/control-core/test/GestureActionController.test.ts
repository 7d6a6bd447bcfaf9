import { describe, expect, it, vi } from "vitest";
import type { GestureEvent, Logger } from "@handcue/gesture-core";
import { GestureActionController } from "../src";
import type { ActionCommand, ActionSink } from "../src";

const camera = { width: 640, height: 480 };

function recorder(failOn?: ActionCommand["type"]): ActionSink & { commands: ActionCommand[] } {
  const commands: ActionCommand[] = [];
  return {
    commands,
    execute(command) {
      if (command.type === failOn) throw new Error("sink offline");
      commands.push(command);
    },
  };
}

function controllerWith(sink: ActionSink, logger?: Logger) {
  return new GestureActionController(
    sink,
    { target: { width: 1920, height: 1080 }, smoothing: 1, modifierKey: "ctrl" },
    logger
  );
}

describe("GestureActionController", () => {
  it("moves the pointer through the cursor mapper", () => {
    const sink = recorder();
    controllerWith(sink).handle(
      { type: "CURSOR_MOVE", timestamp: 0, hand: "Right", position: { x: 160, y: 120 } },
      camera
    );
    expect(sink.commands).toEqual([{ type: "MOVE_POINTER", x: 1440, y: 270 }]);
  });

  it("pairs pointer down and up across a drag", () => {
    const sink = recorder();
    const controller = controllerWith(sink);
    const start: GestureEvent = { type: "DRAG_START", timestamp: 0, hand: "Right", position: { x: 320, y: 240 } };
    controller.handle(start, camera);
    controller.handle(start, camera);
    expect(controller.isPointerDown).toBe(true);
    controller.handle({ type: "DRAG_END", timestamp: 300, hand: "Right" }, camera);
    controller.handle({ type: "DRAG_END", timestamp: 600, hand: "Right" }, camera);

    expect(sink.commands.map((c) => c.type)).toEqual([
      "MOVE_POINTER",
      "POINTER_DOWN",
      "MOVE_POINTER",
      "POINTER_UP",
    ]);
  });

  it("releases the pointer when the engine dropped a drag", () => {
    const sink = recorder();
    const controller = controllerWith(sink);
    controller.handle({ type: "DRAG_START", timestamp: 0, hand: "Right", position: { x: 320, y: 240 } }, camera);
    controller.handleFrame(
      { event: { type: "NONE", timestamp: 33 }, attending: false, poses: {}, releasedDrag: true },
      camera
    );
    expect(sink.commands.at(-1)).toEqual({ type: "POINTER_UP" });
    expect(controller.isPointerDown).toBe(false);
  });

  it("converts fist velocity into scroll steps", () => {
    const sink = recorder();
    const controller = controllerWith(sink);
    controller.handle({ type: "SCROLL", timestamp: 0, hand: "Right", velocity: { vx: 0, vy: -8 } }, camera);
    controller.handle({ type: "SCROLL", timestamp: 10, hand: "Right", velocity: { vx: 0, vy: 0.2 } }, camera);
    expect(sink.commands).toEqual([{ type: "SCROLL", amount: 16 }]);
  });

  it("maps discrete gestures to keys", () => {
    const sink = recorder();
    const controller = controllerWith(sink);
    const events: GestureEvent[] = [
      { type: "CLICK", timestamp: 0, hand: "Right" },
      { type: "DOUBLE_CLICK", timestamp: 0, hand: "Right" },
      { type: "ZOOM_IN", timestamp: 0, distanceDelta: 60 },
      { type: "ZOOM_OUT", timestamp: 0, distanceDelta: -60 },
      { type: "ROTATE_CW", timestamp: 0, angleDelta: -0.4 },
      { type: "ROTATE_CCW", timestamp: 0, angleDelta: 0.4 },
      { type: "PAUSE", timestamp: 0, hand: "Right" },
      { type: "CONFIRM", timestamp: 0, hand: "Right" },
      { type: "CANCEL", timestamp: 0, hand: "Right" },
      { type: "NONE", timestamp: 0 },
    ];
    events.forEach((event) => controller.handle(event, camera));
    expect(sink.commands).toEqual([
      { type: "CLICK" },
      { type: "DOUBLE_CLICK" },
      { type: "HOTKEY", keys: ["ctrl", "plus"] },
      { type: "HOTKEY", keys: ["ctrl", "minus"] },
      { type: "ROTATE", direction: "CW" },
      { type: "ROTATE", direction: "CCW" },
      { type: "PRESS", key: "space" },
      { type: "PRESS", key: "enter" },
      { type: "PRESS", key: "escape" },
    ]);
  });

  it("logs sink failures without throwing", () => {
    const logger: Logger = { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const sink = recorder("CLICK");
    const controller = controllerWith(sink, logger);
    expect(() => controller.handle({ type: "CLICK", timestamp: 0, hand: "Right" }, camera)).not.toThrow();
    expect(logger.error).toHaveBeenCalledWith("control-core: CLICK failed", expect.any(Error));
  });

  it("stays released when pressing fails", () => {
    const logger: Logger = { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const controller = controllerWith(recorder("POINTER_DOWN"), logger);
    controller.handle({ type: "DRAG_START", timestamp: 0, hand: "Right", position: { x: 0, y: 0 } }, camera);
    expect(controller.isPointerDown).toBe(false);
  });

  it("releases the pointer on reset", () => {
    const sink = recorder();
    const controller = controllerWith(sink);
    controller.handle({ type: "DRAG_START", timestamp: 0, hand: "Right", position: { x: 0, y: 0 } }, camera);
    controller.reset();
    expect(sink.commands.at(-1)).toEqual({ type: "POINTER_UP" });
  });
});
