import { describe, expect, it } from "vitest";
import { classifyHand, neutralPose, PositionHistory } from "../src";
import { ALL_EXTENDED, buildHand, pinchingHand } from "./fixtures";

const frame = { width: 640, height: 480 };

describe("classifyHand", () => {
  it("detects the index-only pattern", () => {
    const state = classifyHand(buildHand({ fingers: [false, true, false, false, false] }), frame, new PositionHistory());
    expect(state.fingers).toEqual([false, true, false, false, false]);
    expect(state.fist).toBe(false);
    expect(state.palm).toBe(false);
    expect(state.valid).toBe(true);
  });

  it("reports the index fingertip in pixels", () => {
    const state = classifyHand(buildHand({ fingers: [false, true, false, false, false] }), frame, new PositionHistory());
    expect(state.position).toEqual({ x: 288, y: 264 });
  });

  it("flags palm and fist", () => {
    expect(classifyHand(buildHand({ fingers: ALL_EXTENDED }), frame, new PositionHistory()).palm).toBe(true);
    const fist = classifyHand(buildHand(), frame, new PositionHistory());
    expect(fist.fist).toBe(true);
    expect(fist.palm).toBe(false);
  });

  it("measures pinch distance in pixels", () => {
    expect(classifyHand(pinchingHand(), frame, new PositionHistory()).pinchDistance).toBe(0);
    // curled thumb tip (0.35, 0.75) vs curled index tip (0.45, 0.75)
    expect(classifyHand(buildHand(), frame, new PositionHistory()).pinchDistance).toBeCloseTo(64, 0);
  });

  it("honours the extension ratio", () => {
    // index tip/joint distance ratio is about 2.28
    const hand = buildHand({ fingers: [false, true, false, false, false] });
    expect(classifyHand(hand, frame, new PositionHistory(), { fingerExtensionRatio: 2 }).fingers[1]).toBe(true);
    expect(classifyHand(hand, frame, new PositionHistory(), { fingerExtensionRatio: 2.5 }).fingers[1]).toBe(false);
  });

  it("averages velocity over the history", () => {
    const history = new PositionHistory(5);
    classifyHand(buildHand({ offset: [0, 0] }), frame, history);
    classifyHand(buildHand({ offset: [0, 0.05] }), frame, history);
    const state = classifyHand(buildHand({ offset: [0, 0.1] }), frame, history);
    expect(state.velocity.vx).toBeCloseTo(0, 5);
    expect(state.velocity.vy).toBeCloseTo(24, 0);
  });

  it("returns zero velocity on the first sample", () => {
    const state = classifyHand(buildHand(), frame, new PositionHistory());
    expect(state.velocity).toEqual({ vx: 0, vy: 0 });
  });

  it("substitutes the neutral pose for truncated observations", () => {
    const history = new PositionHistory();
    const hand = buildHand();
    const state = classifyHand({ ...hand, landmarks: hand.landmarks.slice(0, 10) }, frame, history);
    expect(state).toEqual(neutralPose());
    expect(state.pinchDistance).toBe(Number.POSITIVE_INFINITY);
    // no finger is extended, yet the neutral pose is not a fist
    expect(state.fingers).toEqual([false, false, false, false, false]);
    expect(state.fist).toBe(false);
    expect(history.size).toBe(0);
  });

  it("substitutes the neutral pose for non-finite coordinates", () => {
    const hand = buildHand();
    hand.landmarks[8] = { x: Number.NaN, y: 0.5 };
    expect(classifyHand(hand, frame, new PositionHistory()).valid).toBe(false);
  });

  it("substitutes the neutral pose for an empty frame size", () => {
    expect(classifyHand(buildHand(), { width: 0, height: 480 }, new PositionHistory()).valid).toBe(false);
  });

  it("is stable for a static hand", () => {
    const history = new PositionHistory();
    const hand = buildHand({ fingers: [false, true, true, false, false] });
    const states = Array.from({ length: 6 }, () => classifyHand(hand, frame, history));
    for (const state of states) {
      expect(state).toEqual(states[0]);
    }
  });
});

describe("PositionHistory", () => {
  it("keeps only the most recent entries", () => {
    const history = new PositionHistory(3);
    [0, 10, 20, 30].forEach((y) => history.push({ x: 0, y }));
    expect(history.size).toBe(3);
    // oldest kept is y=10
    expect(history.velocity()).toEqual({ vx: 0, vy: 10 });
  });

  it("rejects capacities below two", () => {
    expect(() => new PositionHistory(1)).toThrow(/at least 2/);
  });
});
