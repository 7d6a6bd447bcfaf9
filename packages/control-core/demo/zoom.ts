import { GestureActionController } from "../src";

const controller = new GestureActionController(
  { execute: (command) => console.log("action:", command) },
  { target: { width: 1920, height: 1080 } }
);
const camera = { width: 640, height: 480 };

controller.handle({ type: "CURSOR_MOVE", timestamp: 0, hand: "Right", position: { x: 320, y: 240 } }, camera);
controller.handle({ type: "ZOOM_IN", timestamp: 300, distanceDelta: 60 }, camera);
controller.handle({ type: "ROTATE_CCW", timestamp: 600, angleDelta: 0.35 }, camera);
