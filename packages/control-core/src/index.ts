export * from "./types";
export * from "./CursorMapper";
export * from "./GestureActionController";
