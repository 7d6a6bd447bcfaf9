export * from "./types";
export * from "./gestures";
export * from "./options";
export * from "./Cooldown";
export * from "./HandPoseClassifier";
export * from "./SingleHandGestureMachine";
export * from "./TwoHandCompositeTracker";
export * from "./AttentionGate";
export * from "./PinchHysteresis";
export * from "./DwellTracker";
export * from "./GestureEngine";
