export * from "./types.js";
export * from "./stateMachine.js";
export * from "./schedule.js";
export * from "./titles.js";
export * from "./validators.js";
export * from "./redaction.js";
