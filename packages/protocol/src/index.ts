export * from "./common.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./turn-events.js";
