export * from "./config.js";
export * from "./controller.js";
export * from "./document-surface.js";
export * from "./errors.js";
export * from "./label.js";
export * from "./lifecycle.js";
export * from "./logger.js";
export * from "./session.js";
export * from "./spinner.js";
export * from "./text-surface.js";
export * from "./visibility.js";
