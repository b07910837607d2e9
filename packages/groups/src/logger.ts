import { type Logger, pino } from "pino";

const level = process.env["LOG_LEVEL"] ?? "info";

export const logger: Logger = pino({
  name: "turnfold",
  level
});
