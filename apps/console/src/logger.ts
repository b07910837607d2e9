import pino from "pino";

const level = process.env["LOG_LEVEL"] ?? "warn";

// stdout carries the rendered document.
export const logger = pino(
  {
    name: "turnfold-console",
    level
  },
  pino.destination(2)
);
