import { type GroupingConfig, parseGroupingConfig } from "@turnfold/protocol";
import { GroupingConfigError } from "./errors.js";

const ENABLED_VALUES = new Set(["1", "true", "on", "yes"]);
const DISABLED_VALUES = new Set(["0", "false", "off", "no"]);

function parseToggle(variable: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (ENABLED_VALUES.has(value)) {
    return true;
  }
  if (DISABLED_VALUES.has(value)) {
    return false;
  }
  throw new GroupingConfigError(variable, raw);
}

function parseInteger(variable: string, raw: string): number {
  const value = raw.trim();
  if (!/^-?\d+$/.test(value)) {
    throw new GroupingConfigError(variable, raw);
  }
  return Number(value);
}

/**
 * Reads TURNFOLD_GROUPING and TURNFOLD_SPINNER_INTERVAL_MS; anything unset
 * falls back to the schema defaults.
 */
export function resolveGroupingConfig(env: NodeJS.ProcessEnv = process.env): GroupingConfig {
  const raw: Record<string, unknown> = {};

  const grouping = env["TURNFOLD_GROUPING"];
  if (grouping !== undefined && grouping.trim() !== "") {
    raw["enabled"] = parseToggle("TURNFOLD_GROUPING", grouping);
  }

  const interval = env["TURNFOLD_SPINNER_INTERVAL_MS"];
  if (interval !== undefined && interval.trim() !== "") {
    raw["spinnerIntervalMs"] = parseInteger("TURNFOLD_SPINNER_INTERVAL_MS", interval);
  }

  return parseGroupingConfig(raw);
}
