import { ProtocolValidationError } from "@turnfold/protocol";
import { describe, expect, it } from "vitest";
import { resolveGroupingConfig } from "../src/config.js";
import { GroupingConfigError } from "../src/errors.js";

describe("resolveGroupingConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(resolveGroupingConfig({})).toEqual({
      enabled: true,
      spinnerIntervalMs: 100,
      maxLabelLength: 72
    });
  });

  it("accepts common spellings for the grouping switch", () => {
    expect(resolveGroupingConfig({ TURNFOLD_GROUPING: "off" }).enabled).toBe(false);
    expect(resolveGroupingConfig({ TURNFOLD_GROUPING: " FALSE " }).enabled).toBe(false);
    expect(resolveGroupingConfig({ TURNFOLD_GROUPING: "1" }).enabled).toBe(true);
    expect(resolveGroupingConfig({ TURNFOLD_GROUPING: "" }).enabled).toBe(true);
  });

  it("reads the spinner interval", () => {
    expect(resolveGroupingConfig({ TURNFOLD_SPINNER_INTERVAL_MS: "50" }).spinnerIntervalMs).toBe(
      50
    );
  });

  it("rejects an unknown switch value", () => {
    expect(() => resolveGroupingConfig({ TURNFOLD_GROUPING: "maybe" })).toThrowError(
      GroupingConfigError
    );
  });

  it("rejects a non-numeric interval", () => {
    expect(() => resolveGroupingConfig({ TURNFOLD_SPINNER_INTERVAL_MS: "fast" })).toThrowError(
      'Invalid value for TURNFOLD_SPINNER_INTERVAL_MS: "fast"'
    );
  });

  it("rejects a zero interval through the schema", () => {
    expect(() => resolveGroupingConfig({ TURNFOLD_SPINNER_INTERVAL_MS: "0" })).toThrowError(
      ProtocolValidationError
    );
  });
});
