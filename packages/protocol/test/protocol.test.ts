import { describe, expect, it } from "vitest";
import {
  parseGroupingConfig,
  parseTurnEvent,
  parseTurnEventLog,
  ProtocolValidationError
} from "../src/index.js";

describe("turn event schemas", () => {
  it("parses a thought event with a phase hint", () => {
    const parsed = parseTurnEvent({ type: "thought", text: "**Plan**", newPhase: true });

    expect(parsed).toEqual({ type: "thought", text: "**Plan**", newPhase: true });
  });

  it("parses a tool call event with pacing", () => {
    const parsed = parseTurnEvent({
      type: "tool-call",
      fragmentId: "tool-1",
      title: "read_file",
      body: "src/index.ts",
      delayMs: 250
    });

    expect(parsed.type).toBe("tool-call");
    expect(parsed.delayMs).toBe(250);
  });

  it("rejects unknown keys on strict events", () => {
    expect(() => parseTurnEvent({ type: "turn-ended", reason: "done" })).toThrowError(
      ProtocolValidationError
    );
  });

  it("reports the issue path for a missing fragment id", () => {
    let captured: unknown;
    try {
      parseTurnEvent({ type: "toggle", fragmentId: "" });
    } catch (error) {
      captured = error;
    }

    expect(captured).toBeInstanceOf(ProtocolValidationError);
    const validationError = captured as ProtocolValidationError;
    expect(validationError.context).toBe("TurnEvent");
    expect(validationError.issues).toHaveLength(1);
    expect(validationError.issues[0]).toMatch(/^fragmentId: /);
  });
});

describe("turn event logs", () => {
  it("skips blank lines and keeps event order", () => {
    const events = parseTurnEventLog(
      ['{"type":"turn-started"}', "", '{"type":"thought","text":"hi"}', "  "].join("\n")
    );

    expect(events.map((event) => event.type)).toEqual(["turn-started", "thought"]);
  });

  it("names the line of a malformed entry", () => {
    expect(() =>
      parseTurnEventLog(['{"type":"turn-started"}', "{not json"].join("\n"))
    ).toThrowError("Line 2 is not valid JSON");
  });

  it("names the line of an invalid event", () => {
    expect(() =>
      parseTurnEventLog(['{"type":"turn-started"}', '{"type":"nope"}'].join("\n"))
    ).toThrowError(/^TurnEvent on line 2 did not match expected schema/);
  });
});

describe("grouping config schema", () => {
  it("fills defaults", () => {
    expect(parseGroupingConfig({})).toEqual({
      enabled: true,
      spinnerIntervalMs: 100,
      maxLabelLength: 72
    });
  });

  it("rejects a non-positive interval", () => {
    expect(() => parseGroupingConfig({ spinnerIntervalMs: 0 })).toThrowError(
      /spinnerIntervalMs/
    );
  });
});
