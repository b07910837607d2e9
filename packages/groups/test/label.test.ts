import { describe, expect, it } from "vitest";
import { deriveLabel, stripMarkup } from "../src/label.js";

describe("stripMarkup", () => {
  it("drops strong markers and trims", () => {
    expect(stripMarkup("**Thinking** about ")).toBe("Thinking about");
  });

  it("unwraps single emphasis around words", () => {
    expect(stripMarkup("Use *careful* steps and __bold__ text")).toBe(
      "Use careful steps and bold text"
    );
  });

  it("leaves identifiers with underscores alone", () => {
    expect(stripMarkup("read config_file_name")).toBe("read config_file_name");
  });

  it("returns null for markup-only input", () => {
    expect(stripMarkup("  **  ** \n")).toBeNull();
    expect(stripMarkup("")).toBeNull();
  });
});

describe("deriveLabel", () => {
  it("uses a short single line verbatim without a child", () => {
    expect(deriveLabel("**Short** plan")).toEqual({
      label: "Short plan",
      fullText: "Short plan",
      truncated: false,
      needsChild: false
    });
  });

  it("keeps exactly 72 characters untruncated", () => {
    const text = "y".repeat(72);
    const derived = deriveLabel(text);

    expect(derived?.label).toBe(text);
    expect(derived?.needsChild).toBe(false);
  });

  it("truncates a long first line and asks for a child", () => {
    const text = "x".repeat(100);
    const derived = deriveLabel(text);

    expect(derived?.label).toBe(`${"x".repeat(72)}…`);
    expect(derived?.truncated).toBe(true);
    expect(derived?.needsChild).toBe(true);
    expect(derived?.fullText).toBe(text);
  });

  it("asks for a child when there is more than one line", () => {
    const derived = deriveLabel("First line\nsecond line");

    expect(derived?.label).toBe("First line");
    expect(derived?.truncated).toBe(false);
    expect(derived?.needsChild).toBe(true);
  });

  it("counts code points rather than UTF-16 units", () => {
    const derived = deriveLabel("🙂".repeat(73));

    expect(derived?.label).toBe(`${"🙂".repeat(72)}…`);
  });

  it("honours a custom maximum", () => {
    expect(deriveLabel("abcdef", 3)?.label).toBe("abc…");
  });

  it("returns null when nothing is left after stripping", () => {
    expect(deriveLabel("__")).toBeNull();
  });
});
