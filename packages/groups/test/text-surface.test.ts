import { describe, expect, it, vi } from "vitest";
import { TextDocumentSurface } from "../src/text-surface.js";

describe("TextDocumentSurface", () => {
  it("renders fragments in creation order separated by a blank line", () => {
    const surface = new TextDocumentSurface();
    surface.createOrUpdateFragment(1, "a", { labelLeft: "Alpha" });
    surface.createOrUpdateFragment(1, "b", { labelLeft: "Beta" });

    expect(surface.render()).toBe("Alpha\n\nBeta");
  });

  it("places a new fragment right after its anchor", () => {
    const surface = new TextDocumentSurface();
    surface.createOrUpdateFragment(1, "a", { labelLeft: "Alpha" });
    surface.createOrUpdateFragment(1, "b", { labelLeft: "Beta" });
    surface.createOrUpdateFragment(1, "c", { labelLeft: "Gamma", after: "a" });
    surface.createOrUpdateFragment(1, "d", { labelLeft: "Delta", after: "missing" });
    surface.createOrUpdateFragment(1, "b", { labelLeft: "Beta 2", after: "d" });

    expect(surface.render()).toBe("Alpha\n\nGamma\n\nBeta 2\n\nDelta");
    expect(surface.queryFragmentRange(1, "c")).toEqual({
      start: 7,
      end: 14,
      collapsed: true,
      body: null
    });
  });

  it("hides a collapsed fragment's body until it is toggled", () => {
    const surface = new TextDocumentSurface();
    const listener = vi.fn();
    surface.onToggle(listener);
    surface.createOrUpdateFragment(1, "tool", { labelLeft: "Tool", body: "out" });

    expect(surface.render()).toBe("▶ Tool");
    expect(surface.toggleFragment(1, "tool")).toBe(true);
    expect(surface.render()).toBe("▼ Tool\nout");
    expect(listener).toHaveBeenCalledWith({ turnId: 1, fragmentId: "tool", expanded: true });
  });

  it("reports ranges covering label, body and separator", () => {
    const surface = new TextDocumentSurface();
    surface.createOrUpdateFragment(1, "a", { labelLeft: "A" });
    surface.createOrUpdateFragment(1, "b", { labelLeft: "B", body: "out" });

    expect(surface.queryFragmentRange(1, "a")).toEqual({
      start: 0,
      end: 3,
      collapsed: true,
      body: null
    });
    expect(surface.queryFragmentRange(1, "b")).toEqual({
      start: 3,
      end: 12,
      collapsed: true,
      body: { start: 6, end: 10 }
    });
    expect(surface.queryFragmentRange(2, "b")).toBeNull();
  });

  it("keeps fragments apart by turn", () => {
    const surface = new TextDocumentSurface();
    surface.createOrUpdateFragment(1, "x", { labelLeft: "first" });
    surface.createOrUpdateFragment(2, "x", { labelLeft: "second" });

    expect(surface.fragmentCount()).toBe(2);
    expect(surface.render()).toBe("first\n\nsecond");
  });

  it("only clears the owner that asked", () => {
    const surface = new TextDocumentSurface();
    surface.createOrUpdateFragment(1, "a", { labelLeft: "Alpha" });
    surface.createOrUpdateFragment(1, "b", { labelLeft: "Beta" });
    const range = { start: 0, end: 7 };

    surface.setInvisible(range, true, "x");
    surface.setInvisible(range, true, "y");
    surface.setInvisible(range, false, "x");
    expect(surface.render()).toBe("Beta");

    surface.setInvisible(range, false, "y");
    expect(surface.render()).toBe("Alpha\n\nBeta");
  });

  it("drops properties of text that is rewritten", () => {
    const surface = new TextDocumentSurface();
    surface.createOrUpdateFragment(1, "a", { labelLeft: "Alpha" });
    surface.createOrUpdateFragment(1, "b", { labelLeft: "Beta" });
    surface.setInvisible({ start: 0, end: 5 }, true, "x");
    expect(surface.render()).toBe("\n\nBeta");

    surface.createOrUpdateFragment(1, "a", { labelLeft: "Alpha!" });
    expect(surface.render()).toBe("Alpha!\n\nBeta");
  });

  it("indents the start of every non-empty line", () => {
    const surface = new TextDocumentSurface();
    surface.createOrUpdateFragment(1, "a", { labelLeft: "one\ntwo" });
    surface.createOrUpdateFragment(1, "b", { labelLeft: "three" });
    const range = surface.queryFragmentRange(1, "a");
    if (!range) {
      throw new Error("fragment a missing");
    }

    surface.setIndent(range, "  ");
    expect(surface.render()).toBe("  one\n  two\n\nthree");
  });

  it("reads raw text including hidden characters", () => {
    const surface = new TextDocumentSurface();
    surface.createOrUpdateFragment(1, "a", { labelLeft: "Alpha" });
    surface.setInvisible({ start: 0, end: 2 }, true, "x");

    expect(surface.readText({ start: 0, end: 7 })).toBe("Alpha\n\n");
  });

  it("goes quiet once disposed", () => {
    const surface = new TextDocumentSurface();
    surface.createOrUpdateFragment(1, "a", { labelLeft: "Alpha" });
    surface.dispose();

    surface.createOrUpdateFragment(1, "b", { labelLeft: "Beta" });
    expect(surface.isSurfaceLive()).toBe(false);
    expect(surface.queryFragmentRange(1, "a")).toBeNull();
    expect(surface.toggleFragment(1, "a")).toBe(false);
    expect(surface.fragmentCount()).toBe(1);
  });
});
