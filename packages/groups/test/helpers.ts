import { type Logger, pino } from "pino";
import { vi } from "vitest";
import type { DocumentSurface, FragmentRange } from "../src/document-surface.js";

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function recordingSurface(): DocumentSurface {
  return {
    createOrUpdateFragment: vi.fn(),
    queryFragmentRange: vi.fn((): FragmentRange | null => null),
    setInvisible: vi.fn(),
    setIndent: vi.fn(),
    readText: vi.fn(() => ""),
    isSurfaceLive: vi.fn(() => true)
  };
}
