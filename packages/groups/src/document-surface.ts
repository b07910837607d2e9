export interface TextRange {
  start: number;
  end: number;
}

export interface FragmentRange extends TextRange {
  collapsed: boolean;
  /** Span of the fragment's collapsible body, or null when it has none. */
  body: TextRange | null;
}

export interface FragmentUpdate {
  labelLeft: string;
  body?: string;
  expanded?: boolean;
  /**
   * Places a new fragment directly after this fragment of the same turn
   * instead of at the end. Ignored for updates and when the anchor is missing.
   */
  after?: string;
}

/**
 * The host rendering substrate. Every call is expected to be a silent no-op
 * once the surface is gone; callers check `isSurfaceLive` before relying on
 * query results.
 */
export interface DocumentSurface {
  createOrUpdateFragment(turnId: number, fragmentId: string, update: FragmentUpdate): void;
  queryFragmentRange(turnId: number, fragmentId: string): FragmentRange | null;
  /**
   * Marks or clears invisibility for one owner. Clearing only removes that
   * owner's marking, so hidden spans set by anyone else stay hidden.
   */
  setInvisible(range: TextRange, invisible: boolean, owner: string): void;
  setIndent(range: TextRange, prefix: string | null): void;
  readText(range: TextRange): string;
  isSurfaceLive(): boolean;
}
