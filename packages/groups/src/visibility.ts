import type { Logger } from "pino";
import type { DocumentSurface, TextRange } from "./document-surface.js";
import {
  type Group,
  type GroupingSession,
  findOwningGroup,
  groupForWrapper,
  isWrapperId
} from "./session.js";

export const CHILD_INDENT = "  ";

export const InvisibilityOwner = {
  Group: "group",
  WrapperBody: "wrapper-body",
  BlankLine: "blank-line"
} as const;

export class VisibilitySynchronizer {
  private readonly surface: DocumentSurface;
  private readonly logger: Logger;

  public constructor(surface: DocumentSurface, logger: Logger) {
    this.surface = surface;
    this.logger = logger;
  }

  /**
   * Pushes the wrapper's collapse state onto every registered child. Safe to
   * call repeatedly; a second call with no state change leaves every range
   * as it was.
   */
  public syncChildren(_session: GroupingSession, group: Group): void {
    if (!this.surface.isSurfaceLive()) {
      return;
    }

    const wrapper = this.surface.queryFragmentRange(group.requestId, group.wrapperId);
    if (!wrapper) {
      this.logger.debug({ wrapperId: group.wrapperId }, "wrapper fragment not found; skipping sync");
      return;
    }

    // The wrapper body is only a placeholder the surface needs to draw a
    // collapsible; it never carries content.
    if (wrapper.body) {
      this.surface.setInvisible(wrapper.body, true, InvisibilityOwner.WrapperBody);
    }

    for (const childId of group.childIds) {
      const range = this.surface.queryFragmentRange(group.requestId, childId);
      if (!range) {
        continue;
      }

      const span: TextRange = { start: range.start, end: range.end };
      if (wrapper.collapsed) {
        this.surface.setInvisible(span, true, InvisibilityOwner.Group);
        this.releaseSeparator(span);
        continue;
      }

      this.surface.setInvisible(span, false, InvisibilityOwner.Group);
      this.surface.setIndent(span, CHILD_INDENT);
      this.tightenSeparator(span);
    }

    this.logger.trace(
      { wrapperId: group.wrapperId, children: group.childIds.length, collapsed: wrapper.collapsed },
      "synced group children"
    );
  }

  /**
   * Re-syncs the group behind a toggled wrapper, or the group owning a toggled
   * child, since toggling a child redraws it without the group's markings.
   * Returns false when no group of this session matches.
   */
  public onUserToggle(session: GroupingSession, toggledFragmentId: string): boolean {
    const group = isWrapperId(toggledFragmentId)
      ? groupForWrapper(session, toggledFragmentId)
      : findOwningGroup(session, toggledFragmentId);
    if (!group) {
      return false;
    }

    this.syncChildren(session, group);
    return true;
  }

  private separatorBefore(span: TextRange): TextRange | null {
    if (span.start < 2) {
      return null;
    }
    return { start: span.start - 2, end: span.start - 1 };
  }

  private tightenSeparator(span: TextRange): void {
    const separator = this.separatorBefore(span);
    if (!separator) {
      return;
    }
    if (this.surface.readText({ start: separator.start, end: span.start }) !== "\n\n") {
      return;
    }
    this.surface.setInvisible(separator, true, InvisibilityOwner.BlankLine);
  }

  private releaseSeparator(span: TextRange): void {
    const separator = this.separatorBefore(span);
    if (!separator) {
      return;
    }
    this.surface.setInvisible(separator, false, InvisibilityOwner.BlankLine);
  }
}
