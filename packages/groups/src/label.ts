import { DEFAULT_MAX_LABEL_LENGTH } from "@turnfold/protocol";
import type { DocumentSurface } from "./document-surface.js";
import { type Group, type GroupingSession, thoughtChildIdFor } from "./session.js";
import { completionLabel } from "./spinner.js";
import type { VisibilitySynchronizer } from "./visibility.js";

export const ELLIPSIS = "…";

const STRONG_MARKERS = /\*\*|__/g;
const SINGLE_EMPHASIS = /(^|[\s(])[*_](?=\S)([^*_\n]*?\S)[*_](?=$|[\s).,;:!?])/gm;

export interface DerivedLabel {
  label: string;
  fullText: string;
  truncated: boolean;
  needsChild: boolean;
}

/** Returns null when nothing but markup and whitespace remains. */
export function stripMarkup(text: string): string | null {
  const stripped = text.replace(STRONG_MARKERS, "").replace(SINGLE_EMPHASIS, "$1$2").trim();
  return stripped.length > 0 ? stripped : null;
}

export function deriveLabel(
  accumulatedText: string,
  maxLength: number = DEFAULT_MAX_LABEL_LENGTH
): DerivedLabel | null {
  const fullText = stripMarkup(accumulatedText);
  if (fullText === null) {
    return null;
  }

  const lineBreak = fullText.search(/\r?\n/);
  const firstLine = lineBreak === -1 ? fullText : fullText.slice(0, lineBreak);
  const codePoints = Array.from(firstLine);
  const truncated = codePoints.length > maxLength;
  const label = truncated ? `${codePoints.slice(0, maxLength).join("")}${ELLIPSIS}` : firstLine;

  return {
    label,
    fullText,
    truncated,
    needsChild: truncated || firstLine !== fullText
  };
}

export class LabelEngine {
  private readonly surface: DocumentSurface;
  private readonly synchronizer: VisibilitySynchronizer;
  private readonly maxLength: number;

  public constructor(
    surface: DocumentSurface,
    synchronizer: VisibilitySynchronizer,
    maxLength: number = DEFAULT_MAX_LABEL_LENGTH
  ) {
    this.surface = surface;
    this.synchronizer = synchronizer;
    this.maxLength = maxLength;
  }

  public updateLabel(session: GroupingSession, group: Group, incomingText: string): void {
    group.accumulatedText += incomingText;

    const derived = deriveLabel(group.accumulatedText, this.maxLength);
    if (!derived) {
      return;
    }

    group.label = derived.label;

    if (derived.needsChild) {
      const childId = thoughtChildIdFor(group.wrapperId);
      this.surface.createOrUpdateFragment(group.requestId, childId, {
        labelLeft: derived.fullText,
        after: group.wrapperId
      });
      if (!group.childIds.includes(childId)) {
        group.childIds.unshift(childId);
      }
    }

    // No animator repaints a finalized caption, so late text is shown here.
    if (group.finalized) {
      this.surface.createOrUpdateFragment(group.requestId, group.wrapperId, {
        labelLeft: completionLabel(group)
      });
    }

    this.synchronizer.syncChildren(session, group);
  }
}
