import { EventEmitter } from "node:events";
import type {
  DocumentSurface,
  FragmentRange,
  FragmentUpdate,
  TextRange
} from "./document-surface.js";

type SectionName = "label" | "body" | "separator";

const SECTION_ORDER: readonly SectionName[] = ["label", "body", "separator"];
const SEPARATOR = "\n\n";
const EXPANDED_INDICATOR = "▼ ";
const COLLAPSED_INDICATOR = "▶ ";

interface Section {
  text: string;
  hidden: Set<string>[];
  indent: (string | null)[];
}

interface FragmentRecord {
  turnId: number;
  fragmentId: string;
  labelLeft: string;
  body: string | null;
  expanded: boolean;
  sections: Record<SectionName, Section>;
}

interface Cell {
  record: FragmentRecord;
  sectionName: SectionName;
  char: string;
  hidden: Set<string>;
  indent: string | null;
  setIndent(prefix: string | null): void;
}

export interface FragmentToggle {
  turnId: number;
  fragmentId: string;
  expanded: boolean;
}

export type FragmentToggleListener = (toggle: FragmentToggle) => void;

function createSection(text: string): Section {
  return {
    text,
    hidden: Array.from({ length: text.length }, () => new Set<string>()),
    indent: Array.from({ length: text.length }, () => null)
  };
}

/** Text that changed loses its presentation properties; unchanged text keeps them. */
function writeSection(section: Section, text: string): void {
  if (section.text === text) {
    return;
  }
  const fresh = createSection(text);
  section.text = fresh.text;
  section.hidden = fresh.hidden;
  section.indent = fresh.indent;
}

function labelText(record: FragmentRecord): string {
  if (record.body === null) {
    return record.labelLeft;
  }
  return `${record.expanded ? EXPANDED_INDICATOR : COLLAPSED_INDICATOR}${record.labelLeft}`;
}

function fragmentLength(record: FragmentRecord): number {
  return SECTION_ORDER.reduce((total, name) => total + record.sections[name].text.length, 0);
}

function fragmentKey(turnId: number, fragmentId: string): string {
  return `${turnId}:${fragmentId}`;
}

/**
 * An in-memory console document. Fragments render in creation order, or
 * right after their `after` anchor, as a label line, an optional body and a
 * blank-line separator; a collapsed fragment hides its own body when rendered.
 */
export class TextDocumentSurface implements DocumentSurface {
  private readonly fragments = new Map<string, FragmentRecord>();
  private readonly order: FragmentRecord[] = [];
  private readonly events = new EventEmitter();
  private live = true;

  public createOrUpdateFragment(turnId: number, fragmentId: string, update: FragmentUpdate): void {
    if (!this.live) {
      return;
    }

    const key = fragmentKey(turnId, fragmentId);
    let record = this.fragments.get(key);
    if (!record) {
      record = {
        turnId,
        fragmentId,
        labelLeft: update.labelLeft,
        body: update.body ?? null,
        expanded: update.expanded ?? false,
        sections: {
          label: createSection(""),
          body: createSection(""),
          separator: createSection(SEPARATOR)
        }
      };
      this.fragments.set(key, record);
      this.insert(record, update.after);
    } else {
      record.labelLeft = update.labelLeft;
      if (update.body !== undefined) {
        record.body = update.body;
      }
      if (update.expanded !== undefined) {
        record.expanded = update.expanded;
      }
    }

    this.layout(record);
  }

  public queryFragmentRange(turnId: number, fragmentId: string): FragmentRange | null {
    if (!this.live) {
      return null;
    }

    let offset = 0;
    for (const record of this.order) {
      const length = fragmentLength(record);
      if (record.turnId === turnId && record.fragmentId === fragmentId) {
        const bodyStart = offset + record.sections.label.text.length;
        return {
          start: offset,
          end: offset + length,
          collapsed: !record.expanded,
          body:
            record.body === null
              ? null
              : { start: bodyStart, end: bodyStart + record.sections.body.text.length }
        };
      }
      offset += length;
    }
    return null;
  }

  public setInvisible(range: TextRange, invisible: boolean, owner: string): void {
    if (!this.live) {
      return;
    }
    for (const cell of this.cellsIn(range)) {
      if (invisible) {
        cell.hidden.add(owner);
      } else {
        cell.hidden.delete(owner);
      }
    }
  }

  public setIndent(range: TextRange, prefix: string | null): void {
    if (!this.live) {
      return;
    }
    for (const cell of this.cellsIn(range)) {
      cell.setIndent(prefix);
    }
  }

  public readText(range: TextRange): string {
    if (!this.live) {
      return "";
    }
    let text = "";
    for (const cell of this.cellsIn(range)) {
      text += cell.char;
    }
    return text;
  }

  public isSurfaceLive(): boolean {
    return this.live;
  }

  /** Flips a fragment's expanded state the way a user click would. */
  public toggleFragment(turnId: number, fragmentId: string): boolean {
    if (!this.live) {
      return false;
    }

    const record = this.fragments.get(fragmentKey(turnId, fragmentId));
    if (!record) {
      return false;
    }

    record.expanded = !record.expanded;
    this.layout(record);
    this.events.emit("toggle", { turnId, fragmentId, expanded: record.expanded });
    return true;
  }

  public onToggle(listener: FragmentToggleListener): () => void {
    this.events.on("toggle", listener);
    return () => this.events.off("toggle", listener);
  }

  public fragmentCount(): number {
    return this.fragments.size;
  }

  /** Visible text with indentation applied and trailing line breaks dropped. */
  public render(): string {
    let output = "";
    let atLineStart = true;

    for (const cell of this.cells()) {
      if (cell.hidden.size > 0) {
        continue;
      }
      if (cell.sectionName === "body" && !cell.record.expanded) {
        continue;
      }
      if (atLineStart && cell.char !== "\n" && cell.indent) {
        output += cell.indent;
      }
      output += cell.char;
      atLineStart = cell.char === "\n";
    }

    return output.replace(/\n+$/, "");
  }

  public dispose(): void {
    this.live = false;
    this.events.removeAllListeners();
  }

  private layout(record: FragmentRecord): void {
    writeSection(record.sections.label, labelText(record));
    writeSection(record.sections.body, record.body === null ? "" : `\n${record.body}`);
  }

  private insert(record: FragmentRecord, after: string | undefined): void {
    const anchor =
      after === undefined ? undefined : this.fragments.get(fragmentKey(record.turnId, after));
    const index = anchor ? this.order.indexOf(anchor) : -1;
    if (index < 0) {
      this.order.push(record);
      return;
    }
    this.order.splice(index + 1, 0, record);
  }

  private *cells(): Generator<Cell> {
    for (const record of this.order) {
      for (const sectionName of SECTION_ORDER) {
        const section = record.sections[sectionName];
        for (let index = 0; index < section.text.length; index += 1) {
          const hidden = section.hidden[index];
          if (!hidden) {
            continue;
          }
          yield {
            record,
            sectionName,
            char: section.text.charAt(index),
            hidden,
            indent: section.indent[index] ?? null,
            setIndent: (prefix) => {
              section.indent[index] = prefix;
            }
          };
        }
      }
    }
  }

  private *cellsIn(range: TextRange): Generator<Cell> {
    let position = 0;
    for (const cell of this.cells()) {
      if (position >= range.end) {
        return;
      }
      if (position >= range.start) {
        yield cell;
      }
      position += 1;
    }
  }
}
