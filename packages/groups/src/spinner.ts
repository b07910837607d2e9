import type { Logger } from "pino";
import type { DocumentSurface } from "./document-surface.js";
import { GroupingError } from "./errors.js";
import { type Group, type GroupingSession, groupForWrapper } from "./session.js";
import type { VisibilitySynchronizer } from "./visibility.js";

export const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"] as const;
export const COMPLETION_MARKER = "✓";

interface RunningAnimator {
  wrapperId: string;
  handle: NodeJS.Timeout;
}

export function completionLabel(group: Group): string {
  return `${COMPLETION_MARKER} ${group.label}`;
}

export function spinnerLabel(group: Group): string {
  const frame = SPINNER_FRAMES[group.frameIndex % SPINNER_FRAMES.length] ?? SPINNER_FRAMES[0];
  return `${frame} ${group.label}`;
}

/**
 * Drives the rotating caption of the active group. One animator runs per
 * session at most; starting another stops the previous one first.
 */
export class SpinnerAnimator {
  private readonly surface: DocumentSurface;
  private readonly synchronizer: VisibilitySynchronizer;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly running = new WeakMap<GroupingSession, RunningAnimator>();

  public constructor(
    surface: DocumentSurface,
    synchronizer: VisibilitySynchronizer,
    logger: Logger,
    intervalMs: number
  ) {
    if (!Number.isInteger(intervalMs) || intervalMs <= 0) {
      throw new GroupingError(`Spinner interval must be a positive integer, got ${intervalMs}`);
    }
    this.surface = surface;
    this.synchronizer = synchronizer;
    this.logger = logger;
    this.intervalMs = intervalMs;
  }

  public start(session: GroupingSession, group: Group): void {
    this.stop(session);
    if (group.finalized) {
      return;
    }

    group.frameIndex = 0;
    const wrapperId = group.wrapperId;
    const handle = setInterval(() => this.tick(session, wrapperId), this.intervalMs);
    group.animatorHandle = handle;
    this.running.set(session, { wrapperId, handle });
  }

  public stop(session: GroupingSession): void {
    const running = this.running.get(session);
    if (!running) {
      return;
    }

    clearInterval(running.handle);
    this.running.delete(session);

    const group = groupForWrapper(session, running.wrapperId);
    if (group && group.animatorHandle === running.handle) {
      group.animatorHandle = null;
    }
  }

  public isRunning(session: GroupingSession, wrapperId: string): boolean {
    return this.running.get(session)?.wrapperId === wrapperId;
  }

  public tick(session: GroupingSession, wrapperId: string): void {
    const group = groupForWrapper(session, wrapperId);
    if (!group || group.finalized || !this.surface.isSurfaceLive()) {
      this.logger.debug({ wrapperId }, "spinner target gone; stopping");
      this.stopIfRunning(session, wrapperId);
      return;
    }

    try {
      const label = spinnerLabel(group);
      group.frameIndex = (group.frameIndex + 1) % SPINNER_FRAMES.length;
      this.surface.createOrUpdateFragment(group.requestId, group.wrapperId, { labelLeft: label });
    } catch (error) {
      this.logger.warn({ err: error, wrapperId }, "spinner tick failed; stopping");
      this.stopIfRunning(session, wrapperId);
    }
  }

  public finalize(session: GroupingSession, group: Group): void {
    this.stopIfRunning(session, group.wrapperId);
    this.surface.createOrUpdateFragment(group.requestId, group.wrapperId, {
      labelLeft: completionLabel(group)
    });
    group.finalized = true;

    if (group.childIds.length > 0) {
      this.synchronizer.syncChildren(session, group);
    }
    this.logger.debug({ wrapperId: group.wrapperId, label: group.label }, "group finalized");
  }

  /** Turn-end safety net; leaves any running animator to notice on its next tick. */
  public sweepUnfinalized(session: GroupingSession): void {
    for (const group of session.groups) {
      if (group.finalized) {
        continue;
      }
      this.surface.createOrUpdateFragment(group.requestId, group.wrapperId, {
        labelLeft: completionLabel(group)
      });
      group.finalized = true;
    }
  }

  private stopIfRunning(session: GroupingSession, wrapperId: string): void {
    if (this.isRunning(session, wrapperId)) {
      this.stop(session);
    }
  }
}
