import type { Logger } from "pino";
import type { DocumentSurface } from "./document-surface.js";
import {
  type Group,
  type GroupingSession,
  WORKING_LABEL,
  createGroup,
  currentGroupFor,
  registerGroup
} from "./session.js";
import type { SpinnerAnimator } from "./spinner.js";

export const WRAPPER_PLACEHOLDER_BODY = "…";

/**
 * A group ends at a turn boundary, or when a new thought arrives after the
 * current group has seen a tool call.
 */
export function requiresNewGroup(
  session: GroupingSession,
  current: Group | null,
  isNewThought: boolean
): boolean {
  if (!current || current.requestId !== session.requestCount) {
    return true;
  }
  return isNewThought && current.hasToolCalls;
}

export class GroupLifecycle {
  private readonly surface: DocumentSurface;
  private readonly animator: SpinnerAnimator;
  private readonly logger: Logger;

  public constructor(surface: DocumentSurface, animator: SpinnerAnimator, logger: Logger) {
    this.surface = surface;
    this.animator = animator;
    this.logger = logger;
  }

  public ensureWrapper(session: GroupingSession, isNewThought: boolean): Group {
    const current = currentGroupFor(session);
    if (current && !requiresNewGroup(session, current, isNewThought)) {
      return current;
    }

    const sameTurn = current !== null && current.requestId === session.requestCount;
    if (current && !current.finalized) {
      this.animator.finalize(session, current);
    }

    session.groupIndex = sameTurn ? session.groupIndex + 1 : 1;
    const group = createGroup(session.requestCount, session.groupIndex);
    registerGroup(session, group);

    this.surface.createOrUpdateFragment(group.requestId, group.wrapperId, {
      labelLeft: WORKING_LABEL,
      body: WRAPPER_PLACEHOLDER_BODY,
      expanded: false
    });
    this.animator.start(session, group);

    this.logger.debug(
      { wrapperId: group.wrapperId, requestId: group.requestId, reason: sameTurn ? "phase" : "turn" },
      "started group"
    );
    return group;
  }

  public markToolCall(session: GroupingSession): void {
    const current = currentGroupFor(session);
    if (current) {
      current.hasToolCalls = true;
    }
  }
}
