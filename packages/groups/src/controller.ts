import type { Logger } from "pino";
import {
  type GroupingConfig,
  type GroupingConfigInput,
  parseGroupingConfig
} from "@turnfold/protocol";
import type { DocumentSurface } from "./document-surface.js";
import { LabelEngine } from "./label.js";
import { GroupLifecycle } from "./lifecycle.js";
import { logger as defaultLogger } from "./logger.js";
import {
  type Group,
  type GroupingSession,
  currentGroupFor,
  findOwningGroup,
  isWrapperId,
  registerChild,
  thoughtChildIdFor
} from "./session.js";
import { SpinnerAnimator } from "./spinner.js";
import { VisibilitySynchronizer } from "./visibility.js";

export interface GroupingControllerOptions {
  surface: DocumentSurface;
  config?: GroupingConfigInput;
  logger?: Logger;
}

/** Entry point for the turn layer. Handlers do nothing while grouping is disabled. */
export class GroupingController {
  public readonly config: GroupingConfig;
  private readonly logger: Logger;
  private readonly synchronizer: VisibilitySynchronizer;
  private readonly animator: SpinnerAnimator;
  private readonly labels: LabelEngine;
  private readonly lifecycle: GroupLifecycle;

  public constructor(options: GroupingControllerOptions) {
    this.config = parseGroupingConfig(options.config ?? {});
    this.logger = options.logger ?? defaultLogger;
    this.synchronizer = new VisibilitySynchronizer(options.surface, this.logger);
    this.animator = new SpinnerAnimator(
      options.surface,
      this.synchronizer,
      this.logger,
      this.config.spinnerIntervalMs
    );
    this.labels = new LabelEngine(options.surface, this.synchronizer, this.config.maxLabelLength);
    this.lifecycle = new GroupLifecycle(options.surface, this.animator, this.logger);
  }

  public onThoughtText(
    session: GroupingSession,
    text: string,
    isNewPhaseHint = false
  ): Group | null {
    if (!this.config.enabled) {
      return null;
    }

    const group = this.lifecycle.ensureWrapper(session, isNewPhaseHint);
    this.labels.updateLabel(session, group, text);
    return group;
  }

  public onToolCallStarted(session: GroupingSession, toolFragmentId?: string): Group | null {
    if (!this.config.enabled) {
      return null;
    }

    // A re-rendered tool call stays with the phase that started it.
    const owner = toolFragmentId === undefined ? null : this.ownerInTurn(session, toolFragmentId);
    if (owner) {
      this.synchronizer.syncChildren(session, owner);
      return owner;
    }

    const group = this.lifecycle.ensureWrapper(session, false);
    this.lifecycle.markToolCall(session);
    if (toolFragmentId !== undefined) {
      this.attach(session, group, toolFragmentId);
    }
    return group;
  }

  /**
   * Folds any other fragment of the turn (status lines, tool output) into the
   * current group. A fragment some group of this turn already owns is only
   * re-synced with that group.
   */
  public onFragmentRendered(session: GroupingSession, fragmentId: string): Group | null {
    if (!this.config.enabled || isWrapperId(fragmentId)) {
      return null;
    }

    const owner = this.ownerInTurn(session, fragmentId);
    if (owner) {
      this.synchronizer.syncChildren(session, owner);
      return owner;
    }

    const group = this.lifecycle.ensureWrapper(session, false);
    if (fragmentId === thoughtChildIdFor(group.wrapperId)) {
      return group;
    }
    this.attach(session, group, fragmentId);
    return group;
  }

  public onTurnEnded(session: GroupingSession): void {
    if (!this.config.enabled) {
      return;
    }

    const current = currentGroupFor(session);
    if (current && !current.finalized) {
      this.animator.finalize(session, current);
    }
    this.animator.sweepUnfinalized(session);
  }

  public onUserToggle(session: GroupingSession, fragmentId: string): boolean {
    if (!this.config.enabled) {
      return false;
    }
    return this.synchronizer.onUserToggle(session, fragmentId);
  }

  public dispose(session: GroupingSession): void {
    this.animator.stop(session);
  }

  /** Fragment ids are scoped to a turn, so owners from earlier turns do not count. */
  private ownerInTurn(session: GroupingSession, fragmentId: string): Group | null {
    const owner = findOwningGroup(session, fragmentId);
    return owner?.requestId === session.requestCount ? owner : null;
  }

  private attach(session: GroupingSession, group: Group, fragmentId: string): void {
    registerChild(group, fragmentId);
    this.synchronizer.syncChildren(session, group);
  }
}
