import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "pino";
import {
  GroupingController,
  type GroupingSession,
  TextDocumentSurface,
  beginTurn,
  createSession,
  groupForWrapper
} from "@turnfold/groups";
import { type GroupingConfigInput, type TurnEvent, assertNever } from "@turnfold/protocol";

export type Sleep = (ms: number) => Promise<void>;

export interface TurnReplayerOptions {
  config: GroupingConfigInput;
  logger: Logger;
  sleep?: Sleep;
}

const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Plays the host's part for a recorded event log: renders the fragments the
 * events describe and forwards each event to the grouping controller.
 */
export class TurnReplayer {
  public readonly surface = new TextDocumentSurface();
  public readonly session: GroupingSession = createSession();
  private readonly controller: GroupingController;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly unsubscribeToggle: () => void;
  private plainThoughtIndex = 0;
  private plainThoughtText = "";

  public constructor(options: TurnReplayerOptions) {
    this.logger = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
    this.controller = new GroupingController({
      surface: this.surface,
      config: options.config,
      logger: options.logger
    });
    this.unsubscribeToggle = this.surface.onToggle(({ fragmentId }) => {
      this.controller.onUserToggle(this.session, fragmentId);
    });
  }

  public async replay(events: TurnEvent[]): Promise<string> {
    for (const event of events) {
      if (event.delayMs !== undefined && event.delayMs > 0) {
        await this.sleep(event.delayMs);
      }
      this.apply(event);
    }
    return this.surface.render();
  }

  public apply(event: TurnEvent): void {
    this.logger.debug({ type: event.type, turn: this.session.requestCount }, "replaying event");

    switch (event.type) {
      case "turn-started":
        beginTurn(this.session);
        this.plainThoughtIndex = 0;
        this.plainThoughtText = "";
        return;
      case "thought": {
        const group = this.controller.onThoughtText(
          this.session,
          event.text,
          event.newPhase ?? false
        );
        if (!group) {
          this.renderPlainThought(event.text, event.newPhase ?? false);
        }
        return;
      }
      case "tool-call":
        // The wrapper has to exist before the tool fragment so it renders above it.
        this.controller.onToolCallStarted(this.session, event.fragmentId);
        this.surface.createOrUpdateFragment(this.session.requestCount, event.fragmentId, {
          labelLeft: event.title,
          ...(event.body !== undefined ? { body: event.body } : {})
        });
        this.controller.onFragmentRendered(this.session, event.fragmentId);
        return;
      case "fragment":
        this.surface.createOrUpdateFragment(this.session.requestCount, event.fragmentId, {
          labelLeft: event.label,
          ...(event.body !== undefined ? { body: event.body } : {})
        });
        this.controller.onFragmentRendered(this.session, event.fragmentId);
        return;
      case "toggle": {
        const turnId =
          groupForWrapper(this.session, event.fragmentId)?.requestId ?? this.session.requestCount;
        if (!this.surface.toggleFragment(turnId, event.fragmentId)) {
          this.logger.warn({ fragmentId: event.fragmentId, turnId }, "toggle target not found");
        }
        return;
      }
      case "turn-ended":
        this.controller.onTurnEnded(this.session);
        return;
      default:
        assertNever(event);
    }
  }

  public close(): void {
    this.controller.dispose(this.session);
    this.unsubscribeToggle();
    this.surface.dispose();
  }

  private renderPlainThought(text: string, isNewPhase: boolean): void {
    if (isNewPhase || this.plainThoughtIndex === 0) {
      this.plainThoughtIndex += 1;
      this.plainThoughtText = "";
    }
    this.plainThoughtText += text;
    this.surface.createOrUpdateFragment(
      this.session.requestCount,
      `thought-${this.plainThoughtIndex}`,
      { labelLeft: this.plainThoughtText.trim() }
    );
  }
}
