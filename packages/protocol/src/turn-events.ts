import { z } from "zod";
import { NonEmptyStringSchema, NonNegativeIntSchema, toErrorMessage } from "./common.js";
import { ProtocolValidationError } from "./errors.js";

const EventTimingShape = {
  delayMs: NonNegativeIntSchema.optional()
};

export const TurnStartedEventSchema = z
  .object({
    type: z.literal("turn-started"),
    ...EventTimingShape
  })
  .strict();

export const ThoughtEventSchema = z
  .object({
    type: z.literal("thought"),
    text: z.string(),
    newPhase: z.boolean().optional(),
    ...EventTimingShape
  })
  .strict();

export const ToolCallEventSchema = z
  .object({
    type: z.literal("tool-call"),
    fragmentId: NonEmptyStringSchema,
    title: NonEmptyStringSchema,
    body: z.string().optional(),
    ...EventTimingShape
  })
  .strict();

export const FragmentEventSchema = z
  .object({
    type: z.literal("fragment"),
    fragmentId: NonEmptyStringSchema,
    label: NonEmptyStringSchema,
    body: z.string().optional(),
    ...EventTimingShape
  })
  .strict();

export const ToggleEventSchema = z
  .object({
    type: z.literal("toggle"),
    fragmentId: NonEmptyStringSchema,
    ...EventTimingShape
  })
  .strict();

export const TurnEndedEventSchema = z
  .object({
    type: z.literal("turn-ended"),
    ...EventTimingShape
  })
  .strict();

export const TurnEventSchema = z.discriminatedUnion("type", [
  TurnStartedEventSchema,
  ThoughtEventSchema,
  ToolCallEventSchema,
  FragmentEventSchema,
  ToggleEventSchema,
  TurnEndedEventSchema
]);

export type TurnStartedEvent = z.infer<typeof TurnStartedEventSchema>;
export type ThoughtEvent = z.infer<typeof ThoughtEventSchema>;
export type ToolCallEvent = z.infer<typeof ToolCallEventSchema>;
export type FragmentEvent = z.infer<typeof FragmentEventSchema>;
export type ToggleEvent = z.infer<typeof ToggleEventSchema>;
export type TurnEndedEvent = z.infer<typeof TurnEndedEventSchema>;
export type TurnEvent = z.infer<typeof TurnEventSchema>;

export function parseTurnEvent(value: unknown): TurnEvent {
  const result = TurnEventSchema.safeParse(value);
  if (!result.success) {
    throw ProtocolValidationError.fromZod("TurnEvent", result.error);
  }
  return result.data;
}

/**
 * Parses a JSON-lines event log. Blank lines are skipped; a line that is not
 * JSON or not a valid event fails with its 1-based line number in the message.
 */
export function parseTurnEventLog(source: string): TurnEvent[] {
  const events: TurnEvent[] = [];
  const lines = source.split(/\r?\n/);

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index]?.trim();
    if (!line) {
      continue;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      throw new ProtocolValidationError("TurnEventLog", `Line ${index + 1} is not valid JSON`, [
        `line ${index + 1}: ${toErrorMessage(error)}`
      ]);
    }

    const result = TurnEventSchema.safeParse(raw);
    if (!result.success) {
      throw ProtocolValidationError.fromZod(`TurnEvent on line ${index + 1}`, result.error);
    }
    events.push(result.data);
  }

  return events;
}
