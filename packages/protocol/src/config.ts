import { z } from "zod";
import { PositiveIntSchema } from "./common.js";
import { ProtocolValidationError } from "./errors.js";

export const DEFAULT_SPINNER_INTERVAL_MS = 100;
export const DEFAULT_MAX_LABEL_LENGTH = 72;

export const GroupingConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    spinnerIntervalMs: PositiveIntSchema.default(DEFAULT_SPINNER_INTERVAL_MS),
    maxLabelLength: PositiveIntSchema.default(DEFAULT_MAX_LABEL_LENGTH)
  })
  .strict();

export type GroupingConfig = z.output<typeof GroupingConfigSchema>;
export type GroupingConfigInput = z.input<typeof GroupingConfigSchema>;

export function parseGroupingConfig(value: unknown): GroupingConfig {
  const result = GroupingConfigSchema.safeParse(value);
  if (!result.success) {
    throw ProtocolValidationError.fromZod("GroupingConfig", result.error);
  }
  return result.data;
}
