import { z } from "zod";

export const NonEmptyStringSchema = z.string().min(1);
export const NonNegativeIntSchema = z.number().int().nonnegative();
export const PositiveIntSchema = z.number().int().positive();

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}
