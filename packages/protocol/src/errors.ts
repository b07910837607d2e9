import type { ZodError, ZodIssue } from "zod";

function formatIssuePath(path: (string | number)[]): string {
  if (path.length === 0) {
    return "<root>";
  }

  return path.reduce<string>((label, segment) => {
    if (typeof segment === "number") {
      return `${label}[${segment}]`;
    }
    return label.length === 0 ? segment : `${label}.${segment}`;
  }, "");
}

export function formatZodIssue(issue: ZodIssue): string {
  return `${formatIssuePath(issue.path)}: ${issue.message}`;
}

/** Raised wherever untrusted input (event logs, configuration) fails its schema. */
export class ProtocolValidationError extends Error {
  public readonly context: string;
  public readonly issues: string[];

  public constructor(context: string, message: string, issues: string[]) {
    super(message);
    this.name = "ProtocolValidationError";
    this.context = context;
    this.issues = issues;
  }

  public static fromZod(context: string, error: ZodError): ProtocolValidationError {
    const issues = error.issues.map(formatZodIssue);
    return new ProtocolValidationError(
      context,
      `${context} did not match expected schema. ${issues.join("; ")}`,
      issues
    );
  }
}
