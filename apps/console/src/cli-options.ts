import { PositiveIntSchema } from "@turnfold/protocol";

export interface ConsoleCliOptions {
  file: string | null;
  grouping: boolean | null;
  spinnerIntervalMs: number | null;
  showHelp: boolean;
}

function parseIntervalArg(raw: string): number {
  const trimmed = raw.trim();
  const parsed = PositiveIntSchema.safeParse(/^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN);
  if (!parsed.success) {
    throw new Error(`Invalid value for --interval: "${raw}". Expected a positive integer`);
  }
  return parsed.data;
}

function readValue(argv: string[], index: number, flag: string): string {
  const nextArg = argv[index + 1];
  if (!nextArg || nextArg.startsWith("--")) {
    throw new Error(`Missing value for ${flag}`);
  }
  return nextArg;
}

export function formatConsoleHelpText(): string {
  return [
    "turnfold console",
    "",
    "Usage: tsx src/index.ts --file <events.jsonl> [--no-grouping] [--interval <ms>]",
    "",
    "Flags:",
    "  --file <path>      JSON-lines turn event log to replay",
    "  --no-grouping      Render fragments without collapsible groups",
    "  --interval <ms>    Spinner frame interval in milliseconds",
    "  --help             Show this help message",
    "",
    "Environment: TURNFOLD_GROUPING, TURNFOLD_SPINNER_INTERVAL_MS, LOG_LEVEL"
  ].join("\n");
}

/** Flags left unset stay null so the environment can fill them in. */
export function parseConsoleCliOptions(argv: string[]): ConsoleCliOptions {
  const options: ConsoleCliOptions = {
    file: null,
    grouping: null,
    spinnerIntervalMs: null,
    showHelp: false
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg || arg === "--") {
      continue;
    }

    if (arg === "--help" || arg === "-h") {
      options.showHelp = true;
      continue;
    }

    if (arg === "--no-grouping") {
      options.grouping = false;
      continue;
    }

    if (arg.startsWith("--file=")) {
      const value = arg.slice("--file=".length).trim();
      if (!value) {
        throw new Error("Missing value for --file");
      }
      options.file = value;
      continue;
    }

    if (arg === "--file") {
      options.file = readValue(argv, index, "--file");
      index += 1;
      continue;
    }

    if (arg.startsWith("--interval=")) {
      options.spinnerIntervalMs = parseIntervalArg(arg.slice("--interval=".length));
      continue;
    }

    if (arg === "--interval") {
      options.spinnerIntervalMs = parseIntervalArg(readValue(argv, index, "--interval"));
      index += 1;
      continue;
    }

    throw new Error(`Unknown argument: ${arg}`);
  }

  if (!options.showHelp && options.file === null) {
    throw new Error("Missing required --file <path>");
  }

  return options;
}
