import fs from "node:fs/promises";
import path from "node:path";
import { resolveGroupingConfig } from "@turnfold/groups";
import { parseTurnEventLog, toErrorMessage } from "@turnfold/protocol";
import { formatConsoleHelpText, parseConsoleCliOptions } from "./cli-options.js";
import { logger } from "./logger.js";
import { TurnReplayer } from "./replay.js";

async function main(argv: string[]): Promise<void> {
  const options = parseConsoleCliOptions(argv);
  if (options.showHelp || options.file === null) {
    process.stdout.write(`${formatConsoleHelpText()}\n`);
    return;
  }

  const envConfig = resolveGroupingConfig(process.env);
  const config = {
    ...envConfig,
    enabled: options.grouping ?? envConfig.enabled,
    spinnerIntervalMs: options.spinnerIntervalMs ?? envConfig.spinnerIntervalMs
  };

  const filePath = path.resolve(process.cwd(), options.file);
  const events = parseTurnEventLog(await fs.readFile(filePath, "utf8"));
  logger.info({ filePath, events: events.length, grouping: config.enabled }, "replay-starting");

  const replayer = new TurnReplayer({ config, logger });
  try {
    const rendered = await replayer.replay(events);
    process.stdout.write(`${rendered}\n`);
  } finally {
    replayer.close();
  }
}

void main(process.argv.slice(2)).catch((error: unknown) => {
  logger.fatal({ error: toErrorMessage(error) }, "replay-failed");
  process.exitCode = 1;
});
