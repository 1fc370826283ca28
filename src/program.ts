// src/program.ts
import { Command, InvalidArgumentError } from "commander";
import { CLI_NAME, VERSION } from "./constants.js";
import { errorMessage } from "./errors.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  parseLogLevel,
  type LogLevel,
} from "./logger.js";
import { configureScanCommand, runScan, type ScanOptions } from "./scan.js";

type ScanCliOptions = {
  output: string;
  folderId?: string;
  update: boolean;
  credentials: string;
  token?: string;
  pageSize?: number;
  maxDepth?: number;
};

export type ProgramOverrides = Pick<ScanOptions, "connect" | "catalogStore" | "out">;

function logLevelOption(value: string): LogLevel {
  const level = parseLogLevel(value);
  if (!level) {
    throw new InvalidArgumentError(`expected one of ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

function loggerFor(command: Command): ConsoleLogger {
  const { logLevel } = command.optsWithGlobals<{ logLevel: LogLevel }>();
  return new ConsoleLogger(logLevel);
}

export function buildProgram(overrides: ProgramOverrides = {}): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description(
      "Scan Google Drive storage and keep a CSV catalog of its files",
    )
    .version(VERSION)
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")})`,
      logLevelOption,
      "info",
    );

  configureScanCommand(program.command("scan")).action(
    async (opts: ScanCliOptions, command: Command) => {
      const logger = loggerFor(command);
      try {
        process.exitCode = await runScan({ ...opts, ...overrides, logger });
      } catch (err) {
        logger.debug("scan failed", {
          stack: err instanceof Error ? err.stack : undefined,
        });
        console.error(`Error: ${errorMessage(err)}`);
        process.exitCode = 1;
      }
    },
  );

  program
    .command("version")
    .description("Show version information")
    .action(() => {
      const out = overrides.out ?? ((line: string) => console.log(line));
      out(`${CLI_NAME} version ${VERSION}`);
    });

  return program;
}
