import { Command, Option } from "commander";
import { DEFAULT_REMOTE_BASE_URL } from "@ponyfactor/git-history";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import {
  formatPonyFactorOutput,
  type PonyFactorOutputMode,
} from "./application/format-pony-factor-output.js";
import { createStderrLogger, parseLogLevel, type LogLevel } from "./application/logger.js";
import { runPonyFactorCommand } from "./application/run-pony-factor-command.js";

const EXIT_COVERAGE_UNDEFINED = 1;
const EXIT_FAILURE = 2;

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const { version } = JSON.parse(readFileSync(packageJsonPath, "utf8")) as { version: string };

program
  .name("ponyfactor")
  .description("Smallest set of recently active contributors behind half of a repository's commits")
  .version(version)
  .argument("<location>", "owner/repo identifier to clone, or a local path with --directory")
  .option("--directory", "treat location as an existing local working copy", false)
  .option("--remote-base-url <url>", "base url used to clone owner/repo identifiers", DEFAULT_REMOTE_BASE_URL)
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
    )
      .choices(["silent", "error", "warn", "info", "debug"])
      .default(parseLogLevel(process.env["PONYFACTOR_LOG_LEVEL"])),
  )
  .addOption(
    new Option("--output <mode>", "output mode: text (default) or json (full result object)")
      .choices(["text", "json"])
      .default("text"),
  )
  .action(
    (
      location: string,
      options: {
        directory: boolean;
        remoteBaseUrl: string;
        logLevel: LogLevel;
        output: PonyFactorOutputMode;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);
      try {
        const result = runPonyFactorCommand(
          location,
          { directory: options.directory, remoteBaseUrl: options.remoteBaseUrl },
          logger,
        );
        process.stdout.write(`${formatPonyFactorOutput(result, options.output)}\n`);
        if (!result.available) {
          process.exitCode = EXIT_COVERAGE_UNDEFINED;
        }
      } catch (error) {
        logger.error(error instanceof Error ? error.message : String(error));
        process.exitCode = EXIT_FAILURE;
      }
    },
  );

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

await program.parseAsync(argv);
