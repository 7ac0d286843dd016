import { Command } from "commander";
import { outlineCommand } from "./commands/outline.js";
import type { CliFlags } from "../core/config.js";
import { logger, setLoggerStderr } from "../utils/logger.js";

export const VERSION = "0.1.0";

export function createProgram(): Command {
  return new Command()
    .name("py-outline")
    .description(
      "Print an outline of the classes, methods and functions in a Python source tree",
    )
    .version(VERSION)
    .argument("[directory]", "Directory to outline", ".")
    .option("-a, --arguments", "Show argument names and default values")
    .option("-t, --types", "Show type annotations (argument types only, without -a)")
    .option("-d, --docstrings", "Show docstrings")
    .option("--ignore <patterns...>", "Additional glob patterns to skip (dir/ skips a whole directory)")
    .option("--gitignore", "Also skip files ignored by the directory's .gitignore")
    .option("-c, --config <file>", "Config file (default: <directory>/.py-outline.json)")
    .option("--no-color", "Disable colored output")
    .option("--no-pager", "Never pipe output through $PAGER")
    .option("-v, --verbose", "Log debug details to stderr")
    .action(async (directory: string, options: CliFlags) => {
      const code = await outlineCommand(directory, options);
      if (code !== 0) process.exit(code);
    });
}

export async function run(argv: string[]): Promise<void> {
  setLoggerStderr(true);
  process.once("SIGINT", () => {
    logger.error("Interrupted");
    process.exit(1);
  });

  await createProgram().parseAsync(argv);
}
