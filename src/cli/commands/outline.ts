import * as path from "node:path";
import {
  loadFileConfig,
  resolveSettings,
  type CliFlags,
} from "../../core/config.js";
import { OutlineError } from "../../core/errors.js";
import { runOutline } from "../../outline/pipeline.js";
import { formatReport } from "../../output/formatter.js";
import { TreeSitterManager } from "../../parser/tree-sitter-manager.js";
import { supportsColor } from "../../utils/colors.js";
import { logger, setLogLevel } from "../../utils/logger.js";
import { writeWithPager, type OutputStream } from "../../utils/pager.js";

export interface OutlineIO {
  stdout: OutputStream;
  env: NodeJS.ProcessEnv;
  manager?: TreeSitterManager;
}

/**
 * Outline `directory` and print the report. Resolves to the process exit
 * code: 0 when the report was printed (even if some files failed to parse),
 * 1 on a bad directory, a bad config file or an unexpected error.
 */
export async function outlineCommand(
  directory: string,
  flags: CliFlags,
  io: OutlineIO = { stdout: process.stdout, env: process.env },
): Promise<number> {
  if (flags.verbose) setLogLevel("debug");

  try {
    const root = path.resolve(directory);
    const fileConfig = loadFileConfig(root, flags.config);
    const settings = resolveSettings(root, flags, fileConfig, {
      colorSupported: supportsColor(io.stdout, io.env),
    });

    const report = await runOutline(
      {
        root: settings.root,
        verbosity: settings.verbosity,
        docstrings: settings.docstrings,
        ignorePatterns: settings.ignorePatterns,
        gitignore: settings.gitignore,
      },
      io.manager,
    );

    if (report.files.length === 0) {
      logger.info(`No Python files found in ${report.root}`);
      return 0;
    }

    writeWithPager(formatReport(report, { color: settings.color }), io.stdout, {
      enabled: settings.pager,
      command: io.env.PAGER,
    });

    logger.debug(
      `Outlined ${report.files.length - report.errors.length} of ${report.files.length} files`,
    );
    return 0;
  } catch (err) {
    if (err instanceof OutlineError) {
      logger.error(err.message);
    } else {
      logger.error(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
      if (err instanceof Error && err.stack) logger.debug(err.stack);
    }
    return 1;
  }
}
