#!/usr/bin/env node
import { run } from "./cli/index.js";
import { logger } from "./utils/logger.js";

run(process.argv).catch((err: unknown) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
