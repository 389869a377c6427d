#!/usr/bin/env node
import { createCli } from "./index.js";
import { logger } from "./utils/logger.js";

async function main() {
  return createCli().parseAsync();
}

main().catch((err: unknown) => {
  logger.error({ err }, "CLI error");
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
