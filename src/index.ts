import { loadConfig } from "./config.js";
import { runAction } from "./action.js";
import { logger } from "./logger.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const outcome = await runAction(config);

  logger.info("Done", { status: outcome.status });
}

main().catch((err) => {
  logger.error("Review failed", {
    error: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
