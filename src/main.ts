/**
 * Entry point: runs one bulk operation over an Intercom team inbox
 *
 * Usage:
 *   npm start
 *   BULK_MODE=maximal BULK_OPERATION=tag BULK_TAG_IDS=123,456 npm start
 *
 * Environment variables required:
 *   - INTERCOM_ACCESS_TOKEN: Intercom API access token
 *   - INTERCOM_ADMIN_ID: Admin that authors close parts
 *   - INTERCOM_INBOX_ID: Team inbox whose conversations are processed
 *
 * See .env.example for the optional BULK_* settings.
 * Exits with code 0 when every item succeeded, 1 otherwise.
 */

import "dotenv/config";
import { loadAppConfig } from "./config";
import { IntercomClient } from "./clients/intercom";
import { createConversationOperation } from "./operations";
import { BulkOrchestrator } from "./orchestration";
import * as logger from "./logger";

async function main(): Promise<number> {
  const config = loadAppConfig();
  logger.setLogLevel(config.logLevel);

  const client = new IntercomClient({ credentials: config.intercom });
  const operation = createConversationOperation(
    config.run.operation,
    client,
    config.operationParams,
  );
  const orchestrator = new BulkOrchestrator({ operation, fetcher: client });

  const report = await orchestrator.run({
    mode: config.run.mode,
    criteria: { teamId: config.inboxId, state: config.run.searchState },
    parallelWorkers: config.run.parallelWorkers,
    batchSize: config.run.batchSize,
    maxItems: config.run.maxItems,
    delayMs: config.run.delayMs,
  });

  logger.info("Bulk operation finished", {
    operation: operation.name,
    mode: report.mode,
    success: report.success,
    failed: report.failed,
    batches: report.batches,
    totalTimeMs: report.totalTimeMs,
  });

  if (report.failed > 0) {
    logger.warn("Some items failed - exiting with code 1");
    return 1;
  }
  return 0;
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    logger.error("Bulk operation failed with fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  });
