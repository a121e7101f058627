/**
 * @swapdesk/node: Entry point.
 *
 * Loads config, builds the service and the Hono app, starts the HTTP
 * server and the background jobs, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseOperatorIds, toSwapConfig } from "./config.js";
import { createApp } from "./app.js";
import { JobRunner } from "./jobs.js";
import { SwapDeskService } from "./services/swapdesk-service.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const operators = parseOperatorIds(config.OPERATOR_IDS);
  if (operators.length === 0) {
    logger.warn("OPERATOR_IDS is empty; proofs and disputes cannot be reviewed");
  }

  const service = new SwapDeskService({
    swap: toSwapConfig(config),
    operators,
    maxEventsPerBlock: config.LEDGER_MAX_EVENTS_PER_BLOCK,
    logger,
    ...(config.LEDGER_FILE !== undefined ? { ledgerFile: config.LEDGER_FILE } : {}),
  });
  logger.info(
    { ledger: config.LEDGER_FILE ?? "memory", operatorCount: operators.length },
    "Service configured",
  );

  const { app } = createApp({
    service,
    logger,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const jobs = new JobRunner({
    service,
    logger: logger.child({ component: "jobs" }),
    intervals: {
      sweep: config.SWEEP_INTERVAL_MS,
      reminders: config.REMINDER_INTERVAL_MS,
      integrity: config.INTEGRITY_CHECK_INTERVAL_MS,
      invoices: config.INVOICE_INTERVAL_MS,
    },
  });
  jobs.start();

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "SwapDesk node started");

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    jobs.stop();
    server.close();
    await service.stop();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
