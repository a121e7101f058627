/**
 * @swapdesk/node
 *
 * HTTP API for SwapDesk: Hono routes over the swap lifecycle and the
 * audit ledger, plus the background sweep jobs.
 *
 * @packageDocumentation
 */

export { SwapDeskService } from "./services/swapdesk-service.js";
export type { SwapDeskServiceConfig } from "./services/swapdesk-service.js";
export { loadConfig, parseOperatorIds, toSwapConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { JobRunner, JOB_NAMES } from "./jobs.js";
export type { JobName, JobOutcome, JobRunnerOptions } from "./jobs.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
