/**
 * @tally/node — HTTP API over the Tally ledger.
 *
 * Public API of the package. main.ts is the executable entry point
 * and is not re-exported.
 */

export { TallyService, DEFAULT_ACTIVITY_LIMIT } from "./services/tally-service.js";
export type {
  TallyServiceConfig,
  ActivityItem,
  LedgerView,
} from "./services/tally-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
