/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import { InMemoryHistoryStore } from "@tally/event-store";
import type { HistoryStore } from "@tally/event-store";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { TallyService } from "./services/tally-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createExpenseRoutes } from "./routes/expenses.js";
import { createSettlementRoutes } from "./routes/settlements.js";
import { createGroupRoutes } from "./routes/groups.js";
import { createBalanceRoutes } from "./routes/balances.js";
import { createActivityRoutes } from "./routes/activity.js";
import { createLedgerRoutes } from "./routes/ledger.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** A prebuilt service. When omitted, one is built over `store`. */
  readonly service?: TallyService | undefined;
  /** Defaults to an empty in-memory history */
  readonly store?: HistoryStore | undefined;
  readonly logger?: Logger | undefined;
  readonly activityLimit?: number | undefined;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: TallyService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service =
    options.service ??
    new TallyService({
      store: options.store ?? new InMemoryHistoryStore(),
      logger: options.logger,
      activityLimit: options.activityLimit,
    });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(
    createErrorHandler({
      onInternalError: (err) => {
        options.logger?.error({ err }, "Unhandled error");
      },
    }),
  );

  app.notFound((c) =>
    c.json(
      createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
      404,
    ),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/expenses", createExpenseRoutes());
  app.route("/api/v1/settlements", createSettlementRoutes());
  app.route("/api/v1/groups", createGroupRoutes());
  app.route("/api/v1/activity", createActivityRoutes());
  app.route("/api/v1/ledger", createLedgerRoutes());
  app.route("/api/v1", createBalanceRoutes());

  return { app, service };
}
