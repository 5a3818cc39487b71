/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { TallyService } from "../services/tally-service.js";

/**
 * Hono environment type for the Tally app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The service every API route delegates to */
    service: TallyService;
  };
}

/**
 * Environment of a handler that runs after validateBody(schema).
 */
export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}
