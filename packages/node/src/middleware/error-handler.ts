/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Client error codes map to their status in CLIENT_ERROR_STATUS.
 * Anything else is a 500 whose message is not sent to the client.
 */

import type { Context } from "hono";
import { CLIENT_ERROR_STATUS, createErrorEnvelope, isClientErrorCode } from "../types/error.js";

function errorCodeOf(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

export interface ErrorHandlerOptions {
  /** Called for every 500 with the original error */
  readonly onInternalError?: ((err: Error) => void) | undefined;
}

/**
 * Create the global error handler. Registered as Hono's onError handler.
 */
export function createErrorHandler(
  options: ErrorHandlerOptions = {},
): (err: Error, c: Context) => Response {
  return (err, c) => {
    const code = errorCodeOf(err);

    if (code === undefined || !isClientErrorCode(code)) {
      options.onInternalError?.(err);
      return c.json(
        createErrorEnvelope(code ?? "INTERNAL_ERROR", "Internal server error"),
        500,
      );
    }

    return c.json(createErrorEnvelope(code, err.message), CLIENT_ERROR_STATUS[code]);
  };
}
