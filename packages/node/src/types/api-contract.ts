/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { ReportService } from "../services/report-service.js";

/**
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Report service shared by all requests */
    service: ReportService;
  };
}

/**
 * Successful report responses are wrapped in a `data` envelope.
 */
export interface DataEnvelope<T> {
  readonly data: T;
}
