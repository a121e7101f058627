/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { SwapDeskService } from "../services/swapdesk-service.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The service behind every API route */
    service: SwapDeskService;

    /** Caller identity from X-Actor-Id (set by actor middleware) */
    actor: string;
  };
}
