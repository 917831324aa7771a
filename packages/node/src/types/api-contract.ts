/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Address } from "viem";
import type { WrapperService } from "../services/wrapper-service.js";

/**
 * Hono environment type for the wrapper app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The wrapper and its collaborators */
    service: WrapperService;

    /** Address the request acts as (set by auth or caller middleware) */
    caller: Address;
  };
}
