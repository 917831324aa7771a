/**
 * Caller resolution middleware.
 *
 * Every entry point of the wrapper takes the acting address explicitly.
 * Over HTTP that address comes from one of two places:
 *
 * 1. Secured mode: X-Api-Key, looked up in the configured key map
 * 2. Unsecured mode (tests, local sandbox): the X-Caller header itself
 *
 * On success, sets `c.set("caller", address)`. On failure, returns 401.
 * Whether the caller may perform an operation is the wrapper's decision
 * (wards, eligibility), not this middleware's.
 */

import { getAddress, isAddress } from "viem";
import type { Address } from "viem";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller";

export interface AuthConfig {
  /** Map of API key → caller address */
  readonly apiKeys: ReadonlyMap<string, Address>;
}

/**
 * Resolve the caller from X-Api-Key.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHENTICATED", "Authentication required"),
        401,
      );
    }

    const caller = config.apiKeys.get(apiKey);
    if (caller === undefined) {
      return c.json(createErrorEnvelope("UNAUTHENTICATED", "Invalid API key"), 401);
    }

    c.set("caller", caller);
    return next();
  };
}

/**
 * Take the caller from X-Caller as given.
 */
export function callerHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(CALLER_HEADER);
    if (header === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHENTICATED", `${CALLER_HEADER} header required`),
        401,
      );
    }
    if (!isAddress(header, { strict: false })) {
      return c.json(
        createErrorEnvelope("UNAUTHENTICATED", `${CALLER_HEADER} is not an address`),
        401,
      );
    }

    c.set("caller", getAddress(header));
    return next();
  };
}
