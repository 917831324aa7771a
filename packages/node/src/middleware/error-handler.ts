/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (GateError, LedgerError, ComplianceError)
 * to HTTP status codes by their `code`.
 */

import type { Context } from "hono";
import { GateError } from "@wardwrap/gate";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import type { DomainErrorCode, ErrorCode } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 424 | 500;

const STATUS_MAP = {
  // Input
  VALIDATION_ERROR: 400,
  INVALID_ADDRESS: 400,
  INVALID_AMOUNT: 400,
  INVALID_SENDER: 400,
  INVALID_RECEIVER: 400,
  INVALID_APPROVER: 400,
  INVALID_SPENDER: 400,
  RECIPIENT_MISMATCH: 400,
  SCHEMA_MISMATCH: 400,

  // Authority
  UNAUTHORIZED: 403,
  NO_PERMISSION: 403,
  NOT_OWNER: 403,

  // Lookup
  UNRECOGNIZED_PARAMETER: 404,
  ATTESTATION_NOT_FOUND: 404,

  // State
  REENTRANT_CALL: 409,
  ALREADY_REVOKED: 409,
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_ALLOWANCE: 422,
  MALFORMED_ATTESTATION_DATA: 422,
  INVALID_TARGET: 422,
  UNDERLYING_TRANSFER_FAILED: 422,

  // Collaborators
  INCOMPATIBLE_DEPENDENCY: 424,
} as const satisfies Record<DomainErrorCode | "VALIDATION_ERROR", ErrorStatus>;

type MappedCode = keyof typeof STATUS_MAP;

/** The `code` of an error, when it is one this handler maps. */
function mappedCode(error: Error): MappedCode | undefined {
  if (!("code" in error) || typeof error.code !== "string") {
    return undefined;
  }
  const code = error.code;
  return Object.keys(STATUS_MAP).find((known): known is MappedCode => known === code);
}

function errorDetails(error: Error): Record<string, unknown> | undefined {
  if (error instanceof GateError && error.account !== undefined) {
    return { account: error.account };
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

export interface RejectionLogEntry {
  readonly status: ErrorStatus;
  readonly code: ErrorCode;
  readonly message: string;
  readonly requestId: string;
}

/**
 * Build the onError handler. `onRejected` is told about every error
 * response, including the original message of internal errors.
 */
export function createErrorHandler(
  onRejected?: ((entry: RejectionLogEntry, error: Error) => void) | undefined,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    const known = mappedCode(err);
    const status: ErrorStatus = known === undefined ? 500 : STATUS_MAP[known];
    const code: ErrorCode = known ?? "INTERNAL_ERROR";

    onRejected?.(
      { status, code, message: err.message, requestId: c.get("requestId") },
      err,
    );

    // Don't leak internal details
    if (known === undefined) {
      return c.json(createErrorEnvelope(code, "Internal server error"), status);
    }

    return c.json(createErrorEnvelope(code, err.message, errorDetails(err)), status);
  };
}
