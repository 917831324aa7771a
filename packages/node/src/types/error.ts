/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code, message, details? } }
 */

import type { ComplianceErrorCode } from "@wardwrap/compliance";
import type { GateErrorCode } from "@wardwrap/gate";
import type { LedgerErrorCode } from "@wardwrap/ledger";

// =============================================================================
// Error Codes
// =============================================================================

/** Codes raised by the HTTP layer itself. */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHENTICATED"
  | "INTERNAL_ERROR";

/** Codes raised by the domain packages; they reach clients unchanged. */
export type DomainErrorCode = GateErrorCode | LedgerErrorCode | ComplianceErrorCode;

export type ErrorCode = ApiErrorCode | DomainErrorCode;

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  if (details !== undefined) {
    return { error: { code, message, details } };
  }
  return { error: { code, message } };
}
