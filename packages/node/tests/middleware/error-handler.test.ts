/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { GateError } from "@wardwrap/gate";
import { LedgerError } from "@wardwrap/ledger";
import { ComplianceError } from "@wardwrap/compliance";
import type { AppEnv } from "../../src/types/api-contract.js";
import { createErrorHandler } from "../../src/middleware/error-handler.js";
import type { RejectionLogEntry } from "../../src/middleware/error-handler.js";
import { requestIdMiddleware } from "../../src/middleware/request-id.js";
import { ADDR } from "../setup.js";
import type { ErrorBody } from "../setup.js";

function throwing(
  error: Error,
  onRejected?: (entry: RejectionLogEntry, error: Error) => void,
): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware());
  app.onError(createErrorHandler(onRejected));
  app.get("/boom", () => {
    throw error;
  });
  return app;
}

describe("error handler", () => {
  it.each([
    [new GateError("NO_PERMISSION", "no", ADDR.alice), 403],
    [new GateError("UNAUTHORIZED", "no", ADDR.alice), 403],
    [new GateError("UNRECOGNIZED_PARAMETER", "no"), 404],
    [new GateError("REENTRANT_CALL", "no"), 409],
    [new GateError("MALFORMED_ATTESTATION_DATA", "no"), 422],
    [new GateError("UNDERLYING_TRANSFER_FAILED", "no"), 422],
    [new GateError("INCOMPATIBLE_DEPENDENCY", "no"), 424],
    [new LedgerError("INVALID_AMOUNT", "no"), 400],
    [new LedgerError("INSUFFICIENT_BALANCE", "no"), 422],
    [new LedgerError("NOT_OWNER", "no"), 403],
    [new ComplianceError("ATTESTATION_NOT_FOUND", "no"), 404],
    [new ComplianceError("ALREADY_REVOKED", "no"), 409],
  ] as const)("maps %s to %i", async (error, status) => {
    const res = await throwing(error).request("/boom");

    expect(res.status).toBe(status);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe(error.code);
    expect(body.error.message).toBe("no");
  });

  it("adds the account to gate errors that carry one", async () => {
    const res = await throwing(new GateError("NO_PERMISSION", "no", ADDR.bob)).request("/boom");

    const body = (await res.json()) as ErrorBody;
    expect(body.error.details).toEqual({ account: ADDR.bob });
  });

  it("hides the message of unknown errors", async () => {
    const res = await throwing(new Error("database password leaked")).request("/boom");

    expect(res.status).toBe(500);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "INTERNAL_ERROR", message: "Internal server error" });
  });

  it("treats an unmapped code as internal", async () => {
    const error = Object.assign(new Error("odd"), { code: "SOMETHING_ELSE" });
    const res = await throwing(error).request("/boom");

    expect(res.status).toBe(500);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INTERNAL_ERROR");
  });

  it("reports rejections with the original message", async () => {
    const entries: RejectionLogEntry[] = [];
    const app = throwing(new Error("disk full"), (entry) => entries.push(entry));

    const res = await app.request("/boom");

    expect(entries).toHaveLength(1);
    expect(entries[0]).toEqual({
      status: 500,
      code: "INTERNAL_ERROR",
      message: "disk full",
      requestId: res.headers.get("X-Request-Id"),
    });
  });
});
