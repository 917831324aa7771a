/**
 * Runtime Type Guards
 *
 * Narrowing functions for collaborator handles and records.
 * The wrapper resolves its dependencies by address at evaluation time,
 * so whatever sits behind an address must be checked before use.
 */

import type {
  AllowlistStore,
  AttestationAuthority,
  AttestationIndexer,
  AttestationRecord,
  DependencySlot,
} from "./collaborators.js";
import { DEPENDENCY_SLOTS } from "./collaborators.js";

const HEX = /^0x[0-9a-fA-F]*$/;
const ADDRESS = /^0x[0-9a-fA-F]{40}$/;

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

function hasMethod(value: Record<string, unknown>, name: string): boolean {
  return typeof value[name] === "function";
}

// =============================================================================
// Collaborator guards
// =============================================================================

export function isAllowlistStore(value: unknown): value is AllowlistStore {
  return isObject(value) && hasMethod(value, "isMember");
}

export function isAttestationIndexer(value: unknown): value is AttestationIndexer {
  return isObject(value) && hasMethod(value, "getAttestationId");
}

export function isAttestationAuthority(value: unknown): value is AttestationAuthority {
  return isObject(value) && hasMethod(value, "getAttestation");
}

// =============================================================================
// Record guards
// =============================================================================

export function isAttestationRecord(value: unknown): value is AttestationRecord {
  if (!isObject(value)) return false;
  return (
    typeof value.uid === "string" &&
    HEX.test(value.uid) &&
    typeof value.schema === "string" &&
    HEX.test(value.schema) &&
    typeof value.recipient === "string" &&
    ADDRESS.test(value.recipient) &&
    typeof value.payload === "string" &&
    HEX.test(value.payload) &&
    typeof value.expirationTime === "bigint" &&
    typeof value.revocationTime === "bigint"
  );
}

// =============================================================================
// Identifier guards
// =============================================================================

const SLOTS = new Set<string>(DEPENDENCY_SLOTS);

export function isDependencySlot(value: unknown): value is DependencySlot {
  return typeof value === "string" && SLOTS.has(value);
}
