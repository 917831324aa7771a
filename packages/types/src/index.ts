/**
 * @wardwrap/types — Shared domain types for the wardwrap stack.
 *
 * These types are used across all wardwrap packages:
 * - Collaborator interfaces (underlying asset, allowlist, attestations)
 * - Dependency slot names
 * - Wrapper events
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies (viem is imported for its Address/Hex types only)
 * - No methods that mutate state
 */

// Collaborator types
export type {
  UnderlyingAsset,
  AllowlistStore,
  SchemaId,
  AttestationUid,
  AttestationRecord,
  AttestationIndexer,
  AttestationAuthority,
  DependencySlot,
  DependencySnapshot,
} from "./collaborators.js";

export { DEPENDENCY_SLOTS } from "./collaborators.js";

// Event types
export type {
  TransferEvent,
  ApprovalEvent,
  RelyEvent,
  DenyEvent,
  DependencyChangedEvent,
  RecoveredEvent,
  WrapperEventBody,
  WrapperEventType,
  EventMetadata,
  WrapperEvent,
} from "./event.js";

export { WRAPPER_EVENT_TYPES } from "./event.js";

// Runtime type guards
export {
  isAllowlistStore,
  isAttestationIndexer,
  isAttestationAuthority,
  isAttestationRecord,
  isDependencySlot,
} from "./guards.js";
