/**
 * Event Types
 *
 * Every state change of the wrapper is published as a WrapperEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events of a call that fails are never published
 * - Sequence numbers are gap-free and start at 1
 */

import type { Address } from "viem";
import type { DependencySlot } from "./collaborators.js";

/** Wrapped balance moved; `from` is zero on mint, `to` is zero on burn. */
export interface TransferEvent {
  readonly type: "Transfer";
  readonly from: Address;
  readonly to: Address;
  readonly value: bigint;
}

export interface ApprovalEvent {
  readonly type: "Approval";
  readonly owner: Address;
  readonly spender: Address;
  readonly value: bigint;
}

/** An account was added to the wards. */
export interface RelyEvent {
  readonly type: "Rely";
  readonly account: Address;
}

/** An account was removed from the wards. */
export interface DenyEvent {
  readonly type: "Deny";
  readonly account: Address;
}

export interface DependencyChangedEvent {
  readonly type: "DependencyChanged";
  readonly slot: DependencySlot;
  readonly address: Address;
}

export interface RecoveredEvent {
  readonly type: "Recovered";
  readonly account: Address;
  readonly amount: bigint;
}

/** Event body, before the log assigns metadata. */
export type WrapperEventBody =
  | TransferEvent
  | ApprovalEvent
  | RelyEvent
  | DenyEvent
  | DependencyChangedEvent
  | RecoveredEvent;

export type WrapperEventType = WrapperEventBody["type"];

/** Every event type the wrapper publishes. */
export const WRAPPER_EVENT_TYPES = [
  "Transfer",
  "Approval",
  "Rely",
  "Deny",
  "DependencyChanged",
  "Recovered",
] as const satisfies readonly WrapperEventType[];

/**
 * Metadata the event log stamps on every published event.
 */
export interface EventMetadata {
  /** Position in the log, 1-based */
  readonly sequence: number;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Caller of the entry point that produced the event */
  readonly caller: Address;
}

export type WrapperEvent = WrapperEventBody & { readonly metadata: EventMetadata };
