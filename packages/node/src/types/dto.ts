/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as decimal strings in display units ("12.5") and are
 * converted with the token's decimals by the service.
 */

import { z } from "zod";
import type { Address } from "viem";
import { WRAPPER_EVENT_TYPES } from "@wardwrap/types";
import type { WrapperEvent, WrapperEventType } from "@wardwrap/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, "Expected a non-negative decimal amount");

/** Address strings are checked by the domain, which reports INVALID_ADDRESS. */
export const AddressFieldSchema = z.string().min(1);

// =============================================================================
// Token DTOs
// =============================================================================

export const DepositSchema = z.object({
  beneficiary: AddressFieldSchema,
  amount: AmountSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const WithdrawSchema = z.object({
  beneficiary: AddressFieldSchema,
  amount: AmountSchema,
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const TransferSchema = z.object({
  to: AddressFieldSchema,
  amount: AmountSchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const ApproveSchema = z.object({
  spender: AddressFieldSchema,
  amount: AmountSchema,
});

export type ApproveDto = z.infer<typeof ApproveSchema>;

export const TransferFromSchema = z.object({
  from: AddressFieldSchema,
  to: AddressFieldSchema,
  amount: AmountSchema,
});

export type TransferFromDto = z.infer<typeof TransferFromSchema>;

// =============================================================================
// Admin DTOs
// =============================================================================

export const SetDependencySchema = z.object({
  address: AddressFieldSchema,
});

export type SetDependencyDto = z.infer<typeof SetDependencySchema>;

export const AccountSchema = z.object({
  account: AddressFieldSchema,
});

export type AccountDto = z.infer<typeof AccountSchema>;

// =============================================================================
// Sandbox DTOs (reference collaborators)
// =============================================================================

export const FaucetSchema = z.object({
  account: AddressFieldSchema,
  amount: AmountSchema,
});

export type FaucetDto = z.infer<typeof FaucetSchema>;

export const UnderlyingApproveSchema = z.object({
  amount: AmountSchema,
});

export type UnderlyingApproveDto = z.infer<typeof UnderlyingApproveSchema>;

export const AttestSchema = z.object({
  account: AddressFieldSchema,
  country: z.string().length(2),
  verified: z.boolean().default(true),
  /** Unix seconds; omitted means the attestation never expires. */
  expirationTime: z.string().regex(/^\d+$/).optional(),
});

export type AttestDto = z.infer<typeof AttestSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  type: z.enum(WRAPPER_EVENT_TYPES).optional(),
  after: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export interface EventDto {
  readonly sequence: number;
  readonly type: WrapperEventType;
  readonly timestamp: string;
  readonly caller: Address;
  readonly data: Readonly<Record<string, string>>;
}

/**
 * JSON form of a wrapper event. Amounts become base-unit strings.
 */
export function toEventDto(event: WrapperEvent): EventDto {
  return {
    sequence: event.metadata.sequence,
    type: event.type,
    timestamp: event.metadata.timestamp,
    caller: event.metadata.caller,
    data: eventData(event),
  };
}

function eventData(event: WrapperEvent): Record<string, string> {
  switch (event.type) {
    case "Transfer":
      return { from: event.from, to: event.to, value: event.value.toString() };
    case "Approval":
      return { owner: event.owner, spender: event.spender, value: event.value.toString() };
    case "Rely":
    case "Deny":
      return { account: event.account };
    case "DependencyChanged":
      return { slot: event.slot, address: event.address };
    case "Recovered":
      return { account: event.account, amount: event.amount.toString() };
  }
}
