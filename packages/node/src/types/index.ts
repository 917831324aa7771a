/**
 * Type barrel — re-exports all public types from @wardwrap/node.
 */

// DTOs
export {
  AmountSchema,
  AddressFieldSchema,
  DepositSchema,
  WithdrawSchema,
  TransferSchema,
  ApproveSchema,
  TransferFromSchema,
  SetDependencySchema,
  AccountSchema,
  FaucetSchema,
  UnderlyingApproveSchema,
  AttestSchema,
  ListEventsQuerySchema,
  toEventDto,
} from "./dto.js";
export type {
  DepositDto,
  WithdrawDto,
  TransferDto,
  ApproveDto,
  TransferFromDto,
  SetDependencyDto,
  AccountDto,
  FaucetDto,
  UnderlyingApproveDto,
  AttestDto,
  ListEventsQuery,
  EventDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type {
  ApiErrorCode,
  DomainErrorCode,
  ErrorCode,
  ErrorDetail,
  ErrorEnvelope,
} from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
