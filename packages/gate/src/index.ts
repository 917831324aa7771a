/**
 * @wardwrap/gate — Permission-gated wrapper over a fungible-asset ledger.
 *
 * The wrapper mints a wrapped asset 1:1 against an underlying asset and
 * only lets eligible accounts hold, send or receive it.
 *
 * Design rules:
 * - Eligibility is recomputed on every balance change (no grandfathering)
 * - Every failed call leaves no trace: no state change, no event
 * - Privileged operations check the wards before anything else
 * - Collaborators are reached through replaceable dependency slots
 */

// Core
export { WrappedToken } from "./wrapped-token.js";

// Policy
export { EligibilityPolicy, EvaluationScope, ELIGIBILITY_RULES } from "./eligibility.js";
export type { EligibilityRule, EligibilityPolicyConfig } from "./eligibility.js";
export { ExemptAccounts } from "./exemptions.js";
export type { ExemptAccountsConfig } from "./exemptions.js";
export { DEFAULT_SCHEMAS, EXCLUDED_JURISDICTION } from "./constants.js";

// Admin and configuration
export { Wards } from "./wards.js";
export { DependencyRegistry } from "./registry.js";
export { ContractDirectory } from "./directory.js";

// Execution
export { ReentrancyGuard } from "./reentrancy.js";
export { EventLog } from "./events.js";
export type { EventHandler, EventQuery, Subscription } from "./events.js";

// Types
export type {
  GateErrorCode,
  EligibilitySource,
  AttestationSchemas,
  WrappedTokenConfig,
  BackingReport,
} from "./types.js";

export { GateError } from "./types.js";
