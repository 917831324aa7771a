/**
 * @wardwrap/compliance — Reference collaborators for the eligibility policy.
 *
 * In-memory stand-ins for the systems the wrapper consults:
 * - InMemoryAllowlist — membership set
 * - InMemoryAttestationAuthority — issues and revokes attestation records
 * - InMemoryAttestationIndexer — (account, schema) → attestation uid
 * - Payload codec for account and jurisdiction verifications
 */

export { InMemoryAllowlist } from "./allowlist.js";
export { InMemoryAttestationAuthority } from "./attestation-authority.js";
export { InMemoryAttestationIndexer } from "./attestation-indexer.js";
export {
  JURISDICTION_CODE_OFFSET,
  JURISDICTION_CODE_LENGTH,
  VERIFIED_MARKER,
  encodeVerifiedPayload,
  encodeJurisdictionPayload,
  readJurisdictionCode,
  payloadEquals,
} from "./payload.js";
export { systemClock } from "./clock.js";
export type { Clock } from "./clock.js";
export { ComplianceError } from "./types.js";
export type { AttestInput, ComplianceErrorCode } from "./types.js";
