/**
 * agent-trust-registries
 *
 * Identity, reputation and validation registries for autonomous agents,
 * running on a shared ledger with a logical clock.
 *
 * @example
 * ```typescript
 * import { TrustRegistry, buildAddressDID } from 'agent-trust-registries';
 *
 * const registry = new TrustRegistry();
 * const agentId = registry.identity.register(
 *   { did: buildAddressDID(owner), address: owner },
 *   { sender: owner },
 * );
 *
 * registry.validation.requestValidation(validatorId, agentId, dataHash, { sender: anyone });
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Client
// ============================================================================

export { TrustRegistry } from './core/TrustRegistryClient.js';
export type { TrustRegistryDeps } from './core/TrustRegistryClient.js';

// ============================================================================
// Core
// ============================================================================

export { Ledger } from './core/Ledger.js';
export type { TxContext, TxEnvironment, TxReceipt, EntropySource, LedgerOptions } from './core/Ledger.js';
export { RegistryEventEmitter } from './core/EventEmitter.js';
export type { RegistryEmitterEvents } from './core/EventEmitter.js';
export { Telemetry } from './core/Telemetry.js';
export type { TelemetryEvent, TelemetrySink } from './core/Telemetry.js';
export {
  resolveConfig,
  trustRegistryConfigSchema,
  DEFAULT_CHAIN_ID,
  DEFAULT_REGISTRY_ADDRESS,
  DEFAULT_GENESIS_TIMESTAMP,
} from './core/config.js';
export type { TrustRegistryConfig, ResolvedConfig, RegistrationPolicyName, ValidationClock } from './core/config.js';
export { loadEnvConfig } from './core/env.js';
export { createLogger } from './core/logger.js';

// ============================================================================
// Errors
// ============================================================================

export { RegistryError, ErrorCode, isRegistryError } from './errors/RegistryError.js';
export type { ErrorCategory } from './errors/RegistryError.js';

// ============================================================================
// Identity
// ============================================================================

export { IdentityRegistry } from './modules/identity/IdentityRegistry.js';
export type { IdentityRegistryOptions } from './modules/identity/IdentityRegistry.js';
export { IdentifierPolicy, FeeBurnPolicy, createRegistrationPolicy } from './modules/identity/policies.js';
export type { RegistrationPolicy } from './modules/identity/policies.js';
export {
  DELEGATED_REGISTRATION_TYPES,
  consentDomainSeparator,
  hashDelegatedRegistration,
  recoverSigner,
} from './modules/identity/delegation.js';
export type { ConsentDomain, DelegatedRegistrationMessage } from './modules/identity/delegation.js';
export type {
  Agent,
  AgentDirectory,
  AgentListOptions,
  RegisterAgentOptions,
  DelegatedRegistrationOptions,
  UpdateAgentOptions,
} from './modules/identity/types.js';

// ============================================================================
// DID
// ============================================================================

export {
  DIDValidator,
  parseDID,
  DID_ID_LENGTH,
  DID_SEPARATOR_COUNT,
  DID_ADDRESS_RANGE,
  DID_PADDING_RANGE,
} from './modules/did/DIDValidator.js';
export { decodeBase58, BASE58_ALPHABET } from './modules/did/base58.js';
export { buildAddressDID } from './modules/did/builder.js';
export type { AddressExtraction, BuildDIDOptions, DIDLayout } from './modules/did/types.js';

// ============================================================================
// Reputation & Validation
// ============================================================================

export { ReputationRegistry, deriveAuthToken } from './modules/reputation/ReputationRegistry.js';
export type { FeedbackAuthorization, FeedbackAuthorizationStatus } from './modules/reputation/types.js';
export { ValidationRegistry, EXPIRATION_WINDOW } from './modules/validation/ValidationRegistry.js';
export type {
  ValidationRequest,
  ValidationResponse,
  PendingStatus,
  ValidationStatus,
} from './modules/validation/types.js';

// ============================================================================
// Events
// ============================================================================

export { EventLog } from './modules/events/EventLog.js';
export { InMemoryEventLogAdapter } from './modules/events/adapters/InMemoryEventLogAdapter.js';
export { RegistryEventsAbi } from './modules/events/abis.js';
export { encodeRegistryEvent } from './modules/events/encoding.js';
export type {
  RegistryEvents,
  RegistryEvent,
  RegistryEventName,
  RegistryLogEntry,
  EventLogAdapter,
  EventLogQueryFilters,
} from './modules/events/types.js';
