import type { Logger } from 'pino';
import { DIDValidator } from '../modules/did/DIDValidator.js';
import { InMemoryEventLogAdapter } from '../modules/events/adapters/InMemoryEventLogAdapter.js';
import { EventLog } from '../modules/events/EventLog.js';
import type { EventLogAdapter } from '../modules/events/types.js';
import type { ConsentDomain } from '../modules/identity/delegation.js';
import { IdentityRegistry } from '../modules/identity/IdentityRegistry.js';
import { createRegistrationPolicy } from '../modules/identity/policies.js';
import { ReputationRegistry } from '../modules/reputation/ReputationRegistry.js';
import { ValidationRegistry } from '../modules/validation/ValidationRegistry.js';
import { resolveConfig, type ResolvedConfig, type TrustRegistryConfig } from './config.js';
import { loadEnvConfig } from './env.js';
import { RegistryEventEmitter, type RegistryEmitterEvents } from './EventEmitter.js';
import { Ledger, type EntropySource } from './Ledger.js';
import { componentLogger, createLogger } from './logger.js';
import { Telemetry, type TelemetrySink } from './Telemetry.js';

/** Collaborators that can be swapped out, mostly for tests */
export interface TrustRegistryDeps {
  /** Storage for committed events (default in-memory) */
  eventLogAdapter?: EventLogAdapter;
  /** Per-transaction seed source (default 32 random bytes) */
  entropy?: EntropySource;
  /** Root logger (default pino at `config.logLevel`) */
  logger?: Logger;
  telemetrySink?: TelemetrySink;
}

/**
 * The main entry point: one ledger shared by the identity, reputation and
 * validation registries.
 *
 * Environment variables (`TRUST_REGISTRY_*`) are read first and explicit
 * config wins over them. Registries are created on first access.
 *
 * @example
 * ```typescript
 * import { TrustRegistry } from 'agent-trust-registries';
 *
 * const registry = new TrustRegistry({ logLevel: 'warn' });
 *
 * const serverId = registry.identity.register(
 *   { domain: 'server.example', address: serverOwner },
 *   { sender: serverOwner },
 * );
 * const clientId = registry.identity.register(
 *   { domain: 'client.example', address: clientOwner },
 *   { sender: clientOwner },
 * );
 *
 * const token = registry.reputation.acceptFeedback(clientId, serverId, { sender: serverOwner });
 * ```
 */
export class TrustRegistry {
  private readonly config: ResolvedConfig;
  private readonly logger: Logger;
  private readonly events: RegistryEventEmitter;
  private readonly telemetry: Telemetry;
  readonly eventLog: EventLog;
  readonly ledger: Ledger;

  private _did?: DIDValidator;
  private _identity?: IdentityRegistry;
  private _reputation?: ReputationRegistry;
  private _validation?: ValidationRegistry;

  constructor(config: TrustRegistryConfig = {}, deps: TrustRegistryDeps = {}) {
    this.config = resolveConfig({ ...loadEnvConfig(), ...config });
    this.logger = deps.logger ?? createLogger(this.config.logLevel);
    this.events = new RegistryEventEmitter(componentLogger(this.logger, 'events'));
    this.telemetry = new Telemetry(this.config.telemetry, deps.telemetrySink, componentLogger(this.logger, 'telemetry'));

    this.eventLog = new EventLog(
      deps.eventLogAdapter ?? new InMemoryEventLogAdapter(),
      this.events,
      componentLogger(this.logger, 'event-log'),
    );
    this.ledger = new Ledger({
      eventLog: this.eventLog,
      logger: componentLogger(this.logger, 'ledger'),
      genesisBlock: this.config.genesisBlock,
      genesisTimestamp: this.config.genesisTimestamp,
      ...(deps.entropy ? { entropy: deps.entropy } : {}),
    });

    this.telemetry.track('registry.init', {
      policy: this.config.registrationPolicy,
      validationClock: this.config.validationClock,
    });
    this.logger.info(
      { chainId: this.config.chainId, policy: this.config.registrationPolicy },
      'trust registry initialized',
    );
  }

  // ===========================================================================
  // Registry Accessors (lazy initialization)
  // ===========================================================================

  /** Address-bound DID checks */
  get did(): DIDValidator {
    if (!this._did) {
      this._did = new DIDValidator();
    }
    return this._did;
  }

  /**
   * Identity registry.
   *
   * register, registerWithDelegatedConsent, updateAgent,
   * updateDescriptionOnly, linkDeveloperDID and the resolve/read methods
   */
  get identity(): IdentityRegistry {
    if (!this._identity) {
      this._identity = new IdentityRegistry(this.ledger, this.telemetry, {
        didValidator: this.did,
        policy: createRegistrationPolicy(this.config.registrationPolicy, this.config.registrationFee),
        consentDomain: this.consentDomain(),
        consumeNonceOnFailure: this.config.consumeNonceOnFailure,
        logger: componentLogger(this.logger, 'identity'),
      });
    }
    return this._identity;
  }

  /** Feedback pre-authorization: acceptFeedback, isAuthorized, getAuthId */
  get reputation(): ReputationRegistry {
    if (!this._reputation) {
      this._reputation = new ReputationRegistry(this.ledger, this.identity, this.telemetry);
    }
    return this._reputation;
  }

  /** Validation requests: requestValidation, submitResponse and reads */
  get validation(): ValidationRegistry {
    if (!this._validation) {
      this._validation = new ValidationRegistry(this.ledger, this.identity, this.telemetry, {
        clock: this.config.validationClock,
      });
    }
    return this._validation;
  }

  // ===========================================================================
  // Events & Config
  // ===========================================================================

  /**
   * Subscribe to committed registry events.
   *
   * @returns A function to unsubscribe
   */
  on<K extends keyof RegistryEmitterEvents>(
    event: K,
    listener: (data: RegistryEmitterEvents[K]) => void,
  ): () => void {
    return this.events.on(event, listener);
  }

  /** Resolved configuration */
  getConfig(): ResolvedConfig {
    return { ...this.config };
  }

  /** Hand buffered telemetry to the sink */
  flushTelemetry(): number {
    return this.telemetry.flush();
  }

  private consentDomain(): ConsentDomain {
    return {
      name: this.config.domainName,
      version: this.config.domainVersion,
      chainId: this.config.chainId,
      verifyingContract: this.config.registryAddress,
    };
  }
}
