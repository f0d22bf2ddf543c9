import { isAddressEqual, type Address, type Hex } from 'viem';
import type { Logger } from 'pino';
import type { Ledger, TxContext, TxEnvironment } from '../../core/Ledger.js';
import type { Telemetry } from '../../core/Telemetry.js';
import { ErrorCode, RegistryError } from '../../errors/RegistryError.js';
import { addressKey, parseAddress } from '../../utils/address.js';
import { domainKey } from '../../utils/domain.js';
import type { DIDValidator } from '../did/DIDValidator.js';
import {
  consentDomainSeparator,
  hashDelegatedRegistration,
  recoverSigner,
  type ConsentDomain,
} from './delegation.js';
import type { RegistrationPolicy } from './policies.js';
import type {
  Agent,
  AgentDirectory,
  AgentListOptions,
  DelegatedRegistrationOptions,
  RegisterAgentOptions,
  UpdateAgentOptions,
} from './types.js';

export interface IdentityRegistryOptions {
  didValidator: DIDValidator;
  policy: RegistrationPolicy;
  consentDomain: ConsentDomain;
  /**
   * Consume the delegated-consent nonce as soon as the expiry check
   * passes, even if the signature or a later check fails.
   */
  consumeNonceOnFailure: boolean;
  logger: Logger;
}

/** Fields of a new record that must clear the uniqueness checks */
interface Candidate {
  domain: string;
  did: string;
  address: Address;
}

/**
 * The canonical agent directory.
 *
 * One authoritative record table keyed by agent id, plus unique indexes on
 * lower-cased domain, DID and owner address that are only ever changed
 * together with the record. Every write checks all of its preconditions
 * before touching any map, so a rejected call leaves the directory as it
 * was.
 *
 * @example
 * ```typescript
 * const agentId = registry.identity.register(
 *   { domain: 'trader.example', address: owner },
 *   { sender: owner },
 * );
 * registry.identity.resolveByDomain('TRADER.example').agentId; // agentId
 * ```
 */
export class IdentityRegistry implements AgentDirectory {
  private readonly ledger: Ledger;
  private readonly telemetry: Telemetry;
  private readonly didValidator: DIDValidator;
  private readonly policy: RegistrationPolicy;
  private readonly consentDomain: ConsentDomain;
  private readonly consumeNonceOnFailure: boolean;
  private readonly logger: Logger;

  private readonly agents = new Map<bigint, Agent>();
  private readonly byDomain = new Map<string, bigint>();
  private readonly byDID = new Map<string, bigint>();
  private readonly byAddress = new Map<string, bigint>();
  private readonly consentNonces = new Map<string, bigint>();
  private nextAgentId = 1n;

  constructor(ledger: Ledger, telemetry: Telemetry, options: IdentityRegistryOptions) {
    this.ledger = ledger;
    this.telemetry = telemetry;
    this.didValidator = options.didValidator;
    this.policy = options.policy;
    this.consentDomain = options.consentDomain;
    this.consumeNonceOnFailure = options.consumeNonceOnFailure;
    this.logger = options.logger;
  }

  // ===========================================================================
  // Registration
  // ===========================================================================

  /**
   * Register the sender as a new agent.
   *
   * @param opts - Owner address plus optional domain, DID and description
   * @param tx - `sender` must equal `opts.address`; `value` pays a fee policy
   * @returns The new agent id
   * @throws {RegistryError} `UnauthorizedRegistration`, `InvalidAddress`,
   * `InvalidInput`, `InsufficientFee`, `DomainAlreadyRegistered`,
   * `DIDAddressMismatch`, `DIDAlreadyRegistered`, `AddressAlreadyRegistered`
   */
  register(opts: RegisterAgentOptions, tx: TxContext): bigint {
    this.telemetry.track('identity.register', { policy: this.policy.name });

    return this.ledger.transact(tx, 'identity.register', (env) => {
      const address = parseAddress(opts.address);
      if (!isAddressEqual(env.sender, address)) {
        throw new RegistryError(ErrorCode.UNAUTHORIZED_REGISTRATION, 'Only the owner address can register itself', {
          sender: env.sender,
          address,
        });
      }

      const candidate: Candidate = { domain: opts.domain ?? '', did: opts.did ?? '', address };
      this.policy.check({ domain: candidate.domain, did: candidate.did }, env);
      this.assertRegistrable(candidate);

      const agentId = this.insert(candidate, opts.description ?? '', env);
      this.policy.settle(env, this.ledger);
      return agentId;
    });
  }

  /**
   * Register an agent on its behalf, as a developer holding the agent's
   * signed consent.
   *
   * The agent's consent nonce is read and (by default) consumed right after
   * the expiry check, so a failed attempt still invalidates the signature
   * it carried.
   *
   * @throws {RegistryError} `DIDAddressMismatch`, `SignatureExpired`,
   * `InvalidAgentSignature`, plus everything {@link register} can throw
   * except `UnauthorizedRegistration`
   */
  registerWithDelegatedConsent(opts: DelegatedRegistrationOptions, tx: TxContext): bigint {
    this.telemetry.track('identity.registerWithDelegatedConsent', { policy: this.policy.name });

    return this.ledger.transact(tx, 'identity.registerWithDelegatedConsent', (env) => {
      const agentAddress = parseAddress(opts.agentAddress, 'agentAddress');
      const description = opts.description ?? '';

      if (!this.didValidator.validate(opts.developerDID, env.sender)) {
        throw new RegistryError(ErrorCode.DID_ADDRESS_MISMATCH, 'Developer DID does not embed the sender address', {
          developerDID: opts.developerDID,
          sender: env.sender,
        });
      }
      if (!this.didValidator.validate(opts.agentDID, agentAddress)) {
        throw new RegistryError(ErrorCode.DID_ADDRESS_MISMATCH, 'Agent DID does not embed the agent address', {
          agentDID: opts.agentDID,
          agentAddress,
        });
      }
      if (env.timestamp > opts.expiry) {
        throw new RegistryError(ErrorCode.SIGNATURE_EXPIRED, 'Delegated consent has expired', {
          expiry: opts.expiry,
          timestamp: env.timestamp,
        });
      }

      const nonce = this.nonces(agentAddress);
      if (this.consumeNonceOnFailure) {
        this.consentNonces.set(addressKey(agentAddress), nonce + 1n);
      }

      const digest = hashDelegatedRegistration(this.consentDomain, {
        developerDID: opts.developerDID,
        agentDID: opts.agentDID,
        agentAddress,
        description,
        nonce,
        expiry: opts.expiry,
      });
      const signer = recoverSigner(digest, opts.agentSignature);
      if (!signer || !isAddressEqual(signer, agentAddress)) {
        throw new RegistryError(ErrorCode.INVALID_AGENT_SIGNATURE, 'Consent was not signed by the agent address', {
          agentAddress,
          signer,
          nonce,
        });
      }

      const candidate: Candidate = { domain: '', did: opts.agentDID, address: agentAddress };
      this.policy.check({ domain: candidate.domain, did: candidate.did }, env);
      this.assertRegistrable(candidate);

      if (!this.consumeNonceOnFailure) {
        this.consentNonces.set(addressKey(agentAddress), nonce + 1n);
      }
      const agentId = this.insert(candidate, description, env);
      this.setDeveloperLink(agentId, opts.developerDID, env);
      this.policy.settle(env, this.ledger);
      return agentId;
    });
  }

  // ===========================================================================
  // Updates
  // ===========================================================================

  /**
   * Change an agent's owner address, DID and/or description.
   *
   * A new DID is checked against the address in effect after this call. An
   * address change alone re-checks the stored DID against the new address.
   *
   * @throws {RegistryError} `AgentNotFound`, `UnauthorizedUpdate`,
   * `InvalidAddress`, `AddressAlreadyRegistered`, `DIDAddressMismatch`,
   * `DIDAlreadyRegistered`
   */
  updateAgent(agentId: bigint, opts: UpdateAgentOptions, tx: TxContext): boolean {
    this.telemetry.track('identity.updateAgent', {
      address: opts.newAddress !== undefined,
      did: opts.newDID !== undefined,
      description: opts.newDescription !== undefined,
    });

    return this.ledger.transact(tx, 'identity.updateAgent', (env) => {
      const record = this.requireOwned(agentId, env);

      const nextAddress = opts.newAddress !== undefined ? parseAddress(opts.newAddress, 'newAddress') : record.agentAddress;
      const addressChanged = !isAddressEqual(nextAddress, record.agentAddress);
      if (addressChanged && this.byAddress.has(addressKey(nextAddress))) {
        throw new RegistryError(ErrorCode.ADDRESS_ALREADY_REGISTERED, `Address ${nextAddress} already owns an agent`, {
          address: nextAddress,
        });
      }

      const nextDID = opts.newDID ?? record.did;
      const didChanged = nextDID !== record.did;
      if (nextDID !== '' && (didChanged || addressChanged)) {
        if (!this.didValidator.validate(nextDID, nextAddress)) {
          throw new RegistryError(ErrorCode.DID_ADDRESS_MISMATCH, 'DID does not embed the owner address', {
            did: nextDID,
            address: nextAddress,
          });
        }
      }
      if (didChanged && nextDID !== '' && this.byDID.has(nextDID)) {
        throw new RegistryError(ErrorCode.DID_ALREADY_REGISTERED, 'DID already belongs to another agent', {
          did: nextDID,
        });
      }

      if (addressChanged) {
        this.byAddress.delete(addressKey(record.agentAddress));
        this.byAddress.set(addressKey(nextAddress), agentId);
        record.agentAddress = nextAddress;
      }
      if (didChanged) {
        if (record.did !== '') this.byDID.delete(record.did);
        if (nextDID !== '') this.byDID.set(nextDID, agentId);
        record.did = nextDID;
      }
      if (opts.newDescription !== undefined) {
        record.description = opts.newDescription;
      }
      record.updatedAt = env.blockNumber;

      this.emitUpdated(record);
      return true;
    });
  }

  /**
   * Replace the description only.
   *
   * @throws {RegistryError} `AgentNotFound`, `UnauthorizedUpdate`
   */
  updateDescriptionOnly(agentId: bigint, description: string, tx: TxContext): boolean {
    this.telemetry.track('identity.updateDescriptionOnly');

    return this.ledger.transact(tx, 'identity.updateDescriptionOnly', (env) => {
      const record = this.requireOwned(agentId, env);
      record.description = description;
      record.updatedAt = env.blockNumber;
      this.emitUpdated(record);
      return true;
    });
  }

  /**
   * Record the developer behind an agent, replacing any earlier link.
   *
   * @throws {RegistryError} `AgentNotFound`, `UnauthorizedUpdate`,
   * `InvalidAddress`, `InvalidDeveloperDID`
   */
  linkDeveloperDID(agentId: bigint, developerAddress: Address | string, developerDID: string, tx: TxContext): boolean {
    this.telemetry.track('identity.linkDeveloperDID');

    return this.ledger.transact(tx, 'identity.linkDeveloperDID', (env) => {
      this.requireOwned(agentId, env);
      const developer = parseAddress(developerAddress, 'developerAddress');
      if (!this.didValidator.validate(developerDID, developer)) {
        throw new RegistryError(ErrorCode.INVALID_DEVELOPER_DID, 'Developer DID does not embed the developer address', {
          developerDID,
          developerAddress: developer,
        });
      }
      this.setDeveloperLink(agentId, developerDID, env);
      return true;
    });
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * @throws {RegistryError} `AgentNotFound`
   */
  get(agentId: bigint): Agent {
    return { ...this.requireAgent(agentId) };
  }

  /**
   * Resolve by domain, ignoring case.
   *
   * @throws {RegistryError} `AgentNotFound`
   */
  resolveByDomain(domain: string): Agent {
    const agentId = domain === '' ? undefined : this.byDomain.get(domainKey(domain));
    if (agentId === undefined) {
      throw new RegistryError(ErrorCode.AGENT_NOT_FOUND, `No agent registered for domain ${domain}`, { domain });
    }
    return this.get(agentId);
  }

  /**
   * @throws {RegistryError} `InvalidAddress`, `AgentNotFound`
   */
  resolveByAddress(address: Address | string): Agent {
    const agentId = this.byAddress.get(addressKey(parseAddress(address)));
    if (agentId === undefined) {
      throw new RegistryError(ErrorCode.AGENT_NOT_FOUND, `No agent registered for address ${address}`, { address });
    }
    return this.get(agentId);
  }

  /**
   * @throws {RegistryError} `DIDNotRegistered`
   */
  resolveByDID(did: string): Agent {
    const agentId = did === '' ? undefined : this.byDID.get(did);
    if (agentId === undefined) {
      throw new RegistryError(ErrorCode.DID_NOT_REGISTERED, `DID not registered: ${did}`, { did });
    }
    return this.get(agentId);
  }

  exists(agentId: bigint): boolean {
    return this.agents.has(agentId);
  }

  /** Number of registered agents (also the highest agent id) */
  count(): bigint {
    return this.nextAgentId - 1n;
  }

  /**
   * Developer DID linked to an agent, `''` when none.
   *
   * @throws {RegistryError} `AgentNotFound`
   */
  getDeveloperDID(agentId: bigint): string {
    return this.requireAgent(agentId).developerDID;
  }

  /** Next delegated-consent nonce an agent address must sign */
  nonces(address: Address | string): bigint {
    return this.consentNonces.get(addressKey(address)) ?? 0n;
  }

  /** EIP-712 signing domain of delegated consent */
  getConsentDomain(): ConsentDomain {
    return { ...this.consentDomain };
  }

  /** EIP-712 domain separator of delegated consent */
  domainSeparator(): Hex {
    return consentDomainSeparator(this.consentDomain);
  }

  /** Agents in id order */
  list(opts: AgentListOptions = {}): Agent[] {
    const offset = opts.offset ?? 0;
    const all = [...this.agents.values()];
    const page = opts.limit !== undefined ? all.slice(offset, offset + opts.limit) : all.slice(offset);
    return page.map((agent) => ({ ...agent }));
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private requireAgent(agentId: bigint): Agent {
    const record = this.agents.get(agentId);
    if (!record) {
      throw new RegistryError(ErrorCode.AGENT_NOT_FOUND, `Agent ${agentId} not found`, { agentId });
    }
    return record;
  }

  private requireOwned(agentId: bigint, env: TxEnvironment): Agent {
    const record = this.requireAgent(agentId);
    if (!isAddressEqual(record.agentAddress, env.sender)) {
      throw new RegistryError(ErrorCode.UNAUTHORIZED_UPDATE, `Only the owner of agent ${agentId} can update it`, {
        agentId,
        sender: env.sender,
      });
    }
    return record;
  }

  private assertRegistrable(candidate: Candidate): void {
    if (candidate.domain !== '' && this.byDomain.has(domainKey(candidate.domain))) {
      throw new RegistryError(ErrorCode.DOMAIN_ALREADY_REGISTERED, `Domain ${candidate.domain} is already registered`, {
        domain: candidate.domain,
      });
    }
    if (candidate.did !== '') {
      if (!this.didValidator.validate(candidate.did, candidate.address)) {
        throw new RegistryError(ErrorCode.DID_ADDRESS_MISMATCH, 'DID does not embed the owner address', {
          did: candidate.did,
          address: candidate.address,
        });
      }
      if (this.byDID.has(candidate.did)) {
        throw new RegistryError(ErrorCode.DID_ALREADY_REGISTERED, 'DID already belongs to another agent', {
          did: candidate.did,
        });
      }
    }
    if (this.byAddress.has(addressKey(candidate.address))) {
      throw new RegistryError(ErrorCode.ADDRESS_ALREADY_REGISTERED, `Address ${candidate.address} already owns an agent`, {
        address: candidate.address,
      });
    }
  }

  private insert(candidate: Candidate, description: string, env: TxEnvironment): bigint {
    const agentId = this.nextAgentId++;
    const record: Agent = {
      agentId,
      agentAddress: candidate.address,
      domain: candidate.domain,
      did: candidate.did,
      description,
      developerDID: '',
      registeredAt: env.blockNumber,
      updatedAt: env.blockNumber,
    };

    this.agents.set(agentId, record);
    if (record.domain !== '') this.byDomain.set(domainKey(record.domain), agentId);
    if (record.did !== '') this.byDID.set(record.did, agentId);
    this.byAddress.set(addressKey(record.agentAddress), agentId);

    this.ledger.emit({
      eventName: 'AgentRegistered',
      args: {
        agentId,
        agentAddress: record.agentAddress,
        agentDomain: record.domain,
        agentDID: record.did,
        description: record.description,
      },
    });
    this.logger.debug({ agentId, address: record.agentAddress }, 'agent registered');
    return agentId;
  }

  private setDeveloperLink(agentId: bigint, developerDID: string, env: TxEnvironment): void {
    const record = this.requireAgent(agentId);
    record.developerDID = developerDID;
    record.updatedAt = env.blockNumber;
    this.ledger.emit({ eventName: 'AgentDeveloperLinked', args: { agentId, developerDID } });
  }

  private emitUpdated(record: Agent): void {
    this.ledger.emit({
      eventName: 'AgentUpdated',
      args: {
        agentId: record.agentId,
        agentAddress: record.agentAddress,
        agentDomain: record.domain,
        agentDID: record.did,
        description: record.description,
      },
    });
  }
}
