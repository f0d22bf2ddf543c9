import type { Address, Hex } from 'viem';

/**
 * A registered agent.
 *
 * Optional text fields hold `''` when unset, matching the event payloads.
 */
export interface Agent {
  agentId: bigint;
  /** Owner account; the only caller allowed to mutate this record */
  agentAddress: Address;
  /** Domain with its registered casing */
  domain: string;
  did: string;
  description: string;
  /** DID of the developer that registered or claimed this agent */
  developerDID: string;
  /** Block of registration */
  registeredAt: bigint;
  /** Block of the last change */
  updatedAt: bigint;
}

/** Options for {@link IdentityRegistry.register} */
export interface RegisterAgentOptions {
  domain?: string;
  did?: string;
  /** Prospective owner; must equal the transaction sender */
  address: Address | string;
  description?: string;
}

/** Options for {@link IdentityRegistry.registerWithDelegatedConsent} */
export interface DelegatedRegistrationOptions {
  /** DID bound to the submitting developer's address */
  developerDID: string;
  /** DID bound to `agentAddress` */
  agentDID: string;
  agentAddress: Address | string;
  description?: string;
  /** Last block timestamp at which the consent is valid */
  expiry: bigint;
  /** EIP-712 signature by `agentAddress` over the consent message */
  agentSignature: Hex;
}

/** Options for {@link IdentityRegistry.updateAgent}; omitted fields stay as they are */
export interface UpdateAgentOptions {
  newAddress?: Address | string;
  /** `''` clears the DID */
  newDID?: string;
  newDescription?: string;
}

/** Pagination for {@link IdentityRegistry.list} */
export interface AgentListOptions {
  offset?: number;
  limit?: number;
}

/**
 * Read-only view of the agent directory.
 *
 * The reputation and validation registries depend on this, never on the
 * mutating registry surface.
 */
export interface AgentDirectory {
  exists(agentId: bigint): boolean;
  /** @throws {RegistryError} `AgentNotFound` */
  get(agentId: bigint): Agent;
}

/** Identifying fields a registration policy inspects */
export interface RegistrationFields {
  domain: string;
  did: string;
}
