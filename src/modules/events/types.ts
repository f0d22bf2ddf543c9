import type { Address, Hex } from 'viem';

/** Payload of every registry event, keyed by Solidity event name */
export interface RegistryEvents {
  AgentRegistered: {
    agentId: bigint;
    agentAddress: Address;
    agentDomain: string;
    agentDID: string;
    description: string;
  };
  AgentUpdated: {
    agentId: bigint;
    agentAddress: Address;
    agentDomain: string;
    agentDID: string;
    description: string;
  };
  AgentDeveloperLinked: { agentId: bigint; developerDID: string };
  FeedbackAuthorized: { clientAgentId: bigint; serverAgentId: bigint; authToken: Hex };
  ValidationRequested: { validatorAgentId: bigint; serverAgentId: bigint; dataHash: Hex };
  ValidationResponded: { validatorAgentId: bigint; serverAgentId: bigint; dataHash: Hex; score: number };
}

export type RegistryEventName = keyof RegistryEvents;

/** A single event, discriminated on `eventName` */
export type RegistryEvent = {
  [K in RegistryEventName]: { eventName: K; args: RegistryEvents[K] };
}[RegistryEventName];

/** ABI-encoded form of an event, as an EVM log would carry it */
export interface EncodedLog {
  topics: [Hex, ...Hex[]];
  data: Hex;
}

/** A committed event with its position on the ledger */
export type RegistryLogEntry = RegistryEvent &
  EncodedLog & {
    blockNumber: bigint;
    timestamp: bigint;
    transactionIndex: bigint;
    /** Position of the entry across the whole log */
    logIndex: number;
  };

/** Filters for {@link EventLog.query} */
export interface EventLogQueryFilters {
  eventName?: RegistryEventName | RegistryEventName[];
  /** Match entries naming this agent in any agent id field */
  agentId?: bigint;
  fromBlock?: bigint;
  toBlock?: bigint;
  order?: 'asc' | 'desc';
  offset?: number;
  limit?: number;
}

/**
 * Storage backend for committed events.
 *
 * Implementations must keep entries in append order.
 */
export interface EventLogAdapter {
  append(entry: RegistryLogEntry): void;
  query(filters: EventLogQueryFilters): RegistryLogEntry[];
  size(): number;
}
