import type { Hex } from 'viem';

/** Stored request for a work artifact */
export interface ValidationRequest {
  dataHash: Hex;
  validatorAgentId: bigint;
  serverAgentId: bigint;
  /** Logical clock value at creation */
  timestamp: bigint;
  responded: boolean;
}

/** Result of {@link ValidationRegistry.isPending} */
export interface PendingStatus {
  exists: boolean;
  pending: boolean;
}

/** Result of {@link ValidationRegistry.getResponse} */
export interface ValidationResponse {
  hasResponse: boolean;
  /** 0 when there is no response */
  score: number;
}

/** Lifecycle state of a request slot */
export type ValidationStatus = 'absent' | 'pending' | 'responded' | 'expired';
