import type { Hex } from 'viem';

/** Result of {@link ReputationRegistry.isAuthorized} */
export interface FeedbackAuthorizationStatus {
  authorized: boolean;
  /** Zero hash when not authorized */
  authToken: Hex;
}

/** A stored feedback authorization */
export interface FeedbackAuthorization {
  clientAgentId: bigint;
  serverAgentId: bigint;
  authToken: Hex;
  /** Block the authorization was issued in */
  issuedAt: bigint;
}
