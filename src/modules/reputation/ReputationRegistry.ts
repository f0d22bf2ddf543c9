import { encodePacked, isAddressEqual, keccak256, zeroHash, type Hex } from 'viem';
import type { Ledger, TxContext, TxEnvironment } from '../../core/Ledger.js';
import type { Telemetry } from '../../core/Telemetry.js';
import { ErrorCode, RegistryError } from '../../errors/RegistryError.js';
import type { AgentDirectory } from '../identity/types.js';
import type { FeedbackAuthorization, FeedbackAuthorizationStatus } from './types.js';

function pairKey(clientAgentId: bigint, serverAgentId: bigint): string {
  return `${clientAgentId}:${serverAgentId}`;
}

/**
 * Feedback pre-authorization between agents.
 *
 * A server agent's owner issues one opaque token per (client, server)
 * pair. Tokens are keyed by agent id, so they outlive any address, domain
 * or DID change on either side, and are never revoked or reissued.
 *
 * @example
 * ```typescript
 * const token = registry.reputation.acceptFeedback(clientId, serverId, { sender: serverOwner });
 * registry.reputation.isAuthorized(clientId, serverId); // { authorized: true, authToken: token }
 * ```
 */
export class ReputationRegistry {
  private readonly ledger: Ledger;
  private readonly identity: AgentDirectory;
  private readonly telemetry: Telemetry;
  private readonly authorizations = new Map<string, FeedbackAuthorization>();

  constructor(ledger: Ledger, identity: AgentDirectory, telemetry: Telemetry) {
    this.ledger = ledger;
    this.identity = identity;
    this.telemetry = telemetry;
  }

  /**
   * Authorize `clientAgentId` to leave feedback on `serverAgentId`.
   *
   * @param tx - `sender` must be the server agent's current owner
   * @returns The new authorization token
   * @throws {RegistryError} `AgentNotFound`, `UnauthorizedFeedback`,
   * `FeedbackAlreadyAuthorized`
   */
  acceptFeedback(clientAgentId: bigint, serverAgentId: bigint, tx: TxContext): Hex {
    this.telemetry.track('reputation.acceptFeedback');

    return this.ledger.transact(tx, 'reputation.acceptFeedback', (env) => {
      if (!this.identity.exists(clientAgentId)) {
        throw new RegistryError(ErrorCode.AGENT_NOT_FOUND, `Client agent ${clientAgentId} not found`, { clientAgentId });
      }
      const server = this.identity.get(serverAgentId);

      if (!isAddressEqual(server.agentAddress, env.sender)) {
        throw new RegistryError(
          ErrorCode.UNAUTHORIZED_FEEDBACK,
          `Only the owner of server agent ${serverAgentId} can authorize feedback`,
          { serverAgentId, sender: env.sender },
        );
      }

      const key = pairKey(clientAgentId, serverAgentId);
      if (this.authorizations.has(key)) {
        throw new RegistryError(
          ErrorCode.FEEDBACK_ALREADY_AUTHORIZED,
          `Feedback from agent ${clientAgentId} to agent ${serverAgentId} is already authorized`,
          { clientAgentId, serverAgentId },
        );
      }

      const authToken = deriveAuthToken(clientAgentId, serverAgentId, env);
      this.authorizations.set(key, { clientAgentId, serverAgentId, authToken, issuedAt: env.blockNumber });
      this.ledger.emit({ eventName: 'FeedbackAuthorized', args: { clientAgentId, serverAgentId, authToken } });
      return authToken;
    });
  }

  isAuthorized(clientAgentId: bigint, serverAgentId: bigint): FeedbackAuthorizationStatus {
    const authToken = this.getAuthId(clientAgentId, serverAgentId);
    return { authorized: authToken !== zeroHash, authToken };
  }

  /** Authorization token for the pair; the zero hash when absent */
  getAuthId(clientAgentId: bigint, serverAgentId: bigint): Hex {
    return this.authorizations.get(pairKey(clientAgentId, serverAgentId))?.authToken ?? zeroHash;
  }

  /** Full authorization record, or `null` */
  getAuthorization(clientAgentId: bigint, serverAgentId: bigint): FeedbackAuthorization | null {
    const found = this.authorizations.get(pairKey(clientAgentId, serverAgentId));
    return found ? { ...found } : null;
  }
}

/**
 * keccak256 over both ids, the block timestamp and number, and the
 * transaction seed, packed as Solidity `abi.encodePacked` would.
 */
export function deriveAuthToken(clientAgentId: bigint, serverAgentId: bigint, env: TxEnvironment): Hex {
  return keccak256(
    encodePacked(
      ['uint256', 'uint256', 'uint256', 'uint256', 'bytes32'],
      [clientAgentId, serverAgentId, env.timestamp, env.blockNumber, env.seed],
    ),
  );
}
