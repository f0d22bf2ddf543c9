import { describe, it, expect, beforeEach } from 'vitest';
import { zeroHash } from 'viem';
import type { TrustRegistry } from '../../src/core/TrustRegistryClient.js';
import { ErrorCode } from '../../src/errors/RegistryError.js';
import { deriveAuthToken } from '../../src/modules/reputation/ReputationRegistry.js';
import {
  alice,
  bob,
  carol,
  catchRegistryError,
  createRegistry,
  dave,
  fixedEntropy,
  GENESIS,
  registerAgent,
  TEST_SEED,
} from '../fixtures/mocks.js';

describe('ReputationRegistry', () => {
  let registry: TrustRegistry;
  let serverId: bigint;
  let clientId: bigint;

  beforeEach(() => {
    registry = createRegistry({}, { entropy: fixedEntropy });
    serverId = registerAgent(registry, alice, 'server.example');
    clientId = registerAgent(registry, bob, 'client.example');
  });

  describe('acceptFeedback()', () => {
    it('issues a token the server owner can look up', () => {
      const token = registry.reputation.acceptFeedback(clientId, serverId, { sender: alice.address });

      expect(token).not.toBe(zeroHash);
      expect(registry.reputation.isAuthorized(clientId, serverId)).toEqual({ authorized: true, authToken: token });
      expect(registry.reputation.getAuthId(clientId, serverId)).toBe(token);
    });

    it('derives the token from the pair, the clock and the transaction seed', () => {
      registry.ledger.mine(3n);
      const token = registry.reputation.acceptFeedback(clientId, serverId, { sender: alice.address });

      expect(token).toBe(
        deriveAuthToken(clientId, serverId, {
          sender: alice.address,
          value: 0n,
          blockNumber: 3n,
          timestamp: GENESIS + 36n,
          transactionIndex: 2n,
          seed: TEST_SEED,
        }),
      );
    });

    it('records the authorization', () => {
      registry.ledger.mine(7n);
      const token = registry.reputation.acceptFeedback(clientId, serverId, { sender: alice.address });
      expect(registry.reputation.getAuthorization(clientId, serverId)).toEqual({
        clientAgentId: clientId,
        serverAgentId: serverId,
        authToken: token,
        issuedAt: 7n,
      });
    });

    it('emits FeedbackAuthorized', () => {
      const token = registry.reputation.acceptFeedback(clientId, serverId, { sender: alice.address });
      const [entry] = registry.eventLog.query({ eventName: 'FeedbackAuthorized' });
      expect(entry?.args).toEqual({ clientAgentId: clientId, serverAgentId: serverId, authToken: token });
    });

    it('only the server owner may authorize', () => {
      const err = catchRegistryError(() =>
        registry.reputation.acceptFeedback(clientId, serverId, { sender: bob.address }),
      );
      expect(err.code).toBe(ErrorCode.UNAUTHORIZED_FEEDBACK);
    });

    it('rejects a second authorization for the same pair', () => {
      const token = registry.reputation.acceptFeedback(clientId, serverId, { sender: alice.address });
      const err = catchRegistryError(() =>
        registry.reputation.acceptFeedback(clientId, serverId, { sender: alice.address }),
      );

      expect(err.code).toBe(ErrorCode.FEEDBACK_ALREADY_AUTHORIZED);
      expect(registry.reputation.getAuthId(clientId, serverId)).toBe(token);
    });

    it('requires both agents to exist', () => {
      expect(
        catchRegistryError(() => registry.reputation.acceptFeedback(9n, serverId, { sender: alice.address })).code,
      ).toBe(ErrorCode.AGENT_NOT_FOUND);
      expect(
        catchRegistryError(() => registry.reputation.acceptFeedback(clientId, 9n, { sender: alice.address })).code,
      ).toBe(ErrorCode.AGENT_NOT_FOUND);
    });

    it('follows the server owner across address rotation', () => {
      registry.identity.updateAgent(serverId, { newAddress: dave.address }, { sender: alice.address });

      expect(
        catchRegistryError(() => registry.reputation.acceptFeedback(clientId, serverId, { sender: alice.address }))
          .code,
      ).toBe(ErrorCode.UNAUTHORIZED_FEEDBACK);
      expect(registry.reputation.acceptFeedback(clientId, serverId, { sender: dave.address })).not.toBe(zeroHash);
    });

    it('keeps tokens valid after the agents change', () => {
      const token = registry.reputation.acceptFeedback(clientId, serverId, { sender: alice.address });
      registry.identity.updateAgent(clientId, { newAddress: carol.address }, { sender: bob.address });
      expect(registry.reputation.getAuthId(clientId, serverId)).toBe(token);
    });
  });

  describe('reads', () => {
    it('report absent pairs as unauthorized with the zero hash', () => {
      expect(registry.reputation.isAuthorized(clientId, serverId)).toEqual({ authorized: false, authToken: zeroHash });
      expect(registry.reputation.getAuthorization(clientId, serverId)).toBeNull();
    });

    it('treat pairs as directional', () => {
      registry.reputation.acceptFeedback(clientId, serverId, { sender: alice.address });
      expect(registry.reputation.isAuthorized(serverId, clientId).authorized).toBe(false);
    });
  });
});
