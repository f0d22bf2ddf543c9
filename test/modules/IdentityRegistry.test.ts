import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { TrustRegistry } from '../../src/core/TrustRegistryClient.js';
import { ErrorCode } from '../../src/errors/RegistryError.js';
import { buildAddressDID } from '../../src/modules/did/builder.js';
import {
  alice,
  bob,
  carol,
  catchRegistryError,
  createRegistry,
  dave,
  didOf,
  registerAgent,
} from '../fixtures/mocks.js';

describe('IdentityRegistry', () => {
  let registry: TrustRegistry;

  beforeEach(() => {
    registry = createRegistry();
  });

  describe('register()', () => {
    it('assigns sequential ids starting at 1', () => {
      expect(registerAgent(registry, alice, 'alice.example')).toBe(1n);
      expect(registerAgent(registry, bob, 'bob.example')).toBe(2n);
      expect(registry.identity.count()).toBe(2n);
    });

    it('stores the record with unset fields as empty strings', () => {
      registry.ledger.mine(4n);
      const agentId = registerAgent(registry, alice, 'alice.example');

      expect(registry.identity.get(agentId)).toEqual({
        agentId: 1n,
        agentAddress: alice.address,
        domain: 'alice.example',
        did: '',
        description: '',
        developerDID: '',
        registeredAt: 4n,
        updatedAt: 4n,
      });
    });

    it('registers with a DID only', () => {
      const did = didOf(alice);
      const agentId = registry.identity.register({ did, address: alice.address }, { sender: alice.address });
      expect(registry.identity.resolveByDID(did).agentId).toBe(agentId);
    });

    it('emits AgentRegistered', () => {
      const did = didOf(alice);
      registry.identity.register(
        { domain: 'alice.example', did, address: alice.address, description: 'trader' },
        { sender: alice.address },
      );

      const [entry] = registry.eventLog.query({ eventName: 'AgentRegistered' });
      expect(entry?.args).toEqual({
        agentId: 1n,
        agentAddress: alice.address,
        agentDomain: 'alice.example',
        agentDID: did,
        description: 'trader',
      });
    });

    it('notifies subscribers after commit', () => {
      const listener = vi.fn();
      registry.on('AgentRegistered', listener);
      registerAgent(registry, alice, 'alice.example');
      expect(listener).toHaveBeenCalledOnce();
    });

    it('rejects registering somebody else', () => {
      const err = catchRegistryError(() =>
        registry.identity.register({ domain: 'bob.example', address: bob.address }, { sender: alice.address }),
      );
      expect(err.code).toBe(ErrorCode.UNAUTHORIZED_REGISTRATION);
    });

    it('rejects the zero address', () => {
      const zero = '0x0000000000000000000000000000000000000000';
      const err = catchRegistryError(() =>
        registry.identity.register({ domain: 'zero.example', address: zero }, { sender: alice.address }),
      );
      expect(err.code).toBe(ErrorCode.INVALID_ADDRESS);
    });

    it('requires a domain or a DID', () => {
      const err = catchRegistryError(() =>
        registry.identity.register({ address: alice.address }, { sender: alice.address }),
      );
      expect(err.code).toBe(ErrorCode.INVALID_INPUT);
      expect(err.message).toBe('Registration rejected by any-identifier policy');
    });

    it('treats domains case-insensitively but keeps their casing', () => {
      const agentId = registerAgent(registry, alice, 'Example.COM');

      for (const query of ['EXAMPLE.com', 'example.com', 'Example.Com']) {
        const agent = registry.identity.resolveByDomain(query);
        expect(agent.agentId).toBe(agentId);
        expect(agent.domain).toBe('Example.COM');
      }
      const err = catchRegistryError(() => registerAgent(registry, bob, 'EXAMPLE.com'));
      expect(err.code).toBe(ErrorCode.DOMAIN_ALREADY_REGISTERED);
    });

    it('folds only ASCII letters when comparing domains', () => {
      const kelvinId = registerAgent(registry, alice, '\u212Aey.example');
      const asciiId = registerAgent(registry, bob, 'key.example');

      expect(asciiId).toBe(kelvinId + 1n);
      expect(registry.identity.resolveByDomain('KEY.example').agentId).toBe(asciiId);
      expect(registry.identity.resolveByDomain('\u212Aey.example').agentId).toBe(kelvinId);
    });

    it('rejects a DID that embeds another address', () => {
      const err = catchRegistryError(() =>
        registry.identity.register({ did: didOf(bob), address: alice.address }, { sender: alice.address }),
      );
      expect(err.code).toBe(ErrorCode.DID_ADDRESS_MISMATCH);
    });

    it('rejects a second agent for the same address', () => {
      registerAgent(registry, alice, 'one.example');
      const err = catchRegistryError(() => registerAgent(registry, alice, 'two.example'));
      expect(err.code).toBe(ErrorCode.ADDRESS_ALREADY_REGISTERED);
    });

    it('leaves no trace when rejected', () => {
      registerAgent(registry, alice, 'alice.example');
      catchRegistryError(() => registerAgent(registry, bob, 'alice.example'));

      expect(registry.identity.count()).toBe(1n);
      expect(registry.eventLog.size()).toBe(1);
      expect(() => registry.identity.resolveByAddress(bob.address)).toThrow();
      expect(registerAgent(registry, bob, 'bob.example')).toBe(2n);
    });
  });

  describe('updateAgent()', () => {
    let agentId: bigint;

    beforeEach(() => {
      agentId = registerAgent(registry, alice, 'alice.example');
    });

    it('only the owner may update', () => {
      const err = catchRegistryError(() =>
        registry.identity.updateAgent(agentId, { newDescription: 'x' }, { sender: bob.address }),
      );
      expect(err.code).toBe(ErrorCode.UNAUTHORIZED_UPDATE);
    });

    it('fails for an unknown agent', () => {
      const err = catchRegistryError(() =>
        registry.identity.updateAgent(9n, { newDescription: 'x' }, { sender: alice.address }),
      );
      expect(err.code).toBe(ErrorCode.AGENT_NOT_FOUND);
    });

    it('rotates the owner address', () => {
      registry.identity.updateAgent(agentId, { newAddress: dave.address }, { sender: alice.address });

      expect(registry.identity.resolveByAddress(dave.address).agentId).toBe(agentId);
      expect(catchRegistryError(() => registry.identity.resolveByAddress(alice.address)).code).toBe(
        ErrorCode.AGENT_NOT_FOUND,
      );
      expect(
        catchRegistryError(() =>
          registry.identity.updateAgent(agentId, { newDescription: 'x' }, { sender: alice.address }),
        ).code,
      ).toBe(ErrorCode.UNAUTHORIZED_UPDATE);
      expect(registry.identity.updateAgent(agentId, { newDescription: 'x' }, { sender: dave.address })).toBe(true);
    });

    it('frees the old address for a new registration', () => {
      registry.identity.updateAgent(agentId, { newAddress: dave.address }, { sender: alice.address });
      expect(registerAgent(registry, alice, 'alice2.example')).toBe(2n);
    });

    it('rejects rotating onto an address that owns an agent', () => {
      registerAgent(registry, bob, 'bob.example');
      const err = catchRegistryError(() =>
        registry.identity.updateAgent(agentId, { newAddress: bob.address }, { sender: alice.address }),
      );
      expect(err.code).toBe(ErrorCode.ADDRESS_ALREADY_REGISTERED);
    });

    it('sets a DID bound to the owner', () => {
      const did = didOf(alice);
      registry.identity.updateAgent(agentId, { newDID: did }, { sender: alice.address });
      expect(registry.identity.resolveByDID(did).agentId).toBe(agentId);
    });

    it('rejects a DID bound to another address', () => {
      const err = catchRegistryError(() =>
        registry.identity.updateAgent(agentId, { newDID: didOf(bob) }, { sender: alice.address }),
      );
      expect(err.code).toBe(ErrorCode.DID_ADDRESS_MISMATCH);
      expect(registry.identity.get(agentId).did).toBe('');
    });

    it('re-checks the stored DID when only the address changes', () => {
      registry.identity.updateAgent(agentId, { newDID: didOf(alice) }, { sender: alice.address });

      const err = catchRegistryError(() =>
        registry.identity.updateAgent(agentId, { newAddress: dave.address }, { sender: alice.address }),
      );
      expect(err.code).toBe(ErrorCode.DID_ADDRESS_MISMATCH);
      expect(registry.identity.get(agentId).agentAddress).toBe(alice.address);
    });

    it('moves address and DID together', () => {
      registry.identity.updateAgent(agentId, { newDID: didOf(alice) }, { sender: alice.address });
      registry.identity.updateAgent(
        agentId,
        { newAddress: dave.address, newDID: didOf(dave) },
        { sender: alice.address },
      );

      expect(registry.identity.resolveByDID(didOf(dave)).agentAddress).toBe(dave.address);
      expect(catchRegistryError(() => registry.identity.resolveByDID(didOf(alice))).code).toBe(
        ErrorCode.DID_NOT_REGISTERED,
      );
    });

    it('clears the DID with an empty string', () => {
      const did = didOf(alice);
      registry.identity.updateAgent(agentId, { newDID: did }, { sender: alice.address });
      registry.identity.updateAgent(agentId, { newDID: '' }, { sender: alice.address });

      expect(registry.identity.get(agentId).did).toBe('');
      expect(catchRegistryError(() => registry.identity.resolveByDID(did)).code).toBe(ErrorCode.DID_NOT_REGISTERED);
    });

    it('emits AgentUpdated with the post-update record', () => {
      registry.ledger.mine(2n);
      registry.identity.updateAgent(
        agentId,
        { newAddress: carol.address, newDescription: 'v2' },
        { sender: alice.address },
      );

      const [entry] = registry.eventLog.query({ eventName: 'AgentUpdated' });
      expect(entry?.args).toEqual({
        agentId,
        agentAddress: carol.address,
        agentDomain: 'alice.example',
        agentDID: '',
        description: 'v2',
      });
      expect(registry.identity.get(agentId).updatedAt).toBe(2n);
    });
  });

  describe('updateDescriptionOnly()', () => {
    it('replaces the description and keeps everything else', () => {
      const agentId = registerAgent(registry, alice, 'alice.example');
      expect(registry.identity.updateDescriptionOnly(agentId, 'new text', { sender: alice.address })).toBe(true);

      const agent = registry.identity.get(agentId);
      expect(agent.description).toBe('new text');
      expect(agent.domain).toBe('alice.example');
    });

    it('only the owner may change it', () => {
      const agentId = registerAgent(registry, alice, 'alice.example');
      const err = catchRegistryError(() =>
        registry.identity.updateDescriptionOnly(agentId, 'x', { sender: bob.address }),
      );
      expect(err.code).toBe(ErrorCode.UNAUTHORIZED_UPDATE);
    });
  });

  describe('linkDeveloperDID()', () => {
    it('links a developer DID bound to the developer address', () => {
      const agentId = registerAgent(registry, alice, 'alice.example');
      registry.identity.linkDeveloperDID(agentId, bob.address, didOf(bob), { sender: alice.address });

      expect(registry.identity.getDeveloperDID(agentId)).toBe(didOf(bob));
      const [entry] = registry.eventLog.query({ eventName: 'AgentDeveloperLinked' });
      expect(entry?.args).toEqual({ agentId, developerDID: didOf(bob) });
    });

    it('rejects a developer DID bound to another address', () => {
      const agentId = registerAgent(registry, alice, 'alice.example');
      const err = catchRegistryError(() =>
        registry.identity.linkDeveloperDID(agentId, bob.address, didOf(carol), { sender: alice.address }),
      );
      expect(err.code).toBe(ErrorCode.INVALID_DEVELOPER_DID);
      expect(registry.identity.getDeveloperDID(agentId)).toBe('');
    });

    it('only the owner may link', () => {
      const agentId = registerAgent(registry, alice, 'alice.example');
      const err = catchRegistryError(() =>
        registry.identity.linkDeveloperDID(agentId, bob.address, didOf(bob), { sender: bob.address }),
      );
      expect(err.code).toBe(ErrorCode.UNAUTHORIZED_UPDATE);
    });
  });

  describe('reads', () => {
    it('resolveByDomain() fails for unknown or empty domains', () => {
      expect(catchRegistryError(() => registry.identity.resolveByDomain('none.example')).code).toBe(
        ErrorCode.AGENT_NOT_FOUND,
      );
      expect(catchRegistryError(() => registry.identity.resolveByDomain('')).code).toBe(ErrorCode.AGENT_NOT_FOUND);
    });

    it('resolveByAddress() validates its input', () => {
      expect(catchRegistryError(() => registry.identity.resolveByAddress('nope')).code).toBe(
        ErrorCode.INVALID_ADDRESS,
      );
    });

    it('resolveByAddress() ignores address case', () => {
      registerAgent(registry, alice, 'alice.example');
      expect(registry.identity.resolveByAddress(alice.address.toLowerCase()).agentId).toBe(1n);
    });

    it('resolveByDID() fails with DIDNotRegistered', () => {
      const did = buildAddressDID(alice.address);
      expect(catchRegistryError(() => registry.identity.resolveByDID(did)).code).toBe(ErrorCode.DID_NOT_REGISTERED);
    });

    it('get() returns a copy', () => {
      const agentId = registerAgent(registry, alice, 'alice.example');
      const copy = registry.identity.get(agentId);
      copy.description = 'mutated';
      expect(registry.identity.get(agentId).description).toBe('');
    });

    it('exists() reports registered ids', () => {
      registerAgent(registry, alice, 'alice.example');
      expect(registry.identity.exists(1n)).toBe(true);
      expect(registry.identity.exists(2n)).toBe(false);
      expect(registry.identity.exists(0n)).toBe(false);
    });

    it('list() pages in id order', () => {
      registerAgent(registry, alice, 'a.example');
      registerAgent(registry, bob, 'b.example');
      registerAgent(registry, carol, 'c.example');

      expect(registry.identity.list().map((a) => a.agentId)).toEqual([1n, 2n, 3n]);
      expect(registry.identity.list({ offset: 1, limit: 1 }).map((a) => a.domain)).toEqual(['b.example']);
    });
  });
});
