import { keccak256, toBytes, type Hex } from 'viem';
import { privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts';
import type { TrustRegistryConfig } from '../../src/core/config.js';
import { RegistryEventEmitter } from '../../src/core/EventEmitter.js';
import { Ledger, type EntropySource } from '../../src/core/Ledger.js';
import { createLogger } from '../../src/core/logger.js';
import { Telemetry } from '../../src/core/Telemetry.js';
import { TrustRegistry, type TrustRegistryDeps } from '../../src/core/TrustRegistryClient.js';
import { isRegistryError, type RegistryError } from '../../src/errors/RegistryError.js';
import { InMemoryEventLogAdapter } from '../../src/modules/events/adapters/InMemoryEventLogAdapter.js';
import { EventLog } from '../../src/modules/events/EventLog.js';
import { buildAddressDID } from '../../src/modules/did/builder.js';

/** Placeholder test key: 32 repetitions of `byte` */
function testKey(byte: string): Hex {
  return `0x${byte.repeat(32)}`;
}

export const alice: PrivateKeyAccount = privateKeyToAccount(testKey('11'));
export const bob: PrivateKeyAccount = privateKeyToAccount(testKey('22'));
export const carol: PrivateKeyAccount = privateKeyToAccount(testKey('33'));
export const dave: PrivateKeyAccount = privateKeyToAccount(testKey('44'));
export const erin: PrivateKeyAccount = privateKeyToAccount(testKey('55'));

/** Genesis timestamp every registry fixture starts from */
export const GENESIS = 1_700_000_000n;

/** Fixed transaction seed */
export const TEST_SEED: Hex = `0x${'ab'.repeat(32)}`;

export const fixedEntropy: EntropySource = () => TEST_SEED;

/** Address-bound DID of an account */
export function didOf(account: PrivateKeyAccount): string {
  return buildAddressDID(account.address);
}

/** Content hash of a label */
export function hashOf(label: string): Hex {
  return keccak256(toBytes(label));
}

/** Create a registry with a silent logger starting at {@link GENESIS} */
export function createRegistry(config: TrustRegistryConfig = {}, deps: TrustRegistryDeps = {}): TrustRegistry {
  return new TrustRegistry({ logLevel: 'silent', genesisTimestamp: GENESIS, ...config }, deps);
}

/** Register `account` as its own agent under `domain` */
export function registerAgent(registry: TrustRegistry, account: PrivateKeyAccount, domain: string): bigint {
  return registry.identity.register({ domain, address: account.address }, { sender: account.address });
}

/** A bare ledger wired to an in-memory event log */
export function createLedger(opts: { entropy?: EntropySource } = {}) {
  const logger = createLogger('silent');
  const events = new RegistryEventEmitter(logger);
  const adapter = new InMemoryEventLogAdapter();
  const eventLog = new EventLog(adapter, events, logger);
  const ledger = new Ledger({
    eventLog,
    logger,
    genesisTimestamp: GENESIS,
    ...(opts.entropy ? { entropy: opts.entropy } : {}),
  });
  return { ledger, eventLog, events, adapter, logger };
}

/** Create a real Telemetry instance (disabled by default) */
export function createTelemetry(enabled = false): Telemetry {
  return new Telemetry(enabled);
}

/**
 * Run `fn` and return the RegistryError it throws.
 * Fails the test if it returns normally or throws anything else.
 */
export function catchRegistryError(fn: () => unknown): RegistryError {
  try {
    fn();
  } catch (err) {
    if (isRegistryError(err)) return err;
    throw err;
  }
  throw new Error('Expected a RegistryError to be thrown');
}
