import { randomBytes } from 'crypto';
import { toHex, type Address, type Hex } from 'viem';
import type { Logger } from 'pino';
import { ErrorCode, isRegistryError, RegistryError } from '../errors/RegistryError.js';
import type { EventLog } from '../modules/events/EventLog.js';
import type { RegistryEvent, RegistryLogEntry } from '../modules/events/types.js';
import { parseAddress } from '../utils/address.js';

/** Caller-supplied transaction context */
export interface TxContext {
  /** Authenticated caller */
  sender: Address | string;
  /** Attached payment in wei (default 0) */
  value?: bigint;
}

/** Environment an operation sees while it runs */
export interface TxEnvironment {
  sender: Address;
  value: bigint;
  blockNumber: bigint;
  timestamp: bigint;
  transactionIndex: bigint;
  /** Fresh 32 bytes of entropy for this transaction */
  seed: Hex;
}

/** Source of per-transaction entropy */
export type EntropySource = () => Hex;

export interface LedgerOptions {
  eventLog: EventLog;
  logger: Logger;
  genesisBlock?: bigint;
  genesisTimestamp?: bigint;
  entropy?: EntropySource;
}

/** Receipt of the last committed transaction */
export interface TxReceipt {
  operation: string;
  sender: Address;
  transactionIndex: bigint;
  blockNumber: bigint;
  logs: RegistryLogEntry[];
}

interface ActiveTx {
  env: TxEnvironment;
  pending: RegistryEvent[];
  burned: bigint;
}

const defaultEntropy: EntropySource = () => toHex(randomBytes(32));

/**
 * The shared ledger every registry runs on.
 *
 * Owns the logical clock (block number and block timestamp, both only
 * moving forward), admits one transaction at a time, and publishes a
 * transaction's events only once it returns. An operation that throws
 * leaves no events behind; registries validate before they mutate, so it
 * leaves no state change either.
 *
 * @example
 * ```typescript
 * const agentId = ledger.transact({ sender }, 'identity.register', (env) => {
 *   // checks, then mutations, then ledger.emit(...)
 * });
 * ledger.mine(10n);
 * ```
 */
export class Ledger {
  private readonly eventLog: EventLog;
  private readonly logger: Logger;
  private readonly entropy: EntropySource;
  private _blockNumber: bigint;
  private _timestamp: bigint;
  private txCount = 0n;
  private burned = 0n;
  private active: ActiveTx | null = null;
  private lastReceipt: TxReceipt | null = null;

  constructor(options: LedgerOptions) {
    this.eventLog = options.eventLog;
    this.logger = options.logger;
    this.entropy = options.entropy ?? defaultEntropy;
    this._blockNumber = options.genesisBlock ?? 0n;
    this._timestamp = options.genesisTimestamp ?? 0n;
  }

  /** Current block height */
  get blockNumber(): bigint {
    return this._blockNumber;
  }

  /** Current block timestamp in seconds */
  get timestamp(): bigint {
    return this._timestamp;
  }

  /** Number of committed transactions */
  get transactionCount(): bigint {
    return this.txCount;
  }

  /** Total wei burned by registration fees */
  get totalBurned(): bigint {
    return this.burned;
  }

  /** Receipt of the most recent committed transaction */
  get receipt(): TxReceipt | null {
    return this.lastReceipt;
  }

  /**
   * Advance the chain by `blocks`, moving the timestamp by
   * `secondsPerBlock` for each.
   */
  mine(blocks = 1n, secondsPerBlock = 12n): void {
    this.assertIdle('mine');
    if (blocks < 0n || secondsPerBlock < 0n) {
      throw new RegistryError(ErrorCode.INVALID_INPUT, 'The clock cannot move backwards', {
        blocks,
        secondsPerBlock,
      });
    }
    this._blockNumber += blocks;
    this._timestamp += blocks * secondsPerBlock;
  }

  /** Set the timestamp of the current block. */
  setTimestamp(timestamp: bigint): void {
    this.assertIdle('setTimestamp');
    if (timestamp < this._timestamp) {
      throw new RegistryError(ErrorCode.INVALID_INPUT, 'The clock cannot move backwards', {
        current: this._timestamp,
        requested: timestamp,
      });
    }
    this._timestamp = timestamp;
  }

  /**
   * Run `operation` as one transaction.
   *
   * @param tx - Caller and attached value
   * @param operation - Name used in logs and receipts
   * @param fn - The state transition; must validate before it mutates
   * @returns Whatever `fn` returns
   * @throws {RegistryError} Whatever `fn` throws, with its events discarded
   */
  transact<T>(tx: TxContext, operation: string, fn: (env: TxEnvironment) => T): T {
    if (this.active) {
      throw new RegistryError(
        ErrorCode.INVALID_INPUT,
        `Cannot start ${operation} while another transaction is running`,
      );
    }

    const sender = parseAddress(tx.sender, 'sender');
    const value = tx.value ?? 0n;
    if (value < 0n) {
      throw new RegistryError(ErrorCode.INVALID_INPUT, 'Transaction value cannot be negative', { value });
    }

    const env: TxEnvironment = {
      sender,
      value,
      blockNumber: this._blockNumber,
      timestamp: this._timestamp,
      transactionIndex: this.txCount,
      seed: this.entropy(),
    };
    const active: ActiveTx = { env, pending: [], burned: 0n };
    this.active = active;

    let result: T;
    try {
      result = fn(env);
    } catch (err) {
      this.active = null;
      if (isRegistryError(err)) {
        this.logger.warn({ operation, sender, code: err.code }, err.message);
      } else {
        this.logger.error({ operation, sender, err }, 'operation failed unexpectedly');
      }
      throw err;
    }
    this.active = null;

    this.txCount++;
    this.burned += active.burned;
    const logs = this.eventLog.publish(active.pending, {
      blockNumber: env.blockNumber,
      timestamp: env.timestamp,
      transactionIndex: env.transactionIndex,
    });
    this.lastReceipt = { operation, sender, transactionIndex: env.transactionIndex, blockNumber: env.blockNumber, logs };
    this.logger.debug(
      { operation, sender, transactionIndex: env.transactionIndex, events: logs.length },
      'transaction committed',
    );
    return result;
  }

  /** Queue an event on the running transaction. */
  emit(event: RegistryEvent): void {
    this.requireActive('emit').pending.push(event);
  }

  /** Burn `amount` wei from the running transaction's value. */
  burn(amount: bigint): void {
    const active = this.requireActive('burn');
    if (amount < 0n || active.burned + amount > active.env.value) {
      throw new RegistryError(ErrorCode.INSUFFICIENT_FEE, 'Cannot burn more than the transaction value', {
        amount,
        value: active.env.value,
      });
    }
    active.burned += amount;
  }

  private requireActive(action: string): ActiveTx {
    if (!this.active) {
      throw new RegistryError(ErrorCode.INVALID_INPUT, `${action} is only valid inside a transaction`);
    }
    return this.active;
  }

  private assertIdle(action: string): void {
    if (this.active) {
      throw new RegistryError(ErrorCode.INVALID_INPUT, `${action} is not allowed inside a transaction`);
    }
  }
}
