import { isAddressEqual, type Hex } from 'viem';
import type { ValidationClock } from '../../core/config.js';
import type { Ledger, TxContext, TxEnvironment } from '../../core/Ledger.js';
import type { Telemetry } from '../../core/Telemetry.js';
import { ErrorCode, RegistryError } from '../../errors/RegistryError.js';
import { isBytes32, isZeroHash } from '../../utils/address.js';
import type { AgentDirectory } from '../identity/types.js';
import type { PendingStatus, ValidationRequest, ValidationResponse, ValidationStatus } from './types.js';

/** Clock units a request stays answerable after creation */
export const EXPIRATION_WINDOW = 1000n;

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

/**
 * Time-bounded validation requests and responses, one slot per content
 * hash.
 *
 * A slot is `pending` from request until it is answered or more than
 * {@link EXPIRATION_WINDOW} clock units have passed. Requesting an
 * occupied, unexpired slot only re-emits the request event; requesting an
 * expired slot replaces its occupant and drops the old response.
 *
 * @example
 * ```typescript
 * registry.validation.requestValidation(validatorId, serverId, dataHash, { sender: anyone });
 * registry.validation.submitResponse(dataHash, 85, { sender: validatorOwner });
 * registry.validation.getResponse(dataHash); // { hasResponse: true, score: 85 }
 * ```
 */
export class ValidationRegistry {
  private readonly ledger: Ledger;
  private readonly identity: AgentDirectory;
  private readonly telemetry: Telemetry;
  private readonly clock: ValidationClock;
  private readonly requests = new Map<string, ValidationRequest>();
  private readonly responses = new Map<string, number>();

  constructor(ledger: Ledger, identity: AgentDirectory, telemetry: Telemetry, options: { clock: ValidationClock }) {
    this.ledger = ledger;
    this.identity = identity;
    this.telemetry = telemetry;
    this.clock = options.clock;
  }

  /**
   * Ask `validatorAgentId` to score `serverAgentId`'s work identified by
   * `dataHash`. Anyone may call this.
   *
   * @returns The request now occupying the slot
   * @throws {RegistryError} `InvalidDataHash`, `AgentNotFound`
   */
  requestValidation(
    validatorAgentId: bigint,
    serverAgentId: bigint,
    dataHash: Hex,
    tx: TxContext,
  ): ValidationRequest {
    this.telemetry.track('validation.requestValidation');

    return this.ledger.transact(tx, 'validation.requestValidation', (env) => {
      const key = requireDataHash(dataHash);
      for (const agentId of [validatorAgentId, serverAgentId]) {
        if (!this.identity.exists(agentId)) {
          throw new RegistryError(ErrorCode.AGENT_NOT_FOUND, `Agent ${agentId} not found`, { agentId });
        }
      }

      const now = this.now(env);
      const existing = this.requests.get(key);
      if (!existing || isExpired(existing, now)) {
        this.requests.set(key, {
          dataHash: key,
          validatorAgentId,
          serverAgentId,
          timestamp: now,
          responded: false,
        });
        this.responses.delete(key);
      }

      this.ledger.emit({
        eventName: 'ValidationRequested',
        args: { validatorAgentId, serverAgentId, dataHash: key },
      });
      return { ...this.requireRequest(key) };
    });
  }

  /**
   * Record the designated validator's score.
   *
   * The validator's owner is resolved now, so an address rotation before
   * responding is honoured.
   *
   * @throws {RegistryError} `InvalidResponse`, `InvalidDataHash`,
   * `ValidationRequestNotFound`, `RequestExpired`,
   * `ValidationAlreadyResponded`, `UnauthorizedValidator`
   */
  submitResponse(dataHash: Hex, score: number, tx: TxContext): boolean {
    this.telemetry.track('validation.submitResponse');

    return this.ledger.transact(tx, 'validation.submitResponse', (env) => {
      if (!Number.isInteger(score) || score < MIN_SCORE || score > MAX_SCORE) {
        throw new RegistryError(ErrorCode.INVALID_RESPONSE, `Score must be an integer in [${MIN_SCORE}, ${MAX_SCORE}]`, {
          score,
        });
      }
      const key = requireDataHash(dataHash);
      const request = this.requireRequest(key);

      const now = this.now(env);
      if (isExpired(request, now)) {
        throw new RegistryError(ErrorCode.REQUEST_EXPIRED, `Validation request for ${key} has expired`, {
          dataHash: key,
          requestedAt: request.timestamp,
          now,
        });
      }
      if (request.responded) {
        throw new RegistryError(ErrorCode.VALIDATION_ALREADY_RESPONDED, `Validation request for ${key} was already answered`, {
          dataHash: key,
        });
      }

      const validator = this.identity.get(request.validatorAgentId);
      if (!isAddressEqual(validator.agentAddress, env.sender)) {
        throw new RegistryError(
          ErrorCode.UNAUTHORIZED_VALIDATOR,
          `Only the owner of validator agent ${request.validatorAgentId} can respond`,
          { validatorAgentId: request.validatorAgentId, sender: env.sender },
        );
      }

      request.responded = true;
      this.responses.set(key, score);
      this.ledger.emit({
        eventName: 'ValidationResponded',
        args: {
          validatorAgentId: request.validatorAgentId,
          serverAgentId: request.serverAgentId,
          dataHash: key,
          score,
        },
      });
      return true;
    });
  }

  /**
   * @throws {RegistryError} `InvalidDataHash`, `ValidationRequestNotFound`
   */
  getRequest(dataHash: Hex): ValidationRequest {
    return { ...this.requireRequest(requireDataHash(dataHash)) };
  }

  isPending(dataHash: Hex): PendingStatus {
    const request = this.requests.get(dataHash.toLowerCase());
    if (!request) return { exists: false, pending: false };
    return { exists: true, pending: !request.responded && !isExpired(request, this.currentClock()) };
  }

  getResponse(dataHash: Hex): ValidationResponse {
    const score = this.responses.get(dataHash.toLowerCase());
    return score === undefined ? { hasResponse: false, score: 0 } : { hasResponse: true, score };
  }

  getStatus(dataHash: Hex): ValidationStatus {
    const request = this.requests.get(dataHash.toLowerCase());
    if (!request) return 'absent';
    if (request.responded) return 'responded';
    return isExpired(request, this.currentClock()) ? 'expired' : 'pending';
  }

  expirationWindow(): bigint {
    return EXPIRATION_WINDOW;
  }

  private requireRequest(key: string): ValidationRequest {
    const request = this.requests.get(key);
    if (!request) {
      throw new RegistryError(ErrorCode.VALIDATION_REQUEST_NOT_FOUND, `No validation request for ${key}`, {
        dataHash: key,
      });
    }
    return request;
  }

  private now(env: TxEnvironment): bigint {
    return this.clock === 'block' ? env.blockNumber : env.timestamp;
  }

  private currentClock(): bigint {
    return this.clock === 'block' ? this.ledger.blockNumber : this.ledger.timestamp;
  }
}

function isExpired(request: ValidationRequest, now: bigint): boolean {
  return now > request.timestamp + EXPIRATION_WINDOW;
}

/** Lower-cased slot key for a valid, non-zero hash */
function requireDataHash(dataHash: string): Hex {
  if (!isBytes32(dataHash) || isZeroHash(dataHash)) {
    throw new RegistryError(ErrorCode.INVALID_DATA_HASH, 'Data hash must be a non-zero 32-byte hex value', {
      dataHash,
    });
  }
  const key: Hex = `0x${dataHash.slice(2).toLowerCase()}`;
  return key;
}
