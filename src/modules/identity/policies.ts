import type { Ledger, TxEnvironment } from '../../core/Ledger.js';
import type { RegistrationPolicyName } from '../../core/config.js';
import { ErrorCode, RegistryError } from '../../errors/RegistryError.js';
import type { RegistrationFields } from './types.js';

/**
 * Deployment-specific admission rule for new agents.
 *
 * `check` runs with the other preconditions and must not mutate anything;
 * `settle` runs only once the registration is certain to commit.
 */
export interface RegistrationPolicy {
  readonly name: RegistrationPolicyName;
  check(fields: RegistrationFields, env: TxEnvironment): void;
  settle(env: TxEnvironment, ledger: Ledger): void;
}

/** Requires a domain, a DID, or at least one of the two */
export class IdentifierPolicy implements RegistrationPolicy {
  readonly name: Exclude<RegistrationPolicyName, 'fee'>;

  constructor(name: Exclude<RegistrationPolicyName, 'fee'>) {
    this.name = name;
  }

  check(fields: RegistrationFields): void {
    const missing =
      this.name === 'domain-required'
        ? fields.domain === ''
        : this.name === 'did-required'
          ? fields.did === ''
          : fields.domain === '' && fields.did === '';
    if (missing) {
      throw new RegistryError(ErrorCode.INVALID_INPUT, `Registration rejected by ${this.name} policy`, {
        policy: this.name,
      });
    }
  }

  settle(): void {
    // no fee
  }
}

/**
 * Accepts registrations without any identifier, against a fee that is
 * burned when the registration commits.
 */
export class FeeBurnPolicy implements RegistrationPolicy {
  readonly name = 'fee' as const;
  readonly fee: bigint;

  constructor(fee: bigint) {
    if (fee <= 0n) {
      throw new RegistryError(ErrorCode.INVALID_CONFIG, 'Registration fee must be positive', { fee });
    }
    this.fee = fee;
  }

  check(_fields: RegistrationFields, env: TxEnvironment): void {
    if (env.value < this.fee) {
      throw new RegistryError(ErrorCode.INSUFFICIENT_FEE, `Registration requires ${this.fee} wei`, {
        fee: this.fee,
        value: env.value,
      });
    }
  }

  settle(env: TxEnvironment, ledger: Ledger): void {
    ledger.burn(env.value);
  }
}

/** Build the policy named by the config */
export function createRegistrationPolicy(name: RegistrationPolicyName, fee: bigint): RegistrationPolicy {
  return name === 'fee' ? new FeeBurnPolicy(fee) : new IdentifierPolicy(name);
}
