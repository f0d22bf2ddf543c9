import { getAddress, isAddress } from 'viem';
import { z } from 'zod';
import { ErrorCode, RegistryError } from '../errors/RegistryError.js';

/** Placeholder verifying contract for the delegated-consent signing domain */
export const DEFAULT_REGISTRY_ADDRESS = '0x000000000000000000000000000000000000A004';

/** Local development chain id */
export const DEFAULT_CHAIN_ID = 31337;

/** 2023-11-14T22:13:20Z */
export const DEFAULT_GENESIS_TIMESTAMP = 1_700_000_000n;

export const registrationPolicySchema = z.enum(['any-identifier', 'domain-required', 'did-required', 'fee']);

export const validationClockSchema = z.enum(['block', 'timestamp']);

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const addressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), { message: 'must be a 20-byte hex address' })
  .transform((value) => getAddress(value));

export const trustRegistryConfigSchema = z.object({
  /** Chain id bound into the delegated-consent signing domain */
  chainId: z.number().int().positive().default(DEFAULT_CHAIN_ID),
  /** Verifying contract of the delegated-consent signing domain */
  registryAddress: addressSchema.default(DEFAULT_REGISTRY_ADDRESS),
  domainName: z.string().min(1).default('IdentityRegistry'),
  domainVersion: z.string().min(1).default('1'),
  /** Which identifying fields a registration must carry, or whether it pays a fee instead */
  registrationPolicy: registrationPolicySchema.default('any-identifier'),
  /** Fee in wei burned on registration under the `fee` policy */
  registrationFee: z.bigint().nonnegative().default(0n),
  /** Logical clock measured by the validation expiration window */
  validationClock: validationClockSchema.default('block'),
  /** Consume the delegated-consent nonce even when the signature later fails */
  consumeNonceOnFailure: z.boolean().default(true),
  genesisBlock: z.bigint().nonnegative().default(0n),
  genesisTimestamp: z.bigint().nonnegative().default(DEFAULT_GENESIS_TIMESTAMP),
  logLevel: logLevelSchema.default('info'),
  telemetry: z.boolean().default(false),
});

/** Configuration accepted by {@link TrustRegistry} (every field optional) */
export type TrustRegistryConfig = z.input<typeof trustRegistryConfigSchema>;

/** Configuration after defaults and normalization */
export type ResolvedConfig = z.output<typeof trustRegistryConfigSchema>;

export type RegistrationPolicyName = z.infer<typeof registrationPolicySchema>;

export type ValidationClock = ResolvedConfig['validationClock'];

/**
 * Validate a configuration and fill in defaults.
 *
 * @throws {RegistryError} `InvalidConfig` listing every offending field
 */
export function resolveConfig(config: TrustRegistryConfig = {}): ResolvedConfig {
  const parsed = trustRegistryConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new RegistryError(ErrorCode.INVALID_CONFIG, `Invalid registry config: ${issues.join('; ')}`, { issues });
  }

  const resolved = parsed.data;
  if (resolved.registrationPolicy === 'fee' && resolved.registrationFee === 0n) {
    throw new RegistryError(
      ErrorCode.INVALID_CONFIG,
      'Invalid registry config: registrationFee must be positive under the fee policy',
    );
  }
  return resolved;
}
