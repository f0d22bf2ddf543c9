import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ErrorCode, RegistryError } from '../errors/RegistryError.js';
import {
  logLevelSchema,
  registrationPolicySchema,
  validationClockSchema,
  type TrustRegistryConfig,
} from './config.js';

const chainIdSchema = z.coerce.number().int().positive();

const weiSchema = z
  .string()
  .regex(/^\d+$/)
  .transform((value) => BigInt(value));

const flagSchema = z.enum(['true', '1', 'false', '0']).transform((value) => value === 'true' || value === '1');

function oneOf(options: readonly string[]): string {
  return `Must be one of: ${options.join(', ')}`;
}

/** Parse one variable, or `undefined` when it is unset or empty. */
function readVar<S extends z.ZodTypeAny>(
  env: NodeJS.ProcessEnv,
  name: string,
  schema: S,
  expected: string,
): z.output<S> | undefined {
  const value = env[name];
  if (!value) return undefined;

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new RegistryError(ErrorCode.INVALID_CONFIG, `Invalid ${name}="${value}". ${expected}`, { [name]: value });
  }
  return parsed.data;
}

/**
 * Load registry configuration from environment variables.
 *
 * Supported variables:
 * - `TRUST_REGISTRY_CHAIN_ID` - chain id of the signing domain
 * - `TRUST_REGISTRY_ADDRESS` - verifying contract of the signing domain
 * - `TRUST_REGISTRY_POLICY` - `any-identifier`, `domain-required`, `did-required` or `fee`
 * - `TRUST_REGISTRY_FEE` - registration fee in wei
 * - `TRUST_REGISTRY_VALIDATION_CLOCK` - `block` or `timestamp`
 * - `TRUST_REGISTRY_LOG_LEVEL` - pino level, or `silent`
 * - `TRUST_REGISTRY_TELEMETRY` - `true` / `false`
 *
 * Only variables that are set appear in the returned partial config.
 * With `dotenv: true` a `.env` file in the working directory is loaded
 * into `process.env` first.
 */
export function loadEnvConfig(
  opts: { env?: NodeJS.ProcessEnv; dotenv?: boolean } = {},
): Partial<TrustRegistryConfig> {
  if (opts.dotenv) {
    loadDotenv();
  }
  const env = opts.env ?? process.env;
  const config: Partial<TrustRegistryConfig> = {};

  const chainId = readVar(env, 'TRUST_REGISTRY_CHAIN_ID', chainIdSchema, 'Must be a positive integer');
  if (chainId !== undefined) config.chainId = chainId;

  const registryAddress = readVar(env, 'TRUST_REGISTRY_ADDRESS', z.string(), 'Must be an address');
  if (registryAddress !== undefined) config.registryAddress = registryAddress;

  const policy = readVar(
    env,
    'TRUST_REGISTRY_POLICY',
    registrationPolicySchema,
    oneOf(registrationPolicySchema.options),
  );
  if (policy !== undefined) config.registrationPolicy = policy;

  const fee = readVar(env, 'TRUST_REGISTRY_FEE', weiSchema, 'Must be a non-negative integer');
  if (fee !== undefined) config.registrationFee = fee;

  const clock = readVar(
    env,
    'TRUST_REGISTRY_VALIDATION_CLOCK',
    validationClockSchema,
    oneOf(validationClockSchema.options),
  );
  if (clock !== undefined) config.validationClock = clock;

  const logLevel = readVar(env, 'TRUST_REGISTRY_LOG_LEVEL', logLevelSchema, oneOf(logLevelSchema.options));
  if (logLevel !== undefined) config.logLevel = logLevel;

  const telemetry = readVar(env, 'TRUST_REGISTRY_TELEMETRY', flagSchema, 'Must be true or false');
  if (telemetry !== undefined) config.telemetry = telemetry;

  return config;
}
