import { secp256k1 } from '@noble/curves/secp256k1';
import {
  getTypesForEIP712Domain,
  hashDomain,
  hashTypedData,
  hexToBigInt,
  hexToBytes,
  parseSignature,
  type Address,
  type Hex,
  type TypedData,
} from 'viem';
import { publicKeyToAddress } from 'viem/accounts';

/** EIP-712 types of the delegated-consent message */
export const DELEGATED_REGISTRATION_TYPES = {
  DelegatedRegistration: [
    { name: 'developerDID', type: 'string' },
    { name: 'agentDID', type: 'string' },
    { name: 'agentAddress', type: 'address' },
    { name: 'description', type: 'string' },
    { name: 'nonce', type: 'uint256' },
    { name: 'expiry', type: 'uint256' },
  ],
} as const;

/** EIP-712 signing domain of the identity registry */
export interface ConsentDomain {
  name: string;
  version: string;
  chainId: number;
  verifyingContract: Address;
}

/** The message an agent signs to let a developer register it */
export interface DelegatedRegistrationMessage {
  developerDID: string;
  agentDID: string;
  agentAddress: Address;
  description: string;
  nonce: bigint;
  expiry: bigint;
}

/** EIP-712 domain separator, as a verifying contract stores it */
export function consentDomainSeparator(domain: ConsentDomain): Hex {
  return hashDomain<TypedData>({ domain, types: { EIP712Domain: getTypesForEIP712Domain({ domain }) } });
}

/**
 * EIP-712 digest of a delegated-consent message.
 *
 * Agents produce the matching signature with any EIP-712 signer, e.g.
 * viem's `account.signTypedData({ domain, types: DELEGATED_REGISTRATION_TYPES,
 * primaryType: 'DelegatedRegistration', message })`.
 */
export function hashDelegatedRegistration(domain: ConsentDomain, message: DelegatedRegistrationMessage): Hex {
  return hashTypedData({
    domain,
    types: DELEGATED_REGISTRATION_TYPES,
    primaryType: 'DelegatedRegistration',
    message,
  });
}

/**
 * Recover the signer of `digest`.
 *
 * Accepts 65-byte `r || s || v` signatures with `v` in {0, 1, 27, 28}.
 * High-s signatures are rejected so a signature cannot be replayed in its
 * malleated form.
 *
 * @returns The signer, or `null` for a malformed or non-canonical signature
 */
export function recoverSigner(digest: Hex, signature: Hex): Address | null {
  try {
    const parsed = parseSignature(signature);
    const recovery = parsed.yParity ?? (parsed.v === 28n ? 1 : 0);
    const sig = new secp256k1.Signature(hexToBigInt(parsed.r), hexToBigInt(parsed.s)).addRecoveryBit(recovery);
    if (sig.hasHighS()) return null;
    const point = sig.recoverPublicKey(hexToBytes(digest));
    return publicKeyToAddress(`0x${point.toHex(false)}`);
  } catch {
    return null;
  }
}
