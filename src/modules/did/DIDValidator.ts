import { bytesToHex, getAddress, isAddress, zeroAddress } from 'viem';
import { decodeBase58 } from './base58.js';
import type { AddressExtraction, DIDLayout } from './types.js';

/** Number of `:` separators in a well-formed identifier */
export const DID_SEPARATOR_COUNT = 4;
/** Decoded payload length in bytes */
export const DID_ID_LENGTH = 31;
/** Zero padding marking an address-controlled identifier: bytes [2, 9) */
export const DID_PADDING_RANGE = [2, 9] as const;
/** Embedded address: bytes [9, 29) */
export const DID_ADDRESS_RANGE = [9, 29] as const;

/**
 * Parse a DID into prefix, payload and decoded bytes.
 *
 * Returns `null` when the separator count is wrong or the payload is not
 * valid base58. The byte layout is not checked here.
 */
export function parseDID(did: string): DIDLayout | null {
  let separators = 0;
  let payloadStart = -1;
  for (let i = 0; i < did.length; i++) {
    if (did[i] === ':') {
      separators++;
      if (separators === DID_SEPARATOR_COUNT) payloadStart = i + 1;
    }
  }
  if (separators !== DID_SEPARATOR_COUNT) return null;

  const payload = did.slice(payloadStart);
  const bytes = decodeBase58(payload);
  if (!bytes) return null;

  return { prefix: did.slice(0, payloadStart - 1), payload, bytes };
}

/**
 * Stateless checker for identifiers that embed an account address.
 *
 * The payload after the fourth `:` decodes to 31 bytes: two type bytes,
 * seven zero bytes, the 20-byte address and a two-byte checksum. Only the
 * length, the padding and the address are checked.
 *
 * @example
 * ```typescript
 * const validator = new DIDValidator();
 * validator.validate('did:polygonid:polygon:amoy:2qCU58...', '0xAbC...'); // true / false
 * ```
 */
export class DIDValidator {
  /** True when `did` embeds exactly `expectedAddress`. */
  validate(did: string, expectedAddress: string): boolean {
    if (!isAddress(expectedAddress, { strict: false })) return false;
    const { address, ok } = this.extractAddress(did);
    return ok && address.toLowerCase() === expectedAddress.toLowerCase();
  }

  /** Pull the embedded address out of `did`. */
  extractAddress(did: string): AddressExtraction {
    const layout = parseDID(did);
    if (!layout || layout.bytes.length !== DID_ID_LENGTH) {
      return { address: zeroAddress, ok: false };
    }

    const [padStart, padEnd] = DID_PADDING_RANGE;
    for (let i = padStart; i < padEnd; i++) {
      if (layout.bytes[i] !== 0) return { address: zeroAddress, ok: false };
    }

    const [addrStart, addrEnd] = DID_ADDRESS_RANGE;
    return {
      address: getAddress(bytesToHex(layout.bytes.subarray(addrStart, addrEnd))),
      ok: true,
    };
  }
}
