import { base58 } from '@scure/base';
import { hexToBytes, type Address } from 'viem';
import { parseAddress } from '../../utils/address.js';
import { DID_ADDRESS_RANGE, DID_ID_LENGTH } from './DIDValidator.js';
import type { BuildDIDOptions } from './types.js';

const DEFAULT_TYPE_BYTES: readonly [number, number] = [0x01, 0x12];

/**
 * Build an address-controlled DID for `address`.
 *
 * Layout: type bytes, seven zero bytes, the address, then the
 * little-endian 16-bit sum of the preceding 29 bytes.
 *
 * @example
 * ```typescript
 * buildAddressDID('0x1111111111111111111111111111111111111111');
 * // 'did:polygonid:polygon:amoy:...'
 * ```
 */
export function buildAddressDID(address: Address | string, opts: BuildDIDOptions = {}): string {
  const addr = parseAddress(address);
  const [typeHi, typeLo] = opts.typeBytes ?? DEFAULT_TYPE_BYTES;

  const bytes = new Uint8Array(DID_ID_LENGTH);
  bytes[0] = typeHi & 0xff;
  bytes[1] = typeLo & 0xff;
  // bytes [2, 9) stay zero
  bytes.set(hexToBytes(addr), DID_ADDRESS_RANGE[0]);

  let checksum = 0;
  for (let i = 0; i < DID_ADDRESS_RANGE[1]; i++) checksum += bytes[i] ?? 0;
  bytes[DID_ADDRESS_RANGE[1]] = checksum & 0xff;
  bytes[DID_ADDRESS_RANGE[1] + 1] = (checksum >> 8) & 0xff;

  const method = opts.method ?? 'polygonid';
  const blockchain = opts.blockchain ?? 'polygon';
  const network = opts.network ?? 'amoy';
  return `did:${method}:${blockchain}:${network}:${base58.encode(bytes)}`;
}
