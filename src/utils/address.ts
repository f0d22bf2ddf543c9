import { getAddress, isAddress, isHex, size, zeroAddress, zeroHash, type Address, type Hex } from 'viem';
import { ErrorCode, RegistryError } from '../errors/RegistryError.js';

/**
 * Validate and checksum an account address.
 *
 * @throws {RegistryError} `InvalidAddress` for malformed input or the zero address
 */
export function parseAddress(value: string, label = 'address'): Address {
  if (!isAddress(value, { strict: false }) || isZeroAddress(value)) {
    throw new RegistryError(ErrorCode.INVALID_ADDRESS, `Invalid ${label}: ${value}`, { [label]: value });
  }
  return getAddress(value);
}

/** Case-insensitive map key for an address */
export function addressKey(address: string): string {
  return address.toLowerCase();
}

export function isZeroAddress(address: string): boolean {
  return address.toLowerCase() === zeroAddress;
}

/** True when `value` is a 0x-prefixed 32-byte hex string */
export function isBytes32(value: string): value is Hex {
  return isHex(value, { strict: true }) && size(value) === 32;
}

export function isZeroHash(value: string): boolean {
  return value.toLowerCase() === zeroHash;
}
