import type { Address } from 'viem';

/** Result of {@link DIDValidator.extractAddress} */
export interface AddressExtraction {
  /** Embedded address, or the zero address when `ok` is false */
  address: Address;
  ok: boolean;
}

/** Parsed layout of an address-controlled identifier */
export interface DIDLayout {
  /** Everything before the payload, e.g. `did:polygonid:polygon:amoy` */
  prefix: string;
  /** Base58 payload after the fourth separator */
  payload: string;
  /** Decoded payload bytes */
  bytes: Uint8Array;
}

/** Options for {@link buildAddressDID} */
export interface BuildDIDOptions {
  /** DID method (default `polygonid`) */
  method?: string;
  /** Blockchain segment (default `polygon`) */
  blockchain?: string;
  /** Network segment (default `amoy`) */
  network?: string;
  /** Two leading type bytes (default `[0x01, 0x12]`) */
  typeBytes?: readonly [number, number];
}
