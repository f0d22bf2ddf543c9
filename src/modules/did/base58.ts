/** Bitcoin base58 alphabet: digits and letters without `0`, `O`, `I` and `l` */
export const BASE58_ALPHABET = '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';

/**
 * Size of the scratch buffer used by {@link decodeBase58}.
 *
 * A 31-byte identifier encodes to at most 43 symbols, which never needs
 * more than 32 bytes of big-endian scratch space. 64 leaves room for
 * longer payloads to decode (and then fail the length check) instead of
 * overflowing.
 */
export const DECODE_BUFFER_SIZE = 64;

const SYMBOL_VALUES: Int8Array = (() => {
  const table = new Int8Array(128).fill(-1);
  for (let i = 0; i < BASE58_ALPHABET.length; i++) {
    table[BASE58_ALPHABET.charCodeAt(i)] = i;
  }
  return table;
})();

function symbolValue(code: number): number {
  return code < SYMBOL_VALUES.length ? SYMBOL_VALUES[code] ?? -1 : -1;
}

/**
 * Decode a base58 string into bytes.
 *
 * Runs a multiply-accumulate over a fixed big-endian buffer
 * (`value = value * 58 + symbol`, carry propagated byte by byte). Each
 * leading `1` becomes one leading zero byte, independent of the
 * conversion.
 *
 * @param input - Base58 text
 * @param bufferSize - Scratch buffer size in bytes
 * @returns The decoded bytes, or `null` on an unknown symbol or when the
 * value does not fit in the buffer
 */
export function decodeBase58(input: string, bufferSize: number = DECODE_BUFFER_SIZE): Uint8Array | null {
  let leadingZeros = 0;
  while (leadingZeros < input.length && input.charCodeAt(leadingZeros) === BASE58_ALPHABET.charCodeAt(0)) {
    leadingZeros++;
  }

  const scratch = new Uint8Array(bufferSize);
  // number of low-order bytes of `scratch` holding significant data
  let used = 0;

  for (let pos = leadingZeros; pos < input.length; pos++) {
    const value = symbolValue(input.charCodeAt(pos));
    if (value < 0) return null;

    let carry = value;
    let written = 0;
    for (let k = bufferSize - 1; k >= 0 && (carry !== 0 || written < used); k--, written++) {
      carry += 58 * (scratch[k] ?? 0);
      scratch[k] = carry & 0xff;
      carry >>>= 8;
    }
    if (carry !== 0) return null;
    used = written;
  }

  const out = new Uint8Array(leadingZeros + used);
  out.set(scratch.subarray(bufferSize - used), leadingZeros);
  return out;
}
