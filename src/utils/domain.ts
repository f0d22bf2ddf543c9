/**
 * Case-insensitive map key for a domain.
 *
 * Only ASCII A-Z are folded; other code points are kept as they are, so
 * byte-distinct hostnames never share a key.
 */
export function domainKey(domain: string): string {
  return domain.replace(/[A-Z]/g, (c) => c.toLowerCase());
}
