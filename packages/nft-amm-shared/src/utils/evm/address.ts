/**
 * EVM Address Utilities
 *
 * Thin wrappers around viem's address helpers. Every address stored by the
 * factory is EIP-55 checksummed so that map lookups are case-insensitive.
 */

import { getAddress, isAddress, zeroAddress, type Address } from 'viem';

/**
 * Check whether a string is a syntactically valid EVM address.
 * Accepts lowercase, uppercase and mixed-case (checksum is not enforced).
 */
export function isValidAddress(address: string): address is Address {
  return isAddress(address, { strict: false });
}

/**
 * Normalize an address to EIP-55 checksum format.
 *
 * @throws Error if the address is invalid
 */
export function normalizeAddress(address: string): Address {
  return getAddress(address);
}

/**
 * An address is "null" when it is missing, malformed, or the zero address.
 */
export function isNullAddress(address: string | null | undefined): boolean {
  if (!address || !isValidAddress(address)) {
    return true;
  }
  return normalizeAddress(address) === zeroAddress;
}

/**
 * Compare two addresses ignoring checksum casing.
 * Malformed addresses are never equal to anything.
 */
export function addressesEqual(a: string, b: string): boolean {
  if (!isValidAddress(a) || !isValidAddress(b)) {
    return false;
  }
  return a.toLowerCase() === b.toLowerCase();
}
