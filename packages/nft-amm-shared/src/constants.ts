/**
 * Protocol Constants
 *
 * Fee caps are expressed as 18-decimal fixed-point multipliers (1e18 = 100%).
 */

/**
 * Maximum protocol fee multiplier: 10% of trade value.
 */
export const MAX_PROTOCOL_FEE = 10n ** 17n;

/**
 * Maximum trade fee a TRADE pair may charge: 90% of trade value.
 */
export const MAX_PAIR_FEE = 9n * 10n ** 17n;

/**
 * ERC-165 interface id of ERC721Enumerable.
 */
export const ERC721_ENUMERABLE_INTERFACE_ID = '0x780e9d63' as const;
