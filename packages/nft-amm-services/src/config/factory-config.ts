/**
 * Factory Configuration
 *
 * Environment-based construction parameters for the pair factory, parsed and
 * validated with zod. Log level is read by the logger itself (LOG_LEVEL).
 */

import { z } from 'zod';
import type { Address } from 'viem';
import {
  MAX_PROTOCOL_FEE,
  isNullAddress,
  normalizeAddress,
  type PairVariant,
} from '@nft-amm/shared';
import { ValidationError } from '../errors/index.js';

export interface FactoryConfig {
  /** Account the factory acts as: CREATE2 deployer, fee holder, transfer operator */
  factoryAddress: Address;
  owner: Address;
  templates: Record<PairVariant, Address>;
  protocolFeeRecipient: Address;
  /** 18-decimal fixed point, at most MAX_PROTOCOL_FEE */
  protocolFeeMultiplier: bigint;
}

const AddressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, 'must be a 0x-prefixed 20-byte hex address')
  .refine((value) => !isNullAddress(value), 'must not be the zero address')
  .transform((value) => normalizeAddress(value));

const MultiplierSchema = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform((value) => BigInt(value))
  .refine((value) => value <= MAX_PROTOCOL_FEE, `must not exceed ${MAX_PROTOCOL_FEE}`);

export const factoryConfigSchema = z.object({
  FACTORY_ADDRESS: AddressSchema,
  FACTORY_OWNER: AddressSchema,
  TEMPLATE_NATIVE_ENUMERABLE: AddressSchema,
  TEMPLATE_NATIVE_MISSING_ENUMERABLE: AddressSchema,
  TEMPLATE_TOKEN_ENUMERABLE: AddressSchema,
  TEMPLATE_TOKEN_MISSING_ENUMERABLE: AddressSchema,
  PROTOCOL_FEE_RECIPIENT: AddressSchema,
  PROTOCOL_FEE_MULTIPLIER: MultiplierSchema.default('0'),
});

export type FactoryEnv = z.input<typeof factoryConfigSchema>;

/**
 * Load configuration from environment variables
 *
 * @throws ValidationError listing every invalid or missing variable
 */
export function loadFactoryConfig(
  env: Record<string, string | undefined> = process.env
): FactoryConfig {
  const result = factoryConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')} ${issue.message}`)
      .join('; ');
    throw new ValidationError('configuration', issues, result.error);
  }

  const parsed = result.data;
  return {
    factoryAddress: parsed.FACTORY_ADDRESS,
    owner: parsed.FACTORY_OWNER,
    templates: {
      NATIVE_ENUMERABLE: parsed.TEMPLATE_NATIVE_ENUMERABLE,
      NATIVE_MISSING_ENUMERABLE: parsed.TEMPLATE_NATIVE_MISSING_ENUMERABLE,
      TOKEN_ENUMERABLE: parsed.TEMPLATE_TOKEN_ENUMERABLE,
      TOKEN_MISSING_ENUMERABLE: parsed.TEMPLATE_TOKEN_MISSING_ENUMERABLE,
    },
    protocolFeeRecipient: parsed.PROTOCOL_FEE_RECIPIENT,
    protocolFeeMultiplier: parsed.PROTOCOL_FEE_MULTIPLIER,
  };
}
