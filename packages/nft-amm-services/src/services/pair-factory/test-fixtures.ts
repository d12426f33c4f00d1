/**
 * Pair Factory Test Fixtures
 *
 * Placeholder accounts and a ready-to-use factory wired to an in-memory
 * ledger, with the linear curve registered and whitelisted.
 */

import { zeroAddress } from 'viem';
import { LinearCurve } from '@nft-amm/shared';
import { InMemoryAssetLedger } from '../../assets/index.js';
import type { FactoryConfig } from '../../config/index.js';
import { CollectionCapabilityService, type CapabilityProbe } from '../capability/index.js';
import { PairFactoryService } from './pair-factory-service.js';
import type { CreatePairParams } from './types.js';

// ===========================================================================
// Accounts
// ===========================================================================

export const OWNER = '0x1000000000000000000000000000000000000001';
export const ALICE = '0x1111111111111111111111111111111111111111';
export const BOB = '0x2222222222222222222222222222222222222222';
export const FACTORY = '0x9900000000000000000000000000000000000099';
export const FEE_RECIPIENT = '0x4400000000000000000000000000000000000044';

export const LINEAR_CURVE = '0x2000000000000000000000000000000000000002';
/** Whitelistable but without an implementation */
export const UNKNOWN_CURVE = '0x2100000000000000000000000000000000000021';

export const NFT = '0x3000000000000000000000000000000000000003';
export const OTHER_NFT = '0x3100000000000000000000000000000000000031';
export const TOKEN = '0x4000000000000000000000000000000000000004';

export const FACTORY_CONFIG: FactoryConfig = {
  factoryAddress: FACTORY,
  owner: OWNER,
  templates: {
    NATIVE_ENUMERABLE: '0x7100000000000000000000000000000000000071',
    NATIVE_MISSING_ENUMERABLE: '0x7200000000000000000000000000000000000072',
    TOKEN_ENUMERABLE: '0x7300000000000000000000000000000000000073',
    TOKEN_MISSING_ENUMERABLE: '0x7400000000000000000000000000000000000074',
  },
  protocolFeeRecipient: FEE_RECIPIENT,
  protocolFeeMultiplier: 5n * 10n ** 15n,
};

// ===========================================================================
// Pair parameters
// ===========================================================================

/**
 * NFT pool selling ids 1 and 2, linear curve from 100 wei in steps of 10
 */
export const NATIVE_NFT_POOL: CreatePairParams = {
  assetKind: 'NATIVE',
  nft: NFT,
  bondingCurve: LINEAR_CURVE,
  assetRecipient: zeroAddress,
  poolType: 'NFT',
  delta: 10n,
  fee: 0n,
  spotPrice: 100n,
  initialNftIds: [1n, 2n],
};

/**
 * TRADE pool funded with 200 tokens, 1% fee
 */
export const TOKEN_TRADE_POOL: CreatePairParams = {
  assetKind: 'TOKEN',
  token: TOKEN,
  nft: NFT,
  bondingCurve: LINEAR_CURVE,
  assetRecipient: zeroAddress,
  poolType: 'TRADE',
  delta: 10n,
  fee: 10n ** 16n,
  spotPrice: 100n,
  initialNftIds: [],
  initialTokenBalance: 200n,
};

// ===========================================================================
// Factory
// ===========================================================================

export interface FactoryFixture {
  factory: PairFactoryService;
  ledger: InMemoryAssetLedger;
  capability: CollectionCapabilityService;
}

/**
 * Factory with the linear curve whitelisted. Alice holds 1000 wei, 500
 * tokens and NFTs 1-3, all approved for the factory.
 */
export async function createFactoryFixture(probe?: CapabilityProbe): Promise<FactoryFixture> {
  const ledger = new InMemoryAssetLedger();
  const capability = new CollectionCapabilityService({ probe });
  const factory = new PairFactoryService({
    config: FACTORY_CONFIG,
    ledger,
    capabilityService: capability,
    bondingCurves: new Map([[LINEAR_CURVE, new LinearCurve()]]),
  });

  await factory.setBondingCurveAllowed(OWNER, LINEAR_CURVE, true);

  ledger.creditNative(ALICE, 1_000n);
  ledger.mintTokens(TOKEN, ALICE, 500n);
  ledger.approveToken(TOKEN, ALICE, FACTORY, 500n);
  for (const id of [1n, 2n, 3n]) {
    ledger.mintNft(NFT, ALICE, id);
  }
  ledger.setApprovalForAll(NFT, ALICE, FACTORY, true);

  return { factory, ledger, capability };
}
