/**
 * Pair Factory Input Types
 */

import type { AssetKind, PoolType } from '@nft-amm/shared';

/**
 * Who is calling, and the native value attached to the call
 */
export interface CallContext {
  sender: string;
  /** Native currency sent along (wei); NATIVE pairs only */
  value?: bigint;
}

export interface CreatePairParams {
  assetKind: AssetKind;
  /** Required when assetKind is 'TOKEN' */
  token?: string;
  nft: string;
  bondingCurve: string;
  /** Zero address means "the pair itself" */
  assetRecipient: string;
  poolType: PoolType;
  delta: bigint;
  /** Trade fee multiplier (1e18 = 100%); must be 0 unless poolType is 'TRADE' */
  fee: bigint;
  spotPrice: bigint;
  initialNftIds: readonly bigint[];
  /** TOKEN pairs only */
  initialTokenBalance?: bigint;
}
