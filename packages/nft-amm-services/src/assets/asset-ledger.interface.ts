/**
 * Asset Ledger Interface
 *
 * Transfer primitives the factory consumes: native currency, fungible tokens
 * and NFTs. Each transfer is all-or-nothing and throws TransferFailureError
 * on insufficient balance or authorization. When a scope is passed, the
 * transfer registers its inverse so an enclosing operation can roll it back.
 */

import type { Address } from 'viem';
import type { AtomicScope } from '../atomic/index.js';

export interface AssetLedger {
  nativeBalanceOf(account: Address): bigint;

  tokenBalanceOf(token: Address, account: Address): bigint;

  tokenAllowance(token: Address, owner: Address, spender: Address): bigint;

  /**
   * Current owner of an NFT, or undefined if it was never minted
   */
  ownerOf(nft: Address, id: bigint): Address | undefined;

  /**
   * Ids of a collection held by an account, ascending
   */
  nftsHeldBy(nft: Address, account: Address): bigint[];

  isApprovedForAll(nft: Address, owner: Address, operator: Address): boolean;

  /**
   * Move native currency. The sender authorizes its own transfer.
   */
  transferNative(from: Address, to: Address, amount: bigint, scope?: AtomicScope): void;

  /**
   * Move tokens on behalf of `from`. Requires allowance unless spender === from.
   */
  transferTokenFrom(
    token: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
    scope?: AtomicScope
  ): void;

  /**
   * Move an NFT on behalf of `from`, requiring the receiver to accept it.
   * The operator must be the owner or approved for all of the owner's NFTs.
   */
  safeTransferNftFrom(
    nft: Address,
    operator: Address,
    from: Address,
    to: Address,
    id: bigint,
    scope?: AtomicScope
  ): void;

  /**
   * Declare whether an account acknowledges incoming NFT transfers.
   * Accounts never registered accept NFTs.
   */
  registerReceiver(account: Address, acceptsNfts: boolean, scope?: AtomicScope): void;
}
