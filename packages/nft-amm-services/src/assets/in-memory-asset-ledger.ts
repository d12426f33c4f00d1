/**
 * InMemoryAssetLedger
 *
 * In-process AssetLedger holding native balances, token balances and
 * allowances, NFT ownership and operator approvals. Used for local runs and
 * tests in place of on-chain transfers.
 */

import type { Address } from 'viem';
import { isUint256, normalizeAddress } from '@nft-amm/shared';
import type { AtomicScope } from '../atomic/index.js';
import { TransferFailureError, ValidationError } from '../errors/index.js';
import type { AssetLedger } from './asset-ledger.interface.js';

export class InMemoryAssetLedger implements AssetLedger {
  private readonly nativeBalances = new Map<Address, bigint>();
  /** token -> account -> balance */
  private readonly tokenBalances = new Map<Address, Map<Address, bigint>>();
  /** `${token}:${owner}:${spender}` -> allowance */
  private readonly allowances = new Map<string, bigint>();
  /** nft -> id -> owner */
  private readonly nftOwners = new Map<Address, Map<bigint, Address>>();
  /** `${nft}:${owner}:${operator}` */
  private readonly operatorApprovals = new Set<string>();
  private readonly receivers = new Map<Address, boolean>();

  // ============================================================================
  // SEEDING
  // ============================================================================

  creditNative(account: Address, amount: bigint): void {
    assertAmount(amount);
    const key = normalizeAddress(account);
    this.nativeBalances.set(key, this.nativeBalanceOf(key) + amount);
  }

  mintTokens(token: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    const holder = normalizeAddress(to);
    this.setTokenBalance(token, holder, this.tokenBalanceOf(token, holder) + amount);
  }

  mintNft(nft: Address, to: Address, id: bigint): void {
    if (this.ownerOf(nft, id) !== undefined) {
      throw new ValidationError('id', `NFT #${id} of ${nft} already exists`);
    }
    this.nftOwnersOf(nft).set(id, normalizeAddress(to));
  }

  approveToken(token: Address, owner: Address, spender: Address, amount: bigint): void {
    assertAmount(amount);
    this.allowances.set(allowanceKey(token, owner, spender), amount);
  }

  setApprovalForAll(nft: Address, owner: Address, operator: Address, approved: boolean): void {
    const key = approvalKey(nft, owner, operator);
    if (approved) {
      this.operatorApprovals.add(key);
    } else {
      this.operatorApprovals.delete(key);
    }
  }

  // ============================================================================
  // READS
  // ============================================================================

  nativeBalanceOf(account: Address): bigint {
    return this.nativeBalances.get(normalizeAddress(account)) ?? 0n;
  }

  tokenBalanceOf(token: Address, account: Address): bigint {
    return this.tokenBalances.get(normalizeAddress(token))?.get(normalizeAddress(account)) ?? 0n;
  }

  tokenAllowance(token: Address, owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(token, owner, spender)) ?? 0n;
  }

  ownerOf(nft: Address, id: bigint): Address | undefined {
    return this.nftOwners.get(normalizeAddress(nft))?.get(id);
  }

  nftsHeldBy(nft: Address, account: Address): bigint[] {
    const holder = normalizeAddress(account);
    const owners = this.nftOwners.get(normalizeAddress(nft));
    if (!owners) {
      return [];
    }

    const ids: bigint[] = [];
    for (const [id, owner] of owners) {
      if (owner === holder) {
        ids.push(id);
      }
    }
    return ids.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  isApprovedForAll(nft: Address, owner: Address, operator: Address): boolean {
    return this.operatorApprovals.has(approvalKey(nft, owner, operator));
  }

  // ============================================================================
  // TRANSFERS
  // ============================================================================

  transferNative(from: Address, to: Address, amount: bigint, scope?: AtomicScope): void {
    const sender = normalizeAddress(from);
    const receiver = normalizeAddress(to);
    assertAmount(amount);

    const senderBalance = this.nativeBalanceOf(sender);
    if (senderBalance < amount) {
      throw new TransferFailureError(
        'native',
        sender,
        receiver,
        `insufficient balance (${senderBalance} < ${amount})`
      );
    }

    const receiverBalance = this.nativeBalanceOf(receiver);
    this.nativeBalances.set(sender, senderBalance - amount);
    this.nativeBalances.set(receiver, this.nativeBalanceOf(receiver) + amount);

    scope?.onRollback('native-transfer', () => {
      this.nativeBalances.set(receiver, receiverBalance);
      this.nativeBalances.set(sender, senderBalance);
    });
  }

  transferTokenFrom(
    token: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
    scope?: AtomicScope
  ): void {
    const sender = normalizeAddress(from);
    const receiver = normalizeAddress(to);
    const operator = normalizeAddress(spender);
    assertAmount(amount);

    const allowance = this.tokenAllowance(token, sender, operator);
    const spendsAllowance = operator !== sender;
    if (spendsAllowance && allowance < amount) {
      throw new TransferFailureError(
        'token',
        sender,
        receiver,
        `insufficient allowance for ${operator} (${allowance} < ${amount})`
      );
    }

    const senderBalance = this.tokenBalanceOf(token, sender);
    if (senderBalance < amount) {
      throw new TransferFailureError(
        'token',
        sender,
        receiver,
        `insufficient balance (${senderBalance} < ${amount})`
      );
    }

    const receiverBalance = this.tokenBalanceOf(token, receiver);
    if (spendsAllowance) {
      this.allowances.set(allowanceKey(token, sender, operator), allowance - amount);
    }
    this.setTokenBalance(token, sender, senderBalance - amount);
    this.setTokenBalance(token, receiver, this.tokenBalanceOf(token, receiver) + amount);

    scope?.onRollback('token-transfer', () => {
      this.setTokenBalance(token, receiver, receiverBalance);
      this.setTokenBalance(token, sender, senderBalance);
      if (spendsAllowance) {
        this.allowances.set(allowanceKey(token, sender, operator), allowance);
      }
    });
  }

  safeTransferNftFrom(
    nft: Address,
    operator: Address,
    from: Address,
    to: Address,
    id: bigint,
    scope?: AtomicScope
  ): void {
    const sender = normalizeAddress(from);
    const receiver = normalizeAddress(to);
    const caller = normalizeAddress(operator);

    const owner = this.ownerOf(nft, id);
    if (owner !== sender) {
      throw new TransferFailureError('nft', sender, receiver, `NFT #${id} is not owned by sender`);
    }
    if (caller !== sender && !this.isApprovedForAll(nft, sender, caller)) {
      throw new TransferFailureError(
        'nft',
        sender,
        receiver,
        `${caller} is not approved to transfer NFT #${id}`
      );
    }
    if (this.receivers.get(receiver) === false) {
      throw new TransferFailureError('nft', sender, receiver, 'receiver rejected the NFT');
    }

    const owners = this.nftOwnersOf(nft);
    owners.set(id, receiver);

    scope?.onRollback('nft-transfer', () => {
      owners.set(id, sender);
    });
  }

  registerReceiver(account: Address, acceptsNfts: boolean, scope?: AtomicScope): void {
    const key = normalizeAddress(account);
    const previous = this.receivers.get(key);
    this.receivers.set(key, acceptsNfts);

    scope?.onRollback('receiver-registration', () => {
      if (previous === undefined) {
        this.receivers.delete(key);
      } else {
        this.receivers.set(key, previous);
      }
    });
  }

  // ============================================================================
  // INTERNALS
  // ============================================================================

  private setTokenBalance(token: Address, account: Address, balance: bigint): void {
    const key = normalizeAddress(token);
    let balances = this.tokenBalances.get(key);
    if (!balances) {
      balances = new Map();
      this.tokenBalances.set(key, balances);
    }
    balances.set(normalizeAddress(account), balance);
  }

  private nftOwnersOf(nft: Address): Map<bigint, Address> {
    const key = normalizeAddress(nft);
    let owners = this.nftOwners.get(key);
    if (!owners) {
      owners = new Map();
      this.nftOwners.set(key, owners);
    }
    return owners;
  }
}

function assertAmount(amount: bigint): void {
  if (!isUint256(amount)) {
    throw new ValidationError('amount', `${amount} is not a uint256`);
  }
}

function allowanceKey(token: Address, owner: Address, spender: Address): string {
  return `${normalizeAddress(token)}:${normalizeAddress(owner)}:${normalizeAddress(spender)}`;
}

function approvalKey(nft: Address, owner: Address, operator: Address): string {
  return `${normalizeAddress(nft)}:${normalizeAddress(owner)}:${normalizeAddress(operator)}`;
}
