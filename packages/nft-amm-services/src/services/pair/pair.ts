/**
 * Pair
 *
 * In-process stand-in for a deployed pair clone. Holds the configuration
 * embedded in the clone and the parameters set once by the factory.
 * Trading logic is out of scope; held NFTs and balances live in the asset
 * ledger under the pair's address.
 */

import type { Address } from 'viem';
import {
  MAX_PAIR_FEE,
  getVariantAssetKind,
  isNullAddress,
  type AssetKind,
  type BondingCurve,
  type PairImmutableConfig,
  type PairInitParams,
  type PairJSON,
  type PoolType,
  type PairVariant,
} from '@nft-amm/shared';
import type { AtomicScope } from '../../atomic/index.js';
import { PairInitializationError } from '../../errors/index.js';

export class Pair {
  readonly address: Address;
  readonly factory: Address;
  readonly bondingCurve: Address;
  readonly nft: Address;
  readonly poolType: PoolType;
  readonly variant: PairVariant;
  readonly token: Address | undefined;

  private readonly curve: BondingCurve;
  private params: PairInitParams | undefined;

  constructor(config: PairImmutableConfig, curve: BondingCurve) {
    this.address = config.address;
    this.factory = config.factory;
    this.bondingCurve = config.bondingCurve;
    this.nft = config.nft;
    this.poolType = config.poolType;
    this.variant = config.variant;
    this.token = config.token;
    this.curve = curve;
  }

  get assetKind(): AssetKind {
    return getVariantAssetKind(this.variant);
  }

  get initialized(): boolean {
    return this.params !== undefined;
  }

  get owner(): Address | undefined {
    return this.params?.owner;
  }

  get delta(): bigint | undefined {
    return this.params?.delta;
  }

  get fee(): bigint | undefined {
    return this.params?.fee;
  }

  get spotPrice(): bigint | undefined {
    return this.params?.spotPrice;
  }

  /**
   * Where proceeds go: the configured recipient, or the pair itself when
   * none was set.
   */
  getAssetRecipient(): Address {
    const recipient = this.params?.assetRecipient;
    if (!recipient || isNullAddress(recipient)) {
      return this.address;
    }
    return recipient;
  }

  /**
   * Set the owner and pricing parameters. Callable once.
   *
   * @throws PairInitializationError on a second call or rejected parameters
   */
  initialize(params: PairInitParams, scope?: AtomicScope): void {
    if (this.params) {
      throw new PairInitializationError(this.address, 'already initialized');
    }
    if (isNullAddress(params.owner)) {
      throw new PairInitializationError(this.address, 'owner must be a non-zero address');
    }

    if (this.poolType === 'TRADE') {
      if (params.fee < 0n || params.fee >= MAX_PAIR_FEE) {
        throw new PairInitializationError(
          this.address,
          `trade fee ${params.fee} must be in [0, ${MAX_PAIR_FEE})`
        );
      }
      if (!isNullAddress(params.assetRecipient)) {
        throw new PairInitializationError(
          this.address,
          'TRADE pairs cannot set an asset recipient'
        );
      }
    } else if (params.fee !== 0n) {
      throw new PairInitializationError(
        this.address,
        `only TRADE pairs take a fee (got ${params.fee})`
      );
    }

    if (!this.curve.validateDelta(params.delta)) {
      throw new PairInitializationError(this.address, `invalid delta ${params.delta}`);
    }
    if (!this.curve.validateSpotPrice(params.spotPrice)) {
      throw new PairInitializationError(this.address, `invalid spot price ${params.spotPrice}`);
    }

    this.params = { ...params };
    scope?.onRollback('pair-initialization', () => {
      this.params = undefined;
    });
  }

  toJSON(): PairJSON {
    const json: PairJSON = {
      address: this.address,
      factory: this.factory,
      bondingCurve: this.bondingCurve,
      nft: this.nft,
      poolType: this.poolType,
      variant: this.variant,
      owner: this.params?.owner ?? null,
      assetRecipient: this.params ? this.getAssetRecipient() : null,
      delta: (this.params?.delta ?? 0n).toString(),
      fee: (this.params?.fee ?? 0n).toString(),
      spotPrice: (this.params?.spotPrice ?? 0n).toString(),
    };
    if (this.token) {
      json.token = this.token;
    }
    return json;
  }
}
