/**
 * PairFactoryService
 *
 * Creates NFT/asset pairs as clones of four templates, proves later that an
 * address is one of its pairs, and fronts the governance controllers.
 *
 * createPair flow:
 *   validate input → curve whitelist → enumeration capability (async)
 *   → instantiate clone → initialize pair → move collateral and NFTs
 *   → stage NewPair → commit
 *
 * Every mutating operation runs through one OperationQueue, so an operation
 * suspended on the capability probe never interleaves with another. Each runs
 * inside an AtomicScope: a failure at any step undoes all earlier steps and
 * no event is published.
 */

import type { Address } from 'viem';
import {
  PAIR_VARIANTS,
  getPairVariant,
  isNullAddress,
  isValidAddress,
  normalizeAddress,
  type BondingCurve,
  type PairVariant,
} from '@nft-amm/shared';
import type { AssetLedger } from '../../assets/index.js';
import { OperationQueue, runAtomically } from '../../atomic/index.js';
import type { FactoryConfig } from '../../config/index.js';
import { PolicyViolationError, ValidationError } from '../../errors/index.js';
import { FactoryEventLog } from '../../events/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { AccessControllerService, type RouterStatus } from '../access-controller/index.js';
import { CollectionCapabilityService } from '../capability/index.js';
import { CloneDeployerService } from '../clone-deployer/index.js';
import { CurveRegistryService } from '../curve-registry/index.js';
import { FeeControllerService } from '../fee-controller/index.js';
import { OwnershipService } from '../ownership/index.js';
import { Pair } from '../pair/index.js';
import type { CallContext, CreatePairParams } from './types.js';

const TOKEN_VARIANTS: readonly PairVariant[] = ['TOKEN_ENUMERABLE', 'TOKEN_MISSING_ENUMERABLE'];

/**
 * Dependencies for PairFactoryService
 */
export interface PairFactoryServiceDependencies {
  config: FactoryConfig;
  ledger: AssetLedger;
  /**
   * Curve implementations by address. A curve must be both whitelisted and
   * present here to be used by a new pair.
   */
  bondingCurves?: ReadonlyMap<string, BondingCurve>;
  capabilityService?: CollectionCapabilityService;
  events?: FactoryEventLog;
}

export class PairFactoryService {
  readonly events: FactoryEventLog;

  private readonly factoryAddress: Address;
  private readonly ledger: AssetLedger;
  private readonly curves = new Map<Address, BondingCurve>();
  private readonly capabilityService: CollectionCapabilityService;
  private readonly ownership: OwnershipService;
  private readonly curveRegistry: CurveRegistryService;
  private readonly accessController: AccessControllerService;
  private readonly feeController: FeeControllerService;
  private readonly cloneDeployer: CloneDeployerService;
  private readonly pairs = new Map<Address, Pair>();
  private readonly queue = new OperationQueue();
  private readonly logger: ServiceLogger = createServiceLogger('PairFactoryService');

  /**
   * @throws ValidationError on a null factory, owner, template or fee
   *   recipient, duplicate templates, or a fee multiplier above the cap
   */
  constructor(dependencies: PairFactoryServiceDependencies) {
    const { config } = dependencies;

    this.events = dependencies.events ?? new FactoryEventLog();
    this.ledger = dependencies.ledger;
    this.capabilityService = dependencies.capabilityService ?? new CollectionCapabilityService();

    this.cloneDeployer = new CloneDeployerService({
      factoryAddress: config.factoryAddress,
      templates: config.templates,
    });
    this.factoryAddress = this.cloneDeployer.deployer;

    this.ownership = new OwnershipService({ owner: config.owner, events: this.events });
    this.curveRegistry = new CurveRegistryService({
      ownership: this.ownership,
      events: this.events,
    });
    this.accessController = new AccessControllerService({
      ownership: this.ownership,
      events: this.events,
    });
    this.feeController = new FeeControllerService({
      factoryAddress: this.factoryAddress,
      protocolFeeRecipient: config.protocolFeeRecipient,
      protocolFeeMultiplier: config.protocolFeeMultiplier,
      ownership: this.ownership,
      ledger: this.ledger,
      events: this.events,
    });

    for (const [address, curve] of dependencies.bondingCurves ?? []) {
      if (isNullAddress(address)) {
        throw new ValidationError('bondingCurves', `${address} is not a valid curve address`);
      }
      this.curves.set(normalizeAddress(address), curve);
    }
  }

  // ============================================================================
  // PAIR CREATION
  // ============================================================================

  /**
   * Create, initialize and fund a new pair owned by `ctx.sender`.
   *
   * @returns Address of the new pair
   * @throws ValidationError on malformed input
   * @throws PolicyViolationError if the bonding curve is not whitelisted
   * @throws PairInitializationError if the pair rejects its parameters
   * @throws TransferFailureError if collateral or an NFT cannot be moved
   */
  createPair(ctx: CallContext, params: CreatePairParams): Promise<Address> {
    return this.queue.run(() => this.executeCreatePair(ctx, params));
  }

  private async executeCreatePair(ctx: CallContext, params: CreatePairParams): Promise<Address> {
    log.methodEntry(this.logger, 'createPair', {
      sender: ctx.sender,
      assetKind: params.assetKind,
      nft: params.nft,
      poolType: params.poolType,
    });

    try {
      const sender = requireAddress('sender', ctx.sender);
      const nft = requireAddress('nft', params.nft);
      const curveAddress = requireAddress('bondingCurve', params.bondingCurve);
      if (!isValidAddress(params.assetRecipient)) {
        throw new ValidationError('assetRecipient', `${params.assetRecipient} is not an address`);
      }
      const assetRecipient = normalizeAddress(params.assetRecipient);
      const value = ctx.value ?? 0n;
      if (value < 0n) {
        throw new ValidationError('value', `must not be negative (got ${value})`);
      }

      let token: Address | undefined;
      let tokenBalance = 0n;
      if (params.assetKind === 'TOKEN') {
        token = requireAddress('token', params.token);
        if (value !== 0n) {
          throw new ValidationError('value', 'TOKEN pairs do not accept native currency');
        }
        tokenBalance = params.initialTokenBalance ?? 0n;
        if (tokenBalance < 0n) {
          throw new ValidationError(
            'initialTokenBalance',
            `must not be negative (got ${tokenBalance})`
          );
        }
      } else {
        if (params.token !== undefined) {
          throw new ValidationError('token', 'NATIVE pairs do not take a token');
        }
        if (params.initialTokenBalance !== undefined) {
          throw new ValidationError('initialTokenBalance', 'NATIVE pairs are funded with value');
        }
      }

      if (!this.curveRegistry.isAllowed(curveAddress)) {
        throw new PolicyViolationError('CURVE_NOT_ALLOWED', curveAddress);
      }
      const curve = this.curves.get(curveAddress);
      if (!curve) {
        throw new ValidationError(
          'bondingCurve',
          `no implementation registered for ${curveAddress}`
        );
      }

      const enumerable = await this.capabilityService.supportsEnumeration(nft);
      const variant = getPairVariant(params.assetKind, enumerable);

      const pairAddress = await runAtomically(
        async (scope) => {
          const record = this.cloneDeployer.instantiate(
            variant,
            {
              factory: this.factoryAddress,
              bondingCurve: curveAddress,
              nft,
              poolType: params.poolType,
              token,
            },
            scope
          );

          const pair = new Pair(
            {
              address: record.address,
              factory: this.factoryAddress,
              bondingCurve: curveAddress,
              nft,
              poolType: params.poolType,
              variant,
              token,
            },
            curve
          );
          pair.initialize(
            {
              owner: sender,
              assetRecipient,
              delta: params.delta,
              fee: params.fee,
              spotPrice: params.spotPrice,
            },
            scope
          );

          this.pairs.set(pair.address, pair);
          scope.onRollback('pair-registration', () => {
            this.pairs.delete(pair.address);
          });

          if (token) {
            if (tokenBalance > 0n) {
              this.ledger.transferTokenFrom(
                token,
                this.factoryAddress,
                sender,
                pair.address,
                tokenBalance,
                scope
              );
            }
          } else if (value > 0n) {
            this.ledger.transferNative(sender, pair.address, value, scope);
          }

          for (const id of params.initialNftIds) {
            this.ledger.safeTransferNftFrom(
              nft,
              this.factoryAddress,
              sender,
              pair.address,
              id,
              scope
            );
          }

          this.events.emit({ type: 'NewPair', pair: pair.address, nft }, scope);
          return pair.address;
        },
        (undoneSteps) => log.rollback(this.logger, 'createPair', undoneSteps)
      );

      log.methodExit(this.logger, 'createPair', { pair: pairAddress, variant });
      return pairAddress;
    } catch (error) {
      log.methodError(this.logger, 'createPair', error, { nft: params.nft });
      throw error;
    }
  }

  // ============================================================================
  // PAIR LOOKUP
  // ============================================================================

  /**
   * Whether `candidate` is a pair this factory created from the template for
   * `variant`. Never throws.
   */
  isPair(candidate: string, variant: string): boolean {
    return this.cloneDeployer.isInstanceOf(candidate, variant);
  }

  /**
   * A pair this factory created, or undefined.
   */
  getPair(address: string): Pair | undefined {
    if (!isValidAddress(address)) {
      return undefined;
    }
    const pair = this.pairs.get(normalizeAddress(address));
    return pair && this.isPair(pair.address, pair.variant) ? pair : undefined;
  }

  get pairCount(): number {
    return this.pairs.size;
  }

  getTemplate(variant: PairVariant): Address {
    return this.cloneDeployer.getTemplate(variant);
  }

  // ============================================================================
  // DEPOSITS
  // ============================================================================

  /**
   * Move NFTs from the caller to `recipient`. All ids move or none do.
   * Emits NFTDeposit when the recipient is one of this factory's pairs for
   * the same collection.
   *
   * The caller must have approved the factory for all of its NFTs.
   */
  depositNFTs(
    ctx: CallContext,
    nft: string,
    ids: readonly bigint[],
    recipient: string
  ): Promise<void> {
    return this.queue.run(async () => {
      log.methodEntry(this.logger, 'depositNFTs', {
        sender: ctx.sender,
        nft,
        recipient,
        count: ids.length,
      });

      try {
        const sender = requireAddress('sender', ctx.sender);
        const collection = requireAddress('nft', nft);
        const to = requireAddress('recipient', recipient);

        await runAtomically(
          async (scope) => {
            for (const id of ids) {
              this.ledger.safeTransferNftFrom(
                collection,
                this.factoryAddress,
                sender,
                to,
                id,
                scope
              );
            }

            const pair = this.findFactoryPair(to, PAIR_VARIANTS);
            if (pair && pair.nft === collection) {
              this.events.emit({ type: 'NFTDeposit', pair: pair.address }, scope);
            }
          },
          (undoneSteps) => log.rollback(this.logger, 'depositNFTs', undoneSteps)
        );

        log.methodExit(this.logger, 'depositNFTs', { recipient: to });
      } catch (error) {
        log.methodError(this.logger, 'depositNFTs', error, { nft, recipient });
        throw error;
      }
    });
  }

  /**
   * Move tokens from the caller to `recipient`.
   * Emits TokenDeposit when the recipient is one of this factory's TOKEN
   * pairs for the same token.
   *
   * The caller must have approved the factory for at least `amount`.
   */
  depositTokens(ctx: CallContext, token: string, recipient: string, amount: bigint): Promise<void> {
    return this.queue.run(async () => {
      log.methodEntry(this.logger, 'depositTokens', {
        sender: ctx.sender,
        token,
        recipient,
        amount: amount.toString(),
      });

      try {
        const sender = requireAddress('sender', ctx.sender);
        const asset = requireAddress('token', token);
        const to = requireAddress('recipient', recipient);
        if (amount < 0n) {
          throw new ValidationError('amount', `must not be negative (got ${amount})`);
        }

        await runAtomically(
          async (scope) => {
            this.ledger.transferTokenFrom(asset, this.factoryAddress, sender, to, amount, scope);

            const pair = this.findFactoryPair(to, TOKEN_VARIANTS);
            if (pair && pair.token === asset) {
              this.events.emit({ type: 'TokenDeposit', pair: pair.address }, scope);
            }
          },
          (undoneSteps) => log.rollback(this.logger, 'depositTokens', undoneSteps)
        );

        log.methodExit(this.logger, 'depositTokens', { recipient: to });
      } catch (error) {
        log.methodError(this.logger, 'depositTokens', error, { token, recipient });
        throw error;
      }
    });
  }

  // ============================================================================
  // GOVERNANCE
  // ============================================================================

  get owner(): Address {
    return this.ownership.owner;
  }

  get protocolFeeRecipient(): Address {
    return this.feeController.protocolFeeRecipient;
  }

  get protocolFeeMultiplier(): bigint {
    return this.feeController.protocolFeeMultiplier;
  }

  isBondingCurveAllowed(curve: string): boolean {
    return this.curveRegistry.isAllowed(curve);
  }

  listAllowedBondingCurves(): Address[] {
    return this.curveRegistry.listAllowed();
  }

  isCallAllowed(target: string): boolean {
    return this.accessController.isCallAllowed(target);
  }

  isRouterAllowed(router: string): boolean {
    return this.accessController.isRouterAllowed(router);
  }

  getRouterStatus(router: string): RouterStatus {
    return this.accessController.getRouterStatus(router);
  }

  setBondingCurveAllowed(sender: string, curve: string, allowed: boolean): Promise<void> {
    return this.queue.run(async () => this.curveRegistry.setAllowed(sender, curve, allowed));
  }

  setCallAllowed(sender: string, target: string, allowed: boolean): Promise<void> {
    return this.queue.run(async () =>
      this.accessController.setCallAllowed(sender, target, allowed)
    );
  }

  setRouterAllowed(sender: string, router: string, allowed: boolean): Promise<void> {
    return this.queue.run(async () =>
      this.accessController.setRouterAllowed(sender, router, allowed)
    );
  }

  changeProtocolFeeRecipient(sender: string, recipient: string): Promise<void> {
    return this.queue.run(async () => this.feeController.changeRecipient(sender, recipient));
  }

  changeProtocolFeeMultiplier(sender: string, multiplier: bigint): Promise<void> {
    return this.queue.run(async () => this.feeController.changeMultiplier(sender, multiplier));
  }

  /**
   * @returns Amount of native currency swept to the fee recipient
   */
  withdrawNativeProtocolFees(sender: string): Promise<bigint> {
    return this.queue.run(() =>
      runAtomically(async (scope) => this.feeController.withdrawNativeFees(sender, scope))
    );
  }

  /**
   * @returns Amount of `token` swept to the fee recipient
   */
  withdrawTokenProtocolFees(sender: string, token: string): Promise<bigint> {
    return this.queue.run(() =>
      runAtomically(async (scope) => this.feeController.withdrawTokenFees(sender, token, scope))
    );
  }

  transferOwnership(sender: string, newOwner: string): Promise<void> {
    return this.queue.run(async () => this.ownership.transferOwnership(sender, newOwner));
  }

  // ============================================================================
  // INTERNALS
  // ============================================================================

  private findFactoryPair(address: Address, variants: readonly PairVariant[]): Pair | undefined {
    const pair = this.pairs.get(address);
    if (!pair || !variants.some((variant) => this.isPair(address, variant))) {
      return undefined;
    }
    return pair;
  }
}

function requireAddress(field: string, value: string | undefined): Address {
  if (value === undefined || isNullAddress(value)) {
    throw new ValidationError(field, 'must be a non-zero address');
  }
  return normalizeAddress(value);
}
