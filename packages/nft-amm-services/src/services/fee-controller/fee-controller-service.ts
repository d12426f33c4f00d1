/**
 * FeeControllerService
 *
 * Owns the protocol fee configuration and sweeps fees the factory has
 * accumulated to the fee recipient.
 *
 * The multiplier is an 18-decimal fixed-point share of trade value, capped at
 * MAX_PROTOCOL_FEE (10%).
 */

import type { Address } from 'viem';
import { MAX_PROTOCOL_FEE, isNullAddress, normalizeAddress } from '@nft-amm/shared';
import type { AssetLedger } from '../../assets/index.js';
import type { AtomicScope } from '../../atomic/index.js';
import { ValidationError } from '../../errors/index.js';
import { FactoryEventLog } from '../../events/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { OwnershipService } from '../ownership/index.js';

export interface FeeControllerServiceDependencies {
  /** Account holding accumulated protocol fees */
  factoryAddress: string;
  protocolFeeRecipient: string;
  protocolFeeMultiplier: bigint;
  ownership: OwnershipService;
  ledger: AssetLedger;
  events?: FactoryEventLog;
}

export class FeeControllerService {
  private recipient: Address;
  private multiplier: bigint;
  private readonly factoryAddress: Address;
  private readonly ownership: OwnershipService;
  private readonly ledger: AssetLedger;
  private readonly events: FactoryEventLog;
  private readonly logger: ServiceLogger = createServiceLogger('FeeControllerService');

  constructor(dependencies: FeeControllerServiceDependencies) {
    if (isNullAddress(dependencies.factoryAddress)) {
      throw new ValidationError('factoryAddress', 'must be a non-zero address');
    }
    this.recipient = validateRecipient(dependencies.protocolFeeRecipient);
    this.multiplier = validateMultiplier(dependencies.protocolFeeMultiplier);
    this.factoryAddress = normalizeAddress(dependencies.factoryAddress);
    this.ownership = dependencies.ownership;
    this.ledger = dependencies.ledger;
    this.events = dependencies.events ?? new FactoryEventLog();
  }

  get protocolFeeRecipient(): Address {
    return this.recipient;
  }

  get protocolFeeMultiplier(): bigint {
    return this.multiplier;
  }

  /**
   * @throws AuthorizationError if `caller` is not the owner
   * @throws ValidationError if `newRecipient` is null
   */
  changeRecipient(caller: string, newRecipient: string): void {
    this.ownership.assertOwner(caller, 'changeProtocolFeeRecipient');
    this.recipient = validateRecipient(newRecipient);

    log.stateChange(this.logger, 'protocolFeeRecipient', { recipient: this.recipient });
    this.events.emit({ type: 'ProtocolFeeRecipientUpdate', recipient: this.recipient });
  }

  /**
   * @throws AuthorizationError if `caller` is not the owner
   * @throws ValidationError if `newMultiplier` exceeds MAX_PROTOCOL_FEE
   */
  changeMultiplier(caller: string, newMultiplier: bigint): void {
    this.ownership.assertOwner(caller, 'changeProtocolFeeMultiplier');
    this.multiplier = validateMultiplier(newMultiplier);

    log.stateChange(this.logger, 'protocolFeeMultiplier', {
      multiplier: this.multiplier.toString(),
    });
    this.events.emit({ type: 'ProtocolFeeMultiplierUpdate', multiplier: this.multiplier });
  }

  /**
   * Send the factory's whole native balance to the fee recipient.
   *
   * @returns Amount swept
   */
  withdrawNativeFees(caller: string, scope?: AtomicScope): bigint {
    this.ownership.assertOwner(caller, 'withdrawNativeProtocolFees');

    const amount = this.ledger.nativeBalanceOf(this.factoryAddress);
    this.ledger.transferNative(this.factoryAddress, this.recipient, amount, scope);

    this.logger.info(
      { asset: 'native', amount: amount.toString(), recipient: this.recipient },
      'Protocol fees withdrawn'
    );
    return amount;
  }

  /**
   * Send the factory's whole balance of `token` to the fee recipient.
   *
   * @returns Amount swept
   */
  withdrawTokenFees(caller: string, token: string, scope?: AtomicScope): bigint {
    this.ownership.assertOwner(caller, 'withdrawTokenProtocolFees');
    if (isNullAddress(token)) {
      throw new ValidationError('token', 'must be a non-zero address');
    }

    const tokenAddress = normalizeAddress(token);
    const amount = this.ledger.tokenBalanceOf(tokenAddress, this.factoryAddress);
    this.ledger.transferTokenFrom(
      tokenAddress,
      this.factoryAddress,
      this.factoryAddress,
      this.recipient,
      amount,
      scope
    );

    this.logger.info(
      { asset: tokenAddress, amount: amount.toString(), recipient: this.recipient },
      'Protocol fees withdrawn'
    );
    return amount;
  }
}

function validateRecipient(recipient: string): Address {
  if (isNullAddress(recipient)) {
    throw new ValidationError('protocolFeeRecipient', 'must be a non-zero address');
  }
  return normalizeAddress(recipient);
}

function validateMultiplier(multiplier: bigint): bigint {
  if (multiplier < 0n) {
    throw new ValidationError('protocolFeeMultiplier', `must not be negative (got ${multiplier})`);
  }
  if (multiplier > MAX_PROTOCOL_FEE) {
    throw new ValidationError(
      'protocolFeeMultiplier',
      `${multiplier} exceeds the maximum of ${MAX_PROTOCOL_FEE}`
    );
  }
  return multiplier;
}
