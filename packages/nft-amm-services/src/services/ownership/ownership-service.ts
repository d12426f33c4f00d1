/**
 * OwnershipService
 *
 * Single-owner gate shared by every administrative service of a factory.
 */

import type { Address } from 'viem';
import { isNullAddress, normalizeAddress } from '@nft-amm/shared';
import { AuthorizationError, ValidationError } from '../../errors/index.js';
import { FactoryEventLog } from '../../events/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';

export interface OwnershipServiceDependencies {
  owner: string;
  events?: FactoryEventLog;
}

export class OwnershipService {
  private currentOwner: Address;
  private readonly events: FactoryEventLog;
  private readonly logger: ServiceLogger = createServiceLogger('OwnershipService');

  constructor(dependencies: OwnershipServiceDependencies) {
    if (isNullAddress(dependencies.owner)) {
      throw new ValidationError('owner', 'must be a non-zero address');
    }
    this.currentOwner = normalizeAddress(dependencies.owner);
    this.events = dependencies.events ?? new FactoryEventLog();
  }

  get owner(): Address {
    return this.currentOwner;
  }

  isOwner(account: string): boolean {
    return !isNullAddress(account) && normalizeAddress(account) === this.currentOwner;
  }

  /**
   * @throws AuthorizationError if `caller` is not the owner
   */
  assertOwner(caller: string, operation: string): void {
    if (!this.isOwner(caller)) {
      throw new AuthorizationError(caller, operation);
    }
  }

  /**
   * Hand ownership to another account.
   *
   * @throws AuthorizationError if `caller` is not the owner
   * @throws ValidationError if `newOwner` is null
   */
  transferOwnership(caller: string, newOwner: string): void {
    this.assertOwner(caller, 'transferOwnership');
    if (isNullAddress(newOwner)) {
      throw new ValidationError('newOwner', 'must be a non-zero address');
    }

    const previousOwner = this.currentOwner;
    this.currentOwner = normalizeAddress(newOwner);

    log.stateChange(this.logger, 'owner', { previousOwner, newOwner: this.currentOwner });
    this.events.emit({ type: 'OwnershipTransferred', previousOwner, newOwner: this.currentOwner });
  }
}
