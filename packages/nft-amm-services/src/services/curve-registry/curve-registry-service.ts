/**
 * CurveRegistryService
 *
 * Owner-governed whitelist of bonding curves that new pairs may use.
 */

import type { Address } from 'viem';
import { isValidAddress, normalizeAddress } from '@nft-amm/shared';
import { ValidationError } from '../../errors/index.js';
import { FactoryEventLog } from '../../events/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { OwnershipService } from '../ownership/index.js';

export interface CurveRegistryServiceDependencies {
  ownership: OwnershipService;
  events?: FactoryEventLog;
}

export class CurveRegistryService {
  private readonly allowedCurves = new Set<Address>();
  private readonly ownership: OwnershipService;
  private readonly events: FactoryEventLog;
  private readonly logger: ServiceLogger = createServiceLogger('CurveRegistryService');

  constructor(dependencies: CurveRegistryServiceDependencies) {
    this.ownership = dependencies.ownership;
    this.events = dependencies.events ?? new FactoryEventLog();
  }

  /**
   * Allow or disallow a bonding curve.
   * Setting the value a curve already has changes nothing and emits nothing.
   *
   * @throws AuthorizationError if `caller` is not the owner
   * @throws ValidationError if `curve` is not an address
   */
  setAllowed(caller: string, curve: string, allowed: boolean): void {
    this.ownership.assertOwner(caller, 'setBondingCurveAllowed');
    if (!isValidAddress(curve)) {
      throw new ValidationError('curve', `not an address: ${curve}`);
    }

    const key = normalizeAddress(curve);
    if (this.allowedCurves.has(key) === allowed) {
      this.logger.debug({ curve: key, allowed }, 'Curve status unchanged');
      return;
    }

    if (allowed) {
      this.allowedCurves.add(key);
    } else {
      this.allowedCurves.delete(key);
    }

    log.stateChange(this.logger, 'bondingCurve', { curve: key, allowed });
    this.events.emit({ type: 'BondingCurveStatusUpdate', curve: key, allowed });
  }

  isAllowed(curve: string): boolean {
    return isValidAddress(curve) && this.allowedCurves.has(normalizeAddress(curve));
  }

  listAllowed(): Address[] {
    return [...this.allowedCurves];
  }
}
