/**
 * AccessControllerService
 *
 * Owner-governed whitelists of arbitrary call targets pairs may invoke and of
 * routers trusted to move a pair's assets on a trader's behalf.
 *
 * Invariant: no address is both a call target and an allowed router.
 */

import type { Address } from 'viem';
import { isNullAddress, isValidAddress, normalizeAddress } from '@nft-amm/shared';
import { PolicyViolationError, ValidationError } from '../../errors/index.js';
import { FactoryEventLog } from '../../events/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { OwnershipService } from '../ownership/index.js';

/**
 * Router whitelist entry
 */
export interface RouterStatus {
  allowed: boolean;
  /** Stays true once the router has been allowed at least once */
  wasEverAllowed: boolean;
}

const UNKNOWN_ROUTER: RouterStatus = { allowed: false, wasEverAllowed: false };

export interface AccessControllerServiceDependencies {
  ownership: OwnershipService;
  events?: FactoryEventLog;
}

export class AccessControllerService {
  private readonly callAllowed = new Set<Address>();
  private readonly routerStatus = new Map<Address, RouterStatus>();
  private readonly ownership: OwnershipService;
  private readonly events: FactoryEventLog;
  private readonly logger: ServiceLogger = createServiceLogger('AccessControllerService');

  constructor(dependencies: AccessControllerServiceDependencies) {
    this.ownership = dependencies.ownership;
    this.events = dependencies.events ?? new FactoryEventLog();
  }

  /**
   * Allow or disallow an arbitrary call target.
   *
   * @throws AuthorizationError if `caller` is not the owner
   * @throws ValidationError if `target` is not an address
   * @throws PolicyViolationError when allowing a target that is an allowed router
   */
  setCallAllowed(caller: string, target: string, allowed: boolean): void {
    this.ownership.assertOwner(caller, 'setCallAllowed');
    if (!isValidAddress(target)) {
      throw new ValidationError('target', `not an address: ${target}`);
    }

    const key = normalizeAddress(target);
    if (allowed && this.isRouterAllowed(key)) {
      throw new PolicyViolationError('CALL_TARGET_IS_ROUTER', key);
    }

    if (allowed) {
      this.callAllowed.add(key);
    } else {
      this.callAllowed.delete(key);
    }

    log.stateChange(this.logger, 'callTarget', { target: key, allowed });
    this.events.emit({ type: 'CallTargetStatusUpdate', target: key, allowed });
  }

  /**
   * Allow or disallow a router.
   *
   * @throws AuthorizationError if `caller` is not the owner
   * @throws ValidationError if `router` is null
   * @throws PolicyViolationError when allowing a router that is an allowed call target
   */
  setRouterAllowed(caller: string, router: string, allowed: boolean): void {
    this.ownership.assertOwner(caller, 'setRouterAllowed');
    if (isNullAddress(router)) {
      throw new ValidationError('router', 'must be a non-zero address');
    }

    const key = normalizeAddress(router);
    if (allowed && this.callAllowed.has(key)) {
      throw new PolicyViolationError('ROUTER_IS_CALL_TARGET', key);
    }

    const previous = this.getRouterStatus(key);
    this.routerStatus.set(key, {
      allowed,
      wasEverAllowed: previous.wasEverAllowed || allowed,
    });

    log.stateChange(this.logger, 'router', { router: key, allowed });
    this.events.emit({ type: 'RouterStatusUpdate', router: key, allowed });
  }

  isCallAllowed(target: string): boolean {
    return isValidAddress(target) && this.callAllowed.has(normalizeAddress(target));
  }

  isRouterAllowed(router: string): boolean {
    return this.getRouterStatus(router).allowed;
  }

  getRouterStatus(router: string): RouterStatus {
    if (!isValidAddress(router)) {
      return { ...UNKNOWN_ROUTER };
    }
    return { ...(this.routerStatus.get(normalizeAddress(router)) ?? UNKNOWN_ROUTER) };
  }
}
