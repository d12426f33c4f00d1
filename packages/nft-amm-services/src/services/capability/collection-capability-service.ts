/**
 * CollectionCapabilityService
 *
 * Resolves whether a collection is enumerable, which decides the pair
 * template. Registered metadata wins; otherwise the optional probe is asked
 * once and the answer cached. Concurrent lookups of the same collection
 * share one probe call.
 *
 * A failed probe rejects with CapabilityResolutionError and caches nothing,
 * so a later lookup probes again. Metadata registered while a probe is in
 * flight takes precedence over the probe's answer.
 */

import type { Address } from 'viem';
import { isNullAddress, normalizeAddress } from '@nft-amm/shared';
import { CapabilityResolutionError, ValidationError } from '../../errors/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { CapabilityProbe } from './capability-probe.js';

export interface CollectionCapabilityServiceDependencies {
  probe?: CapabilityProbe;
}

export class CollectionCapabilityService {
  private readonly probe: CapabilityProbe | undefined;
  private readonly resolved = new Map<Address, boolean>();
  private readonly inFlight = new Map<Address, Promise<boolean>>();
  private readonly logger: ServiceLogger = createServiceLogger('CollectionCapabilityService');

  constructor(dependencies: CollectionCapabilityServiceDependencies = {}) {
    this.probe = dependencies.probe;
  }

  /**
   * Record a collection's enumeration capability, overriding any cached answer.
   *
   * @throws ValidationError if `nft` is null
   */
  register(nft: string, enumerable: boolean): void {
    const collection = validateCollection(nft);
    this.resolved.set(collection, enumerable);
    this.inFlight.delete(collection);
    log.stateChange(this.logger, 'collectionCapability', { nft: collection, enumerable });
  }

  /**
   * Cached answer without probing.
   */
  getCached(nft: string): boolean | undefined {
    if (isNullAddress(nft)) {
      return undefined;
    }
    return this.resolved.get(normalizeAddress(nft));
  }

  /**
   * @throws ValidationError if `nft` is null
   * @throws CapabilityResolutionError if the probe fails
   */
  async supportsEnumeration(nft: string): Promise<boolean> {
    const collection = validateCollection(nft);

    const cached = this.resolved.get(collection);
    if (cached !== undefined) {
      return cached;
    }
    if (!this.probe) {
      return false;
    }

    const pending = this.inFlight.get(collection);
    if (pending) {
      return pending;
    }

    const lookup = this.runProbe(this.probe, collection).finally(() => {
      if (this.inFlight.get(collection) === lookup) {
        this.inFlight.delete(collection);
      }
    });
    this.inFlight.set(collection, lookup);
    return lookup;
  }

  private async runProbe(probe: CapabilityProbe, collection: Address): Promise<boolean> {
    log.methodEntry(this.logger, 'runProbe', { nft: collection });

    let probed: boolean;
    try {
      probed = await probe.supportsEnumeration(collection);
    } catch (error) {
      log.methodError(this.logger, 'runProbe', error, { nft: collection });
      throw new CapabilityResolutionError(
        collection,
        error instanceof Error ? error.message : 'Unknown error',
        error
      );
    }

    // Registered metadata wins over a probe that was already running
    const registered = this.resolved.get(collection);
    if (registered !== undefined) {
      return registered;
    }
    this.resolved.set(collection, probed);
    log.methodExit(this.logger, 'runProbe', { nft: collection, enumerable: probed });
    return probed;
  }
}

function validateCollection(nft: string): Address {
  if (isNullAddress(nft)) {
    throw new ValidationError('nft', 'must be a non-zero address');
  }
  return normalizeAddress(nft);
}
