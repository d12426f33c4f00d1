/**
 * CloneDeployerService
 *
 * Instantiates pairs as minimal clones of four immutable templates and proves
 * afterwards that an address is a genuine clone.
 *
 * Every clone is recorded in an instance table keyed by its address. An
 * address only counts as an instance of a template when the table holds it
 * AND its runtime code and CREATE2 address can be recomputed from the
 * template, the recorded salt and the embedded args. Nothing the candidate
 * reports about itself is trusted.
 */

import type { Address, Hex } from 'viem';
import {
  getVariantAssetKind,
  isNullAddress,
  isPairVariant,
  isValidAddress,
  normalizeAddress,
  type PairVariant,
} from '@nft-amm/shared';
import type { AtomicScope } from '../../atomic/index.js';
import { ValidationError } from '../../errors/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import {
  buildCloneCreationCode,
  buildCloneRuntimeCode,
  cloneTemplateOf,
  computeCloneAddress,
  computeCloneSalt,
  decodeImmutableArgs,
  encodeImmutableArgs,
  extractImmutableArgs,
  type CloneImmutableArgs,
} from './clone-bytecode.js';

/**
 * Instance table row
 */
export interface CloneRecord {
  address: Address;
  variant: PairVariant;
  template: Address;
  nonce: bigint;
  salt: Hex;
  runtimeCode: Hex;
  immutableArgs: CloneImmutableArgs;
}

export type PairTemplates = Record<PairVariant, string>;

export interface CloneDeployerServiceDependencies {
  /** Deployer address used in CREATE2 derivation */
  factoryAddress: string;
  templates: PairTemplates;
}

export class CloneDeployerService {
  private readonly factoryAddress: Address;
  private readonly templates: Readonly<Record<PairVariant, Address>>;
  private readonly instances = new Map<Address, CloneRecord>();
  private nextNonce = 0n;
  private readonly logger: ServiceLogger = createServiceLogger('CloneDeployerService');

  /**
   * @throws ValidationError if the factory or any template is null, or two
   *   variants share a template
   */
  constructor(dependencies: CloneDeployerServiceDependencies) {
    if (isNullAddress(dependencies.factoryAddress)) {
      throw new ValidationError('factoryAddress', 'must be a non-zero address');
    }
    this.factoryAddress = normalizeAddress(dependencies.factoryAddress);

    const { templates } = dependencies;
    this.templates = {
      NATIVE_ENUMERABLE: validateTemplate('NATIVE_ENUMERABLE', templates.NATIVE_ENUMERABLE),
      NATIVE_MISSING_ENUMERABLE: validateTemplate(
        'NATIVE_MISSING_ENUMERABLE',
        templates.NATIVE_MISSING_ENUMERABLE
      ),
      TOKEN_ENUMERABLE: validateTemplate('TOKEN_ENUMERABLE', templates.TOKEN_ENUMERABLE),
      TOKEN_MISSING_ENUMERABLE: validateTemplate(
        'TOKEN_MISSING_ENUMERABLE',
        templates.TOKEN_MISSING_ENUMERABLE
      ),
    };

    const distinct = new Set(Object.values(this.templates));
    if (distinct.size !== Object.keys(this.templates).length) {
      throw new ValidationError('templates', 'each pair variant needs its own template');
    }
  }

  get deployer(): Address {
    return this.factoryAddress;
  }

  get instanceCount(): number {
    return this.instances.size;
  }

  getTemplate(variant: PairVariant): Address {
    return this.templates[variant];
  }

  /**
   * Address the clone deployed with `nonce` would get.
   */
  predictAddress(variant: PairVariant, args: CloneImmutableArgs, nonce: bigint): Address {
    const runtimeCode = buildCloneRuntimeCode(this.templates[variant], encodeImmutableArgs(args));
    return computeCloneAddress(
      this.factoryAddress,
      computeCloneSalt(nonce),
      buildCloneCreationCode(runtimeCode)
    );
  }

  /**
   * Create a new clone of the variant's template carrying `args`.
   *
   * Inside a scope, the record and the nonce are restored on rollback.
   *
   * @throws ValidationError if `args.token` does not match the variant's asset kind
   */
  instantiate(variant: PairVariant, args: CloneImmutableArgs, scope?: AtomicScope): CloneRecord {
    log.methodEntry(this.logger, 'instantiate', { variant, nft: args.nft });

    const assetKind = getVariantAssetKind(variant);
    if (assetKind === 'TOKEN' && !args.token) {
      throw new ValidationError('token', `required for ${variant} clones`);
    }
    if (assetKind === 'NATIVE' && args.token) {
      throw new ValidationError('token', `not allowed for ${variant} clones`);
    }

    const nonce = this.nextNonce;
    const template = this.templates[variant];
    const salt = computeCloneSalt(nonce);
    const runtimeCode = buildCloneRuntimeCode(template, encodeImmutableArgs(args));
    const address = computeCloneAddress(
      this.factoryAddress,
      salt,
      buildCloneCreationCode(runtimeCode)
    );

    const record: CloneRecord = {
      address,
      variant,
      template,
      nonce,
      salt,
      runtimeCode,
      immutableArgs: { ...args },
    };
    this.instances.set(address, record);
    this.nextNonce = nonce + 1n;

    scope?.onRollback('clone-instantiation', () => {
      this.instances.delete(address);
      this.nextNonce = nonce;
    });

    log.methodExit(this.logger, 'instantiate', { variant, address, nonce: nonce.toString() });
    return { ...record };
  }

  /**
   * Whether `candidate` is a clone of the template for `variant` produced by
   * this deployer and naming it as its factory. Never throws.
   */
  isInstanceOf(candidate: string, variant: string): boolean {
    if (!isValidAddress(candidate) || !isPairVariant(variant)) {
      return false;
    }

    const address = normalizeAddress(candidate);
    const record = this.instances.get(address);
    if (!record) {
      return false;
    }

    const template = this.templates[variant];
    if (cloneTemplateOf(record.runtimeCode) !== template) {
      return false;
    }

    const encodedArgs = extractImmutableArgs(record.runtimeCode);
    if (encodedArgs === undefined) {
      return false;
    }
    if (decodeImmutableArgs(encodedArgs)?.factory !== this.factoryAddress) {
      return false;
    }

    const expectedRuntime = buildCloneRuntimeCode(template, encodedArgs);
    if (expectedRuntime !== record.runtimeCode) {
      return false;
    }

    const expectedAddress = computeCloneAddress(
      this.factoryAddress,
      record.salt,
      buildCloneCreationCode(expectedRuntime)
    );
    return expectedAddress === address;
  }

  getInstance(address: string): CloneRecord | undefined {
    if (!isValidAddress(address)) {
      return undefined;
    }
    const record = this.instances.get(normalizeAddress(address));
    return record ? { ...record } : undefined;
  }
}

function validateTemplate(variant: PairVariant, template: string): Address {
  if (isNullAddress(template)) {
    throw new ValidationError(`templates.${variant}`, 'must be a non-zero address');
  }
  return normalizeAddress(template);
}
