/**
 * Factory Error Classes
 *
 * Every failure raised by the factory and its controllers extends
 * FactoryError, so callers can switch on `code`. All of them are terminal for
 * the invocation: state is left exactly as it was before the call.
 */

import type { Address } from 'viem';

export type FactoryErrorCode =
  | 'VALIDATION'
  | 'UNAUTHORIZED'
  | 'POLICY_VIOLATION'
  | 'TRANSFER_FAILURE'
  | 'PAIR_INITIALIZATION'
  | 'CAPABILITY_UNRESOLVED';

export abstract class FactoryError extends Error {
  abstract readonly code: FactoryErrorCode;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.cause = cause;
  }
}

/**
 * Malformed input: null address, fee multiplier above its cap, missing token.
 */
export class ValidationError extends FactoryError {
  readonly code = 'VALIDATION';

  constructor(
    public readonly field: string,
    public readonly reason: string,
    cause?: unknown
  ) {
    super(`Invalid ${field}: ${reason}`, cause);
    this.name = 'ValidationError';
  }
}

/**
 * A non-owner called an owner-only operation.
 */
export class AuthorizationError extends FactoryError {
  readonly code = 'UNAUTHORIZED';

  constructor(
    public readonly caller: string,
    public readonly operation: string
  ) {
    super(`${caller} is not allowed to call ${operation}`);
    this.name = 'AuthorizationError';
  }
}

export type PolicyViolation =
  | 'CURVE_NOT_ALLOWED'
  | 'CALL_TARGET_IS_ROUTER'
  | 'ROUTER_IS_CALL_TARGET';

const POLICY_MESSAGES: Record<PolicyViolation, string> = {
  CURVE_NOT_ALLOWED: 'bonding curve is not whitelisted',
  CALL_TARGET_IS_ROUTER: 'call target is already a whitelisted router',
  ROUTER_IS_CALL_TARGET: 'router is already a whitelisted call target',
};

/**
 * Curve not whitelisted, or the router / call-target mutual exclusion would break.
 */
export class PolicyViolationError extends FactoryError {
  readonly code = 'POLICY_VIOLATION';

  constructor(
    public readonly policy: PolicyViolation,
    public readonly subject: Address
  ) {
    super(`Policy violation for ${subject}: ${POLICY_MESSAGES[policy]}`);
    this.name = 'PolicyViolationError';
  }
}

export type TransferAsset = 'native' | 'token' | 'nft';

/**
 * An asset transfer failed: insufficient balance or allowance, not the owner,
 * operator not approved, or the receiver rejected the NFT.
 */
export class TransferFailureError extends FactoryError {
  readonly code = 'TRANSFER_FAILURE';

  constructor(
    public readonly asset: TransferAsset,
    public readonly from: Address,
    public readonly to: Address,
    public readonly reason: string
  ) {
    super(`Failed to transfer ${asset} from ${from} to ${to}: ${reason}`);
    this.name = 'TransferFailureError';
  }
}

/**
 * A freshly created pair rejected its initialization parameters.
 */
export class PairInitializationError extends FactoryError {
  readonly code = 'PAIR_INITIALIZATION';

  constructor(
    public readonly pair: Address,
    public readonly reason: string
  ) {
    super(`Pair ${pair} rejected initialization: ${reason}`);
    this.name = 'PairInitializationError';
  }
}

/**
 * A collection's enumeration capability could not be determined.
 */
export class CapabilityResolutionError extends FactoryError {
  readonly code = 'CAPABILITY_UNRESOLVED';

  constructor(
    public readonly nft: Address,
    public readonly reason: string,
    cause?: unknown
  ) {
    super(`Failed to resolve capabilities of ${nft}: ${reason}`, cause);
    this.name = 'CapabilityResolutionError';
  }
}
