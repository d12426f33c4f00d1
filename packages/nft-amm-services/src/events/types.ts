/**
 * Factory Event Types
 *
 * Records produced by the factory and its controllers. Event payloads mirror
 * what an indexer needs to follow pair creation and governance changes.
 */

import type { Address } from 'viem';

export type FactoryEvent =
  /** A pair was created for a collection */
  | { type: 'NewPair'; pair: Address; nft: Address }
  /** NFTs were deposited into a pair through the factory */
  | { type: 'NFTDeposit'; pair: Address }
  /** Tokens were deposited into a pair through the factory */
  | { type: 'TokenDeposit'; pair: Address }
  | { type: 'ProtocolFeeRecipientUpdate'; recipient: Address }
  | { type: 'ProtocolFeeMultiplierUpdate'; multiplier: bigint }
  | { type: 'BondingCurveStatusUpdate'; curve: Address; allowed: boolean }
  | { type: 'CallTargetStatusUpdate'; target: Address; allowed: boolean }
  | { type: 'RouterStatusUpdate'; router: Address; allowed: boolean }
  | { type: 'OwnershipTransferred'; previousOwner: Address; newOwner: Address };

export type FactoryEventType = FactoryEvent['type'];

/**
 * Narrow a FactoryEvent to one of its variants
 */
export type FactoryEventOf<T extends FactoryEventType> = Extract<FactoryEvent, { type: T }>;

/**
 * A published event with its position in the log
 */
export interface FactoryEventRecord<TEvent extends FactoryEvent = FactoryEvent> {
  /** Unique event ID (cuid2) */
  id: string;
  /** Monotonic position in the event log, starting at 1 */
  sequence: number;
  emittedAt: Date;
  event: TEvent;
}

export type FactoryEventListener = (record: FactoryEventRecord) => void;
