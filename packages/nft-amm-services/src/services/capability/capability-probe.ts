/**
 * Capability Probe
 *
 * On-chain lookup of whether an NFT collection implements ERC-721
 * Enumerable, via ERC-165 supportsInterface.
 */

import type { Address, PublicClient } from 'viem';
import { ERC721_ENUMERABLE_INTERFACE_ID } from '@nft-amm/shared';

const ERC165_ABI = [
  {
    inputs: [{ internalType: 'bytes4', name: 'interfaceId', type: 'bytes4' }],
    name: 'supportsInterface',
    outputs: [{ internalType: 'bool', name: '', type: 'bool' }],
    stateMutability: 'view',
    type: 'function',
  },
] as const;

export interface CapabilityProbe {
  /**
   * @throws when the collection cannot be queried
   */
  supportsEnumeration(nft: Address): Promise<boolean>;
}

/**
 * Probe backed by a viem PublicClient
 */
export class ViemCapabilityProbe implements CapabilityProbe {
  constructor(private readonly client: PublicClient) {}

  async supportsEnumeration(nft: Address): Promise<boolean> {
    return this.client.readContract({
      address: nft,
      abi: ERC165_ABI,
      functionName: 'supportsInterface',
      args: [ERC721_ENUMERABLE_INTERFACE_ID],
    });
  }
}
