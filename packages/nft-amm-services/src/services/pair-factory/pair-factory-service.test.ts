import { describe, it, expect, beforeEach, vi } from 'vitest';
import { zeroAddress } from 'viem';
import { PAIR_VARIANTS } from '@nft-amm/shared';
import { InMemoryAssetLedger } from '../../assets/index.js';
import {
  AuthorizationError,
  CapabilityResolutionError,
  PairInitializationError,
  PolicyViolationError,
  TransferFailureError,
  ValidationError,
} from '../../errors/index.js';
import { CloneDeployerService } from '../clone-deployer/index.js';
import { PairFactoryService } from './pair-factory-service.js';
import type { CreatePairParams } from './types.js';
import {
  ALICE,
  BOB,
  FACTORY,
  FACTORY_CONFIG,
  FEE_RECIPIENT,
  LINEAR_CURVE,
  NATIVE_NFT_POOL,
  NFT,
  OTHER_NFT,
  OWNER,
  TOKEN,
  TOKEN_TRADE_POOL,
  UNKNOWN_CURVE,
  createFactoryFixture,
  type FactoryFixture,
} from './test-fixtures.js';

describe('PairFactoryService', () => {
  let fixture: FactoryFixture;
  let factory: PairFactoryService;
  let ledger: InMemoryAssetLedger;

  beforeEach(async () => {
    fixture = await createFactoryFixture();
    factory = fixture.factory;
    ledger = fixture.ledger;
  });

  describe('construction', () => {
    it('should reject a fee multiplier above the cap', () => {
      expect(
        () =>
          new PairFactoryService({
            config: { ...FACTORY_CONFIG, protocolFeeMultiplier: 10n ** 17n + 1n },
            ledger: new InMemoryAssetLedger(),
          })
      ).toThrow(ValidationError);
    });

    it('should reject duplicate templates', () => {
      const templates = {
        ...FACTORY_CONFIG.templates,
        TOKEN_MISSING_ENUMERABLE: FACTORY_CONFIG.templates.NATIVE_ENUMERABLE,
      };

      expect(
        () =>
          new PairFactoryService({
            config: { ...FACTORY_CONFIG, templates },
            ledger: new InMemoryAssetLedger(),
          })
      ).toThrow(ValidationError);
    });
  });

  describe('createPair', () => {
    it('should create, initialize and fund a NATIVE pair', async () => {
      fixture.capability.register(NFT, true);

      const pair = await factory.createPair({ sender: ALICE, value: 5n }, NATIVE_NFT_POOL);

      expect(ledger.ownerOf(NFT, 1n)).toBe(pair);
      expect(ledger.ownerOf(NFT, 2n)).toBe(pair);
      expect(ledger.nativeBalanceOf(pair)).toBe(5n);
      expect(ledger.nativeBalanceOf(ALICE)).toBe(995n);

      const created = factory.getPair(pair);
      expect(created?.owner).toBe(ALICE);
      expect(created?.spotPrice).toBe(100n);
      expect(created?.delta).toBe(10n);
      expect(created?.getAssetRecipient()).toBe(pair);

      const newPairEvents = factory.events.getEventsOfType('NewPair');
      expect(newPairEvents).toHaveLength(1);
      expect(newPairEvents[0]?.event).toEqual({ type: 'NewPair', pair, nft: NFT });
    });

    it('should be recognized only under its own variant', async () => {
      fixture.capability.register(NFT, true);

      const pair = await factory.createPair({ sender: ALICE, value: 5n }, NATIVE_NFT_POOL);

      expect(PAIR_VARIANTS.filter((variant) => factory.isPair(pair, variant))).toEqual([
        'NATIVE_ENUMERABLE',
      ]);
    });

    it('should fall back to the non-enumerable template for unknown collections', async () => {
      const pair = await factory.createPair({ sender: ALICE }, NATIVE_NFT_POOL);

      expect(factory.getPair(pair)?.variant).toBe('NATIVE_MISSING_ENUMERABLE');
      expect(factory.isPair(pair, 'NATIVE_MISSING_ENUMERABLE')).toBe(true);
    });

    it('should create a TOKEN pair funded from the allowance', async () => {
      const pair = await factory.createPair({ sender: ALICE }, TOKEN_TRADE_POOL);

      expect(factory.isPair(pair, 'TOKEN_MISSING_ENUMERABLE')).toBe(true);
      expect(factory.getPair(pair)?.token).toBe(TOKEN);
      expect(factory.getPair(pair)?.fee).toBe(10n ** 16n);
      expect(ledger.tokenBalanceOf(TOKEN, pair)).toBe(200n);
      expect(ledger.tokenBalanceOf(TOKEN, ALICE)).toBe(300n);
      expect(ledger.tokenAllowance(TOKEN, ALICE, FACTORY)).toBe(300n);
    });

    it('should give every pair a distinct address', async () => {
      const pool = { ...NATIVE_NFT_POOL, initialNftIds: [] };
      const first = await factory.createPair({ sender: ALICE }, pool);
      const second = await factory.createPair({ sender: ALICE }, pool);

      expect(second).not.toBe(first);
      expect(factory.pairCount).toBe(2);
    });

    it('should serialize concurrent creations behind a slow probe', async () => {
      const probe = { supportsEnumeration: vi.fn(async () => true) };
      ({ factory } = await createFactoryFixture(probe));

      const pool = { ...NATIVE_NFT_POOL, initialNftIds: [] };
      const [first, second] = await Promise.all([
        factory.createPair({ sender: ALICE }, pool),
        factory.createPair({ sender: ALICE }, pool),
      ]);

      expect(first).not.toBe(second);
      expect(factory.events.getEventsOfType('NewPair')).toHaveLength(2);
      expect(probe.supportsEnumeration).toHaveBeenCalledTimes(1);
    });

    it('should abort when enumeration support cannot be determined', async () => {
      const probe = {
        supportsEnumeration: vi
          .fn(async () => true)
          .mockRejectedValueOnce(new Error('rpc timeout')),
      };
      ({ factory, ledger } = await createFactoryFixture(probe));

      await expect(
        factory.createPair({ sender: ALICE, value: 5n }, NATIVE_NFT_POOL)
      ).rejects.toThrow(CapabilityResolutionError);

      expect(factory.pairCount).toBe(0);
      expect(factory.events.getEventsOfType('NewPair')).toHaveLength(0);
      expect(ledger.ownerOf(NFT, 1n)).toBe(ALICE);
      expect(ledger.nativeBalanceOf(ALICE)).toBe(1_000n);

      const pair = await factory.createPair({ sender: ALICE, value: 5n }, NATIVE_NFT_POOL);
      expect(factory.getPair(pair)?.variant).toBe('NATIVE_ENUMERABLE');
    });

    it('should reject a curve that is not whitelisted and leave no trace', async () => {
      await factory.setBondingCurveAllowed(OWNER, LINEAR_CURVE, false);
      const eventCount = factory.events.size;

      await expect(
        factory.createPair({ sender: ALICE, value: 5n }, NATIVE_NFT_POOL)
      ).rejects.toThrow(PolicyViolationError);

      expect(factory.pairCount).toBe(0);
      expect(factory.events.size).toBe(eventCount);
      expect(ledger.ownerOf(NFT, 1n)).toBe(ALICE);
      expect(ledger.nativeBalanceOf(ALICE)).toBe(1_000n);
    });

    it('should reject a whitelisted curve without an implementation', async () => {
      await factory.setBondingCurveAllowed(OWNER, UNKNOWN_CURVE, true);

      await expect(
        factory.createPair({ sender: ALICE }, { ...NATIVE_NFT_POOL, bondingCurve: UNKNOWN_CURVE })
      ).rejects.toThrow(`Invalid bondingCurve: no implementation registered for ${UNKNOWN_CURVE}`);
    });

    const invalidInputs: Array<[string, CreatePairParams, bigint | undefined]> = [
      ['a TOKEN pair without token', { ...TOKEN_TRADE_POOL, token: undefined }, undefined],
      ['native value on a TOKEN pair', TOKEN_TRADE_POOL, 1n],
      ['a token balance on a NATIVE pair', { ...NATIVE_NFT_POOL, initialTokenBalance: 1n }, 0n],
      ['a malformed collection', { ...NATIVE_NFT_POOL, nft: 'not-an-address' }, undefined],
      ['a null bonding curve', { ...NATIVE_NFT_POOL, bondingCurve: zeroAddress }, undefined],
      ['negative native value', NATIVE_NFT_POOL, -1n],
    ];

    it.each(invalidInputs)('should reject %s', async (_label, params, value) => {
      await expect(factory.createPair({ sender: ALICE, value }, params)).rejects.toThrow(
        ValidationError
      );
      expect(factory.pairCount).toBe(0);
    });

    it('should roll back everything when an NFT id repeats', async () => {
      await expect(
        factory.createPair(
          { sender: ALICE, value: 5n },
          { ...NATIVE_NFT_POOL, initialNftIds: [1n, 1n] }
        )
      ).rejects.toThrow(TransferFailureError);

      expect(factory.pairCount).toBe(0);
      expect(ledger.ownerOf(NFT, 1n)).toBe(ALICE);
      expect(ledger.nativeBalanceOf(ALICE)).toBe(1_000n);
      expect(factory.events.getEventsOfType('NewPair')).toHaveLength(0);
    });

    it('should reuse the clone nonce after a rollback', async () => {
      await expect(
        factory.createPair({ sender: ALICE, value: 5_000n }, NATIVE_NFT_POOL)
      ).rejects.toThrow('insufficient balance (1000 < 5000)');

      const pair = await factory.createPair({ sender: ALICE }, NATIVE_NFT_POOL);

      const deployer = new CloneDeployerService({
        factoryAddress: FACTORY,
        templates: FACTORY_CONFIG.templates,
      });
      const expected = deployer.predictAddress(
        'NATIVE_MISSING_ENUMERABLE',
        { factory: FACTORY, bondingCurve: LINEAR_CURVE, nft: NFT, poolType: 'NFT' },
        0n
      );
      expect(pair).toBe(expected);
    });

    it('should surface pair initialization failures', async () => {
      await expect(
        factory.createPair({ sender: ALICE }, { ...NATIVE_NFT_POOL, fee: 1n })
      ).rejects.toThrow(PairInitializationError);

      expect(factory.pairCount).toBe(0);
      expect(ledger.ownerOf(NFT, 1n)).toBe(ALICE);
    });

    it('should fail when the factory is not approved for the NFTs', async () => {
      ledger.setApprovalForAll(NFT, ALICE, FACTORY, false);

      await expect(factory.createPair({ sender: ALICE }, NATIVE_NFT_POOL)).rejects.toThrow(
        `${FACTORY} is not approved to transfer NFT #1`
      );
    });
  });

  describe('isPair', () => {
    it('should return false for unknown addresses and variants', async () => {
      const pair = await factory.createPair({ sender: ALICE }, NATIVE_NFT_POOL);

      expect(factory.isPair(BOB, 'NATIVE_MISSING_ENUMERABLE')).toBe(false);
      expect(factory.isPair('0xnope', 'NATIVE_MISSING_ENUMERABLE')).toBe(false);
      expect(factory.isPair(pair, 'ERC1155')).toBe(false);
    });
  });

  describe('depositNFTs', () => {
    it('should move NFTs into a pair and emit NFTDeposit', async () => {
      const pair = await factory.createPair({ sender: ALICE }, NATIVE_NFT_POOL);

      await factory.depositNFTs({ sender: ALICE }, NFT, [3n], pair);

      expect(ledger.ownerOf(NFT, 3n)).toBe(pair);
      const deposits = factory.events.getEventsOfType('NFTDeposit');
      expect(deposits.map((record) => record.event)).toEqual([{ type: 'NFTDeposit', pair }]);
    });

    it('should not emit for recipients that are not pairs', async () => {
      await factory.depositNFTs({ sender: ALICE }, NFT, [3n], BOB);

      expect(ledger.ownerOf(NFT, 3n)).toBe(BOB);
      expect(factory.events.getEventsOfType('NFTDeposit')).toHaveLength(0);
    });

    it('should not emit for a pair of another collection', async () => {
      const pair = await factory.createPair({ sender: ALICE }, NATIVE_NFT_POOL);
      ledger.mintNft(OTHER_NFT, ALICE, 7n);
      ledger.setApprovalForAll(OTHER_NFT, ALICE, FACTORY, true);

      await factory.depositNFTs({ sender: ALICE }, OTHER_NFT, [7n], pair);

      expect(ledger.ownerOf(OTHER_NFT, 7n)).toBe(pair);
      expect(factory.events.getEventsOfType('NFTDeposit')).toHaveLength(0);
    });

    it('should roll back the whole deposit when an id repeats', async () => {
      await expect(
        factory.depositNFTs({ sender: ALICE }, NFT, [2n, 3n, 2n], BOB)
      ).rejects.toThrow(TransferFailureError);

      expect(ledger.ownerOf(NFT, 2n)).toBe(ALICE);
      expect(ledger.ownerOf(NFT, 3n)).toBe(ALICE);
    });

    it('should fail when the receiver rejects NFTs', async () => {
      ledger.registerReceiver(BOB, false);

      await expect(factory.depositNFTs({ sender: ALICE }, NFT, [3n], BOB)).rejects.toThrow(
        'receiver rejected the NFT'
      );
      expect(ledger.ownerOf(NFT, 3n)).toBe(ALICE);
    });
  });

  describe('depositTokens', () => {
    it('should emit TokenDeposit for a TOKEN pair of the same token', async () => {
      const pair = await factory.createPair({ sender: ALICE }, TOKEN_TRADE_POOL);

      await factory.depositTokens({ sender: ALICE }, TOKEN, pair, 50n);

      expect(ledger.tokenBalanceOf(TOKEN, pair)).toBe(250n);
      const deposits = factory.events.getEventsOfType('TokenDeposit');
      expect(deposits.map((record) => record.event)).toEqual([{ type: 'TokenDeposit', pair }]);
    });

    it('should not emit for a NATIVE pair', async () => {
      const pair = await factory.createPair({ sender: ALICE }, NATIVE_NFT_POOL);

      await factory.depositTokens({ sender: ALICE }, TOKEN, pair, 50n);

      expect(ledger.tokenBalanceOf(TOKEN, pair)).toBe(50n);
      expect(factory.events.getEventsOfType('TokenDeposit')).toHaveLength(0);
    });

    it('should fail beyond the allowance', async () => {
      await expect(factory.depositTokens({ sender: ALICE }, TOKEN, BOB, 501n)).rejects.toThrow(
        TransferFailureError
      );
      expect(ledger.tokenBalanceOf(TOKEN, ALICE)).toBe(500n);
    });
  });

  describe('governance', () => {
    it('should reject administrative calls from non-owners', async () => {
      await expect(factory.setBondingCurveAllowed(ALICE, UNKNOWN_CURVE, true)).rejects.toThrow(
        AuthorizationError
      );
      await expect(factory.changeProtocolFeeMultiplier(ALICE, 0n)).rejects.toThrow(
        AuthorizationError
      );
      await expect(factory.withdrawNativeProtocolFees(ALICE)).rejects.toThrow(AuthorizationError);
    });

    it('should list whitelisted curves', () => {
      expect(factory.listAllowedBondingCurves()).toEqual([LINEAR_CURVE]);
      expect(factory.isBondingCurveAllowed(LINEAR_CURVE)).toBe(true);
    });

    it('should keep routers and call targets mutually exclusive', async () => {
      await factory.setRouterAllowed(OWNER, BOB, true);

      await expect(factory.setCallAllowed(OWNER, BOB, true)).rejects.toThrow(PolicyViolationError);
      expect(factory.isCallAllowed(BOB)).toBe(false);
      expect(factory.getRouterStatus(BOB)).toEqual({ allowed: true, wasEverAllowed: true });
    });

    it('should sweep protocol fees to the recipient', async () => {
      ledger.creditNative(FACTORY, 50n);
      ledger.mintTokens(TOKEN, FACTORY, 20n);

      await expect(factory.withdrawNativeProtocolFees(OWNER)).resolves.toBe(50n);
      await expect(factory.withdrawTokenProtocolFees(OWNER, TOKEN)).resolves.toBe(20n);

      expect(ledger.nativeBalanceOf(FEE_RECIPIENT)).toBe(50n);
      expect(ledger.tokenBalanceOf(TOKEN, FEE_RECIPIENT)).toBe(20n);
    });

    it('should hand administration to a new owner', async () => {
      await factory.transferOwnership(OWNER, BOB);

      expect(factory.owner).toBe(BOB);
      await factory.changeProtocolFeeRecipient(BOB, ALICE);
      expect(factory.protocolFeeRecipient).toBe(ALICE);
      await expect(factory.changeProtocolFeeRecipient(OWNER, BOB)).rejects.toThrow(
        AuthorizationError
      );
    });
  });
});
