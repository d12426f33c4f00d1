/**
 * Clone Bytecode
 *
 * Minimal proxy (EIP-1167) clones with immutable arguments appended to the
 * runtime code:
 *
 *   runtime  = 363d3d373d3d3d363d73 ‖ template ‖ 5af43d82803e903d91602b57fd5bf3 ‖ args
 *   creation = 61 <len:2> 80 600a 3d 39 3d f3 ‖ runtime
 *
 * args = factory ‖ bondingCurve ‖ nft ‖ poolType:uint8 [‖ token]   (61 or 81 bytes)
 *
 * Clone addresses are CREATE2-derived from the factory, a per-clone salt and
 * the creation code, so they can be recomputed from public data.
 */

import {
  concat,
  encodePacked,
  getAddress,
  getContractAddress,
  hexToNumber,
  keccak256,
  numberToHex,
  size,
  slice,
  type Address,
  type Hex,
} from 'viem';
import { POOL_TYPE_CODES, poolTypeFromCode, type PoolType } from '@nft-amm/shared';

const EIP1167_PREFIX: Hex = '0x363d3d373d3d3d363d73';
const EIP1167_SUFFIX: Hex = '0x5af43d82803e903d91602b57fd5bf3';

/** PUSH2 <len> DUP1 PUSH1 0x0a RETURNDATASIZE CODECOPY RETURNDATASIZE RETURN */
const CREATION_HEADER_OPCODE: Hex = '0x61';
const CREATION_HEADER_BODY: Hex = '0x80600a3d393df3';

/** Bytes of the proxy part of the runtime code */
export const CLONE_PROXY_SIZE = 45;

const TEMPLATE_OFFSET = 10;
const NATIVE_ARGS_SIZE = 61;
const TOKEN_ARGS_SIZE = 81;

/**
 * Configuration embedded in every clone
 */
export interface CloneImmutableArgs {
  factory: Address;
  bondingCurve: Address;
  nft: Address;
  poolType: PoolType;
  /** TOKEN pairs only */
  token?: Address;
}

export function encodeImmutableArgs(args: CloneImmutableArgs): Hex {
  const base = encodePacked(
    ['address', 'address', 'address', 'uint8'],
    [args.factory, args.bondingCurve, args.nft, POOL_TYPE_CODES[args.poolType]]
  );
  return args.token ? concat([base, encodePacked(['address'], [args.token])]) : base;
}

/**
 * Decode immutable args.
 *
 * @returns The args, or undefined when the encoding is malformed
 */
export function decodeImmutableArgs(encoded: Hex): CloneImmutableArgs | undefined {
  const length = size(encoded);
  if (length !== NATIVE_ARGS_SIZE && length !== TOKEN_ARGS_SIZE) {
    return undefined;
  }

  const poolType = poolTypeFromCode(hexToNumber(slice(encoded, 60, 61)));
  if (!poolType) {
    return undefined;
  }

  const args: CloneImmutableArgs = {
    factory: getAddress(slice(encoded, 0, 20)),
    bondingCurve: getAddress(slice(encoded, 20, 40)),
    nft: getAddress(slice(encoded, 40, 60)),
    poolType,
  };
  if (length === TOKEN_ARGS_SIZE) {
    args.token = getAddress(slice(encoded, 61, 81));
  }
  return args;
}

/**
 * Runtime code of a clone of `template` carrying pre-encoded args.
 * encodePacked lowercases the template, so codes built from lowercase args
 * compare equal as strings.
 */
export function buildCloneRuntimeCode(template: Address, encodedArgs: Hex): Hex {
  return encodePacked(
    ['bytes', 'address', 'bytes', 'bytes'],
    [EIP1167_PREFIX, template, EIP1167_SUFFIX, encodedArgs]
  );
}

/**
 * Creation code that deploys `runtimeCode` verbatim.
 */
export function buildCloneCreationCode(runtimeCode: Hex): Hex {
  return concat([
    CREATION_HEADER_OPCODE,
    numberToHex(size(runtimeCode), { size: 2 }),
    CREATION_HEADER_BODY,
    runtimeCode,
  ]);
}

/**
 * Template a clone delegates to, read from its runtime code.
 *
 * @returns The checksummed template, or undefined if the code is not a clone
 */
export function cloneTemplateOf(runtimeCode: Hex): Address | undefined {
  if (!isCloneCode(runtimeCode)) {
    return undefined;
  }
  return getAddress(slice(runtimeCode, TEMPLATE_OFFSET, TEMPLATE_OFFSET + 20));
}

/**
 * Encoded immutable args trailing a clone's runtime code.
 */
export function extractImmutableArgs(runtimeCode: Hex): Hex | undefined {
  if (!isCloneCode(runtimeCode)) {
    return undefined;
  }
  if (size(runtimeCode) === CLONE_PROXY_SIZE) {
    return '0x';
  }
  return slice(runtimeCode, CLONE_PROXY_SIZE);
}

export function computeCloneSalt(nonce: bigint): Hex {
  return keccak256(encodePacked(['uint256'], [nonce]));
}

export function computeCloneAddress(deployer: Address, salt: Hex, creationCode: Hex): Address {
  return getContractAddress({
    opcode: 'CREATE2',
    from: deployer,
    salt,
    bytecode: creationCode,
  });
}

function isCloneCode(runtimeCode: Hex): boolean {
  if (size(runtimeCode) < CLONE_PROXY_SIZE) {
    return false;
  }
  const lower = runtimeCode.toLowerCase();
  return (
    lower.startsWith(EIP1167_PREFIX) &&
    slice(runtimeCode, TEMPLATE_OFFSET + 20, CLONE_PROXY_SIZE).toLowerCase() === EIP1167_SUFFIX
  );
}
