import {
  concat,
  decodeAbiParameters,
  encodeAbiParameters,
  getAddress,
  keccak256,
  parseAbiParameters,
  toHex,
} from 'viem';

import type { Caveat, Delegation, Hex, PermissionContext } from './types';

export const CAVEAT_TYPEHASH: Hex = keccak256(
  toHex('Caveat(address enforcer,bytes terms)'),
);

export const DELEGATION_TYPEHASH: Hex = keccak256(
  toHex(
    'Delegation(address delegate,address delegator,bytes32 authority,Caveat[] caveats,uint256 salt)Caveat(address enforcer,bytes terms)',
  ),
);

/**
 * The ABI parameter of an array of caveats.
 */
export const CAVEAT_ARRAY_ABI_PARAMETER = {
  type: 'tuple[]',
  components: [
    { type: 'address', name: 'enforcer' },
    { type: 'bytes', name: 'terms' },
    { type: 'bytes', name: 'args' },
  ],
} as const;

/**
 * The ABI parameter of an array of delegations.
 */
export const DELEGATION_ARRAY_ABI_PARAMETER = {
  type: 'tuple[]',
  components: [
    { type: 'address', name: 'delegate' },
    { type: 'address', name: 'delegator' },
    { type: 'bytes32', name: 'authority' },
    { ...CAVEAT_ARRAY_ABI_PARAMETER, name: 'caveats' },
    { type: 'uint256', name: 'salt' },
    { type: 'bytes', name: 'signature' },
  ],
} as const;

/**
 * Calculates the hash of a single caveat. `args` is not part of the hash.
 *
 * @param caveat - The caveat to hash.
 * @returns The keccak256 hash of the encoded caveat packet.
 */
export const hashCaveat = (caveat: Caveat): Hex => {
  const encoded = encodeAbiParameters(
    parseAbiParameters('bytes32, address, bytes32'),
    [CAVEAT_TYPEHASH, caveat.enforcer, keccak256(caveat.terms)],
  );
  return keccak256(encoded);
};

/**
 * Calculates the hash of a delegation. Neither the signature nor the caveat
 * args contribute to it.
 *
 * @param delegation - The delegation to hash.
 * @returns The delegation hash.
 */
export const hashDelegation = (delegation: Delegation): Hex => {
  const caveatsHash = keccak256(concat(delegation.caveats.map(hashCaveat)));

  const encoded = encodeAbiParameters(
    parseAbiParameters('bytes32, address, address, bytes32, bytes32, uint256'),
    [
      DELEGATION_TYPEHASH,
      delegation.delegate,
      delegation.delegator,
      delegation.authority,
      caveatsHash,
      delegation.salt,
    ],
  );
  return keccak256(encoded);
};

/**
 * ABI encodes a delegation chain.
 *
 * @param delegations - The delegations to encode, leaf first.
 * @returns The encoded permission context.
 */
export const encodeDelegations = (delegations: Delegation[]): Hex =>
  encodeAbiParameters([DELEGATION_ARRAY_ABI_PARAMETER], [delegations]);

/**
 * Decodes an ABI encoded delegation chain.
 *
 * @param encoded - The encoded permission context.
 * @returns The delegations, leaf first.
 */
export const decodeDelegations = (encoded: Hex): Delegation[] => {
  if (encoded === '0x') {
    return [];
  }

  const [delegations] = decodeAbiParameters(
    [DELEGATION_ARRAY_ABI_PARAMETER],
    encoded,
  );

  return delegations.map((delegation) => ({
    delegate: getAddress(delegation.delegate),
    delegator: getAddress(delegation.delegator),
    authority: delegation.authority,
    caveats: delegation.caveats.map((caveat) => ({
      enforcer: getAddress(caveat.enforcer),
      terms: caveat.terms,
      args: caveat.args,
    })),
    salt: delegation.salt,
    signature: delegation.signature,
  }));
};

/**
 * Resolves a permission context to its delegations.
 *
 * @param context - The delegations, or their encoding.
 * @returns The delegations, leaf first.
 */
export const toDelegationChain = (context: PermissionContext): Delegation[] =>
  Array.isArray(context) ? context : decodeDelegations(context);

/**
 * Encodes delegation chains into permission contexts.
 *
 * @param chains - The delegation chains to encode.
 * @returns The encoded permission contexts.
 */
export const encodePermissionContexts = (chains: Delegation[][]): Hex[] =>
  chains.map(encodeDelegations);

/**
 * Decodes permission contexts into delegation chains.
 *
 * @param encoded - The encoded permission contexts.
 * @returns The delegation chains.
 */
export const decodePermissionContexts = (encoded: Hex[]): Delegation[][] =>
  encoded.map(decodeDelegations);
