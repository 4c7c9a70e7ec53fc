import { decodeAbiParameters, encodeAbiParameters, getAddress } from 'viem';

import { CAVEAT_ARRAY_ABI_PARAMETER } from '../delegation';
import { DelegationError, InvalidTermsLengthError } from '../errors';
import type { Caveat, Hex } from '../types';
import { termsSize, type DecodeTermsOptions } from './utils';

export type CaveatGroup = {
  caveats: Caveat[];
};

export type LogicalOrWrapperTerms = {
  groups: CaveatGroup[];
};

/**
 * The redeemer's choice of group and the args for each caveat in it.
 */
export type SelectedGroup = {
  groupIndex: bigint;
  caveatArgs: Hex[];
};

const CAVEAT_GROUP_ARRAY_ABI_PARAMETER = {
  type: 'tuple[]',
  components: [{ ...CAVEAT_ARRAY_ABI_PARAMETER, name: 'caveats' }],
} as const;

const SELECTED_GROUP_ABI_PARAMETER = {
  type: 'tuple',
  components: [
    { type: 'uint256', name: 'groupIndex' },
    { type: 'bytes[]', name: 'caveatArgs' },
  ],
} as const;

export function createLogicalOrWrapperTerms({ groups }: LogicalOrWrapperTerms): Hex {
  if (groups.length === 0) {
    throw new Error('Invalid groups: must provide at least one caveat group');
  }
  return encodeAbiParameters([CAVEAT_GROUP_ARRAY_ABI_PARAMETER], [groups]);
}

export function decodeLogicalOrWrapperTerms(
  terms: Hex,
  { enforcerName = 'LogicalOrWrapperEnforcer' }: DecodeTermsOptions = {},
): LogicalOrWrapperTerms {
  termsSize(terms, enforcerName);

  let groups: CaveatGroup[];
  try {
    const [decoded] = decodeAbiParameters(
      [CAVEAT_GROUP_ARRAY_ABI_PARAMETER],
      terms,
    );
    groups = decoded.map((group) => ({
      caveats: group.caveats.map((caveat) => ({
        enforcer: getAddress(caveat.enforcer),
        terms: caveat.terms,
        args: caveat.args,
      })),
    }));
  } catch (error) {
    throw new InvalidTermsLengthError(enforcerName, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (
    encodeAbiParameters([CAVEAT_GROUP_ARRAY_ABI_PARAMETER], [groups]) !==
    terms.toLowerCase()
  ) {
    throw new InvalidTermsLengthError(enforcerName, {
      details: 'Terms are not a canonical caveat group encoding',
    });
  }

  return { groups };
}

export function createLogicalOrWrapperArgs({
  groupIndex,
  caveatArgs,
}: SelectedGroup): Hex {
  return encodeAbiParameters([SELECTED_GROUP_ABI_PARAMETER], [
    { groupIndex, caveatArgs },
  ]);
}

export function decodeLogicalOrWrapperArgs(args: Hex): SelectedGroup {
  try {
    const [selected] = decodeAbiParameters(
      [SELECTED_GROUP_ABI_PARAMETER],
      args,
    );
    return {
      groupIndex: selected.groupIndex,
      caveatArgs: [...selected.caveatArgs],
    };
  } catch (error) {
    throw new DelegationError('LogicalOrWrapperEnforcer:invalid-args', {
      cause: error instanceof Error ? error : undefined,
    });
  }
}
