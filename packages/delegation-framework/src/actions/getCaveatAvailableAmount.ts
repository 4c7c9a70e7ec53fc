import type { Address, Delegation, Hex } from '@caveatkit/delegation-core';
import { isAddressEqual } from 'viem';

import { getEnforcerAddress } from '../caveatBuilder/utils';
import { getDelegationHashOffchain } from '../delegation';
import type {
  PeriodTransferResult,
  StreamingResult,
} from '../DelegationFramework/enforcers';
import type {
  CaveatEnforcerName,
  DelegationFramework,
} from '../environment';

/**
 * Parameters for all caveat enforcer actions.
 */
export type CaveatEnforcerParams = {
  delegation: Delegation;
};

type FrameworkReader = Pick<DelegationFramework, 'environment' | 'enforcers'>;

/**
 * Finds a caveat that matches the specified enforcer address.
 *
 * @param config - The configuration object.
 * @param config.delegation - The delegation to search.
 * @param config.enforcerAddress - The enforcer address to match.
 * @param config.enforcerName - The name of the enforcer.
 * @returns The matching caveat.
 * @throws Error if no matching caveat is found.
 * @throws Error if multiple matching caveats are found.
 */
function findMatchingCaveat({
  delegation,
  enforcerAddress,
  enforcerName,
}: {
  delegation: Delegation;
  enforcerAddress: Address;
  enforcerName: CaveatEnforcerName;
}): { terms: Hex; args: Hex } {
  const [match, ...rest] = delegation.caveats.filter((caveat) =>
    isAddressEqual(caveat.enforcer, enforcerAddress),
  );

  if (!match) {
    throw new Error(`No caveat found with enforcer matching ${enforcerName}`);
  }

  if (rest.length > 0) {
    throw new Error(
      `Multiple caveats found with enforcer matching ${enforcerName}`,
    );
  }

  return { terms: match.terms, args: match.args };
}

const resolveCaveat = (
  { environment }: FrameworkReader,
  enforcerName: CaveatEnforcerName,
  delegation: Delegation,
) => {
  const enforcerAddress = getEnforcerAddress(environment, enforcerName);
  return {
    delegationManager: environment.DelegationManager,
    delegationHash: getDelegationHashOffchain(delegation),
    ...findMatchingCaveat({ delegation, enforcerAddress, enforcerName }),
  };
};

/**
 * Get available amount for native token period transfer enforcer.
 *
 * @param framework - The deployed framework.
 * @param params - The delegation carrying the caveat.
 * @returns The period transfer result.
 */
export function getNativeTokenPeriodTransferEnforcerAvailableAmount(
  framework: FrameworkReader,
  params: CaveatEnforcerParams,
): PeriodTransferResult {
  const caveat = resolveCaveat(
    framework,
    'NativeTokenPeriodTransferEnforcer',
    params.delegation,
  );
  return framework.enforcers.NativeTokenPeriodTransferEnforcer.getAvailableAmount(
    caveat,
  );
}

/**
 * Get available amount for token period transfer enforcer.
 *
 * @param framework - The deployed framework.
 * @param params - The delegation carrying the caveat.
 * @returns The period transfer result.
 */
export function getTokenPeriodTransferEnforcerAvailableAmount(
  framework: FrameworkReader,
  params: CaveatEnforcerParams,
): PeriodTransferResult {
  const caveat = resolveCaveat(
    framework,
    'TokenPeriodTransferEnforcer',
    params.delegation,
  );
  return framework.enforcers.TokenPeriodTransferEnforcer.getAvailableAmount(
    caveat,
  );
}

/**
 * Get available amount for the token selected by a multi token period caveat's args.
 *
 * @param framework - The deployed framework.
 * @param params - The delegation carrying the caveat.
 * @returns The period transfer result.
 */
export function getMultiTokenPeriodEnforcerAvailableAmount(
  framework: FrameworkReader,
  params: CaveatEnforcerParams,
): PeriodTransferResult {
  const caveat = resolveCaveat(
    framework,
    'MultiTokenPeriodEnforcer',
    params.delegation,
  );
  return framework.enforcers.MultiTokenPeriodEnforcer.getAvailableAmount(
    caveat,
  );
}

export function getNativeTokenStreamingEnforcerAvailableAmount(
  framework: FrameworkReader,
  params: CaveatEnforcerParams,
): StreamingResult {
  const caveat = resolveCaveat(
    framework,
    'NativeTokenStreamingEnforcer',
    params.delegation,
  );
  return framework.enforcers.NativeTokenStreamingEnforcer.getAvailableAmount(
    caveat,
  );
}

export function getTokenStreamingEnforcerAvailableAmount(
  framework: FrameworkReader,
  params: CaveatEnforcerParams,
): StreamingResult {
  const caveat = resolveCaveat(
    framework,
    'TokenStreamingEnforcer',
    params.delegation,
  );
  return framework.enforcers.TokenStreamingEnforcer.getAvailableAmount(caveat);
}

/**
 * Caveat enforcer read actions bound to a deployed framework.
 *
 * @param framework - The deployed framework.
 * @returns The bound actions.
 */
export const caveatEnforcerActions = (framework: FrameworkReader) => ({
  getNativeTokenPeriodTransferEnforcerAvailableAmount: (
    params: CaveatEnforcerParams,
  ) => getNativeTokenPeriodTransferEnforcerAvailableAmount(framework, params),
  getTokenPeriodTransferEnforcerAvailableAmount: (params: CaveatEnforcerParams) =>
    getTokenPeriodTransferEnforcerAvailableAmount(framework, params),
  getMultiTokenPeriodEnforcerAvailableAmount: (params: CaveatEnforcerParams) =>
    getMultiTokenPeriodEnforcerAvailableAmount(framework, params),
  getNativeTokenStreamingEnforcerAvailableAmount: (
    params: CaveatEnforcerParams,
  ) => getNativeTokenStreamingEnforcerAvailableAmount(framework, params),
  getTokenStreamingEnforcerAvailableAmount: (params: CaveatEnforcerParams) =>
    getTokenStreamingEnforcerAvailableAmount(framework, params),
});
