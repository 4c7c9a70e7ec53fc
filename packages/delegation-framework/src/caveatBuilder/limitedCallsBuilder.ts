import { createLimitedCallsTerms, type Caveat } from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const limitedCalls = 'limitedCalls';
export const redeemerLimitedCalls = 'redeemerLimitedCalls';

export type LimitedCallsBuilderConfig = {
  /**
   * The maximum number of redemptions.
   */
  limit: bigint;
};

/**
 * Builds a caveat for the LimitedCallsEnforcer.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The call limit.
 * @returns The Caveat.
 * @throws Error if the limit is not a positive number.
 */
export const limitedCallsBuilder = (
  environment: DelegationEnvironment,
  config: LimitedCallsBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'LimitedCallsEnforcer'),
  terms: createLimitedCallsTerms({ limit: config.limit }),
  args: '0x00',
});

/**
 * Builds a caveat for the RedeemerLimitedCallsEnforcer: the limit applies to
 * each redeemer separately.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The call limit per redeemer.
 * @returns The Caveat.
 */
export const redeemerLimitedCallsBuilder = (
  environment: DelegationEnvironment,
  config: LimitedCallsBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'RedeemerLimitedCallsEnforcer'),
  terms: createLimitedCallsTerms({ limit: config.limit }),
  args: '0x00',
});
