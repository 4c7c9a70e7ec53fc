import {
  createAllowedCalldataTerms,
  type Caveat,
  type Hex,
} from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const allowedCalldata = 'allowedCalldata';

export type AllowedCalldataBuilderConfig = {
  /**
   * The index in the calldata byte array (including the 4-byte method selector)
   * where the expected calldata starts.
   */
  startIndex: bigint;
  /**
   * The bytes that must appear at `startIndex`.
   */
  value: Hex;
};

/**
 * Builds a caveat for the AllowedCalldataEnforcer that pins a slice of the
 * calldata to a specific value.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The configuration object containing startIndex and value.
 * @returns The Caveat.
 * @throws Error if the value is empty or startIndex is negative.
 */
export const allowedCalldataBuilder = (
  environment: DelegationEnvironment,
  config: AllowedCalldataBuilderConfig,
): Caveat => {
  const { startIndex, value } = config;

  return {
    enforcer: getEnforcerAddress(environment, 'AllowedCalldataEnforcer'),
    terms: createAllowedCalldataTerms({ startIndex, value }),
    args: '0x00',
  };
};
