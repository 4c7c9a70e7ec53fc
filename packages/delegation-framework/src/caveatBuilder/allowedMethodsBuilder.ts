import {
  createAllowedMethodsTerms,
  type Caveat,
  type Hex,
} from '@caveatkit/delegation-core';
import { isHex, toFunctionSelector } from 'viem';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const allowedMethods = 'allowedMethods';

export type AllowedMethodsBuilderConfig = {
  /**
   * 4 byte selectors, or function signatures such as
   * `transfer(address,uint256)`.
   */
  selectors: (Hex | string)[];
};

/**
 * Builds a caveat for the AllowedMethodsEnforcer.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The methods the delegate may call.
 * @returns The Caveat.
 * @throws Error if no selector is given or a selector is not 4 bytes.
 */
export const allowedMethodsBuilder = (
  environment: DelegationEnvironment,
  config: AllowedMethodsBuilderConfig,
): Caveat => {
  const selectors = config.selectors.map((selector) =>
    isHex(selector, { strict: true }) ? selector : toFunctionSelector(selector),
  );

  return {
    enforcer: getEnforcerAddress(environment, 'AllowedMethodsEnforcer'),
    terms: createAllowedMethodsTerms({ selectors }),
    args: '0x00',
  };
};
