import {
  createArgsEqualityCheckTerms,
  type Caveat,
  type Hex,
} from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const argsEqualityCheck = 'argsEqualityCheck';

export type ArgsEqualityCheckBuilderConfig = {
  /**
   * The args the redeemer must supply.
   */
  args: Hex;
};

/**
 * Builds a caveat for the ArgsEqualityCheckEnforcer. The caveat's own args
 * are left empty; they are supplied at redemption time.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The expected args.
 * @returns The Caveat.
 */
export const argsEqualityCheckBuilder = (
  environment: DelegationEnvironment,
  config: ArgsEqualityCheckBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'ArgsEqualityCheckEnforcer'),
  terms: createArgsEqualityCheckTerms({ args: config.args }),
  args: '0x',
});
