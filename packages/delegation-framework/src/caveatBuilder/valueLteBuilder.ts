import { createValueLteTerms, type Caveat } from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const valueLte = 'valueLte';

export type ValueLteBuilderConfig = {
  /**
   * The maximum value that may be specified when redeeming this delegation.
   */
  maxValue: bigint;
};

/**
 * Builds a caveat struct for ValueLteEnforcer.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The configuration object containing the maximum value allowed for the transaction.
 * @returns The Caveat.
 * @throws Error if any of the parameters are invalid.
 */
export const valueLteBuilder = (
  environment: DelegationEnvironment,
  config: ValueLteBuilderConfig,
): Caveat => {
  const { maxValue } = config;

  return {
    enforcer: getEnforcerAddress(environment, 'ValueLteEnforcer'),
    terms: createValueLteTerms({ maxValue }),
    args: '0x00',
  };
};
