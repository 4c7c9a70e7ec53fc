import { createBlockNumberTerms, type Caveat } from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const blockNumber = 'blockNumber';

export type BlockNumberBuilderConfig = {
  /**
   * The first block at which the delegation is valid. Set to 0 to disable
   * this threshold.
   */
  afterThreshold: bigint;
  /**
   * The last block at which the delegation is valid. Set to 0 to disable
   * this threshold.
   */
  beforeThreshold: bigint;
};

/**
 * Builds a caveat for the BlockNumberEnforcer.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The block window.
 * @returns The Caveat.
 * @throws Error if both thresholds are zero or the window is inverted.
 */
export const blockNumberBuilder = (
  environment: DelegationEnvironment,
  config: BlockNumberBuilderConfig,
): Caveat => {
  const { afterThreshold, beforeThreshold } = config;

  return {
    enforcer: getEnforcerAddress(environment, 'BlockNumberEnforcer'),
    terms: createBlockNumberTerms({ afterThreshold, beforeThreshold }),
    args: '0x00',
  };
};
