import { createTimestampTerms, type Caveat } from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const timestamp = 'timestamp';

export type TimestampBuilderConfig = {
  /**
   * The first second at which the delegation is valid.
   * Set to 0 to disable this threshold.
   */
  afterThreshold: bigint;
  /**
   * The last second at which the delegation is valid.
   * Set to 0 to disable this threshold.
   */
  beforeThreshold: bigint;
};

/**
 * Builds a caveat struct for the TimestampEnforcer.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The configuration object for the TimestampEnforcer.
 * @returns The Caveat.
 * @throws Error if any of the parameters are invalid.
 */
export const timestampBuilder = (
  environment: DelegationEnvironment,
  config: TimestampBuilderConfig,
): Caveat => {
  const { afterThreshold, beforeThreshold } = config;

  const terms = createTimestampTerms({
    timestampAfterThreshold: afterThreshold,
    timestampBeforeThreshold: beforeThreshold,
  });

  return {
    enforcer: getEnforcerAddress(environment, 'TimestampEnforcer'),
    terms,
    args: '0x00',
  };
};
