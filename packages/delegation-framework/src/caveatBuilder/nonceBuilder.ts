import { createNonceTerms, type Caveat } from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const nonce = 'nonce';

export type NonceBuilderConfig = {
  /**
   * The delegator's current nonce. Incrementing the nonce on the enforcer
   * revokes every delegation built with the old one.
   */
  nonce: bigint;
};

/**
 * Builds a caveat struct for the NonceEnforcer.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The configuration object containing the nonce.
 * @returns The Caveat.
 */
export const nonceBuilder = (
  environment: DelegationEnvironment,
  config: NonceBuilderConfig,
): Caveat => {
  const { nonce: value } = config;

  return {
    enforcer: getEnforcerAddress(environment, 'NonceEnforcer'),
    terms: createNonceTerms({ nonce: value }),
    args: '0x00',
  };
};
