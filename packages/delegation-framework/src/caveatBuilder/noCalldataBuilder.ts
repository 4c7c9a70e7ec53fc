import { createNoCalldataTerms, type Caveat } from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const noCalldata = 'noCalldata';

// The enforcer takes no terms.
export type NoCalldataBuilderConfig = Record<string, never>;

export const noCalldataBuilder = (
  environment: DelegationEnvironment,
  _config: NoCalldataBuilderConfig = {},
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'NoCalldataEnforcer'),
  terms: createNoCalldataTerms(),
  args: '0x00',
});
