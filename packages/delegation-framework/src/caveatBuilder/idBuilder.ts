import { createIdTerms, type Caveat } from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const id = 'id';

export type IdBuilderConfig = {
  id: bigint;
};

export const idBuilder = (
  environment: DelegationEnvironment,
  config: IdBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'IdEnforcer'),
  terms: createIdTerms({ id: config.id }),
  args: '0x00',
});
