import {
  createAllowedTargetsTerms,
  type Address,
  type Caveat,
} from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const allowedTargets = 'allowedTargets';

export type AllowedTargetsBuilderConfig = {
  targets: Address[];
};

export const allowedTargetsBuilder = (
  environment: DelegationEnvironment,
  config: AllowedTargetsBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'AllowedTargetsEnforcer'),
  terms: createAllowedTargetsTerms({ targets: config.targets }),
  args: '0x00',
});
