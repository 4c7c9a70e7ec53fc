import {
  createRedeemerTerms,
  type Address,
  type Caveat,
} from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const redeemer = 'redeemer';

export type RedeemerBuilderConfig = {
  /**
   * The only identities allowed to redeem the delegation.
   */
  redeemers: Address[];
};

export const redeemerBuilder = (
  environment: DelegationEnvironment,
  config: RedeemerBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'RedeemerEnforcer'),
  terms: createRedeemerTerms({ redeemers: config.redeemers }),
  args: '0x00',
});
