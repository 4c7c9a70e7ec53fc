import {
  createSwapOfferTerms,
  type Caveat,
  type SwapOfferTerms,
} from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const swapOffer = 'swapOffer';

export type SwapOfferBuilderConfig = SwapOfferTerms;

// args carry the taker's payment chain and are set at redemption.
export const swapOfferBuilder = (
  environment: DelegationEnvironment,
  config: SwapOfferBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'SwapOfferEnforcer'),
  terms: createSwapOfferTerms(config),
  args: '0x',
});
