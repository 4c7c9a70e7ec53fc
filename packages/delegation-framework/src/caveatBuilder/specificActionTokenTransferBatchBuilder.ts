import {
  createSpecificActionTokenTransferBatchTerms,
  type Caveat,
  type SpecificActionTokenTransferBatchTerms,
} from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const specificActionTokenTransferBatch =
  'specificActionTokenTransferBatch';

export type SpecificActionTokenTransferBatchBuilderConfig =
  SpecificActionTokenTransferBatchTerms;

/**
 * Builds a caveat for the SpecificActionTokenTransferBatchEnforcer. The
 * delegation can be redeemed once, with a batch of exactly the configured
 * call followed by the configured token transfer.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The call and the transfer.
 * @returns The Caveat.
 */
export const specificActionTokenTransferBatchBuilder = (
  environment: DelegationEnvironment,
  config: SpecificActionTokenTransferBatchBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(
    environment,
    'SpecificActionTokenTransferBatchEnforcer',
  ),
  terms: createSpecificActionTokenTransferBatchTerms(config),
  args: '0x00',
});
