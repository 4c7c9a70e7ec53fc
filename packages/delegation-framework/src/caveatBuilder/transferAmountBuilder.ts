import {
  createNativeTokenTransferAmountTerms,
  createTokenTransferAmountTerms,
  type Address,
  type Caveat,
} from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const nativeTokenTransferAmount = 'nativeTokenTransferAmount';
export const tokenTransferAmount = 'tokenTransferAmount';

export type NativeTokenTransferAmountBuilderConfig = {
  /**
   * The cumulative native token allowance across all redemptions.
   */
  maxAmount: bigint;
};

export type TokenTransferAmountBuilderConfig = {
  tokenAddress: Address;
  /**
   * The cumulative token allowance across all redemptions.
   */
  maxAmount: bigint;
};

/**
 * Builds a caveat for the NativeTokenTransferAmountEnforcer.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The allowance.
 * @returns The Caveat.
 */
export const nativeTokenTransferAmountBuilder = (
  environment: DelegationEnvironment,
  config: NativeTokenTransferAmountBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(
    environment,
    'NativeTokenTransferAmountEnforcer',
  ),
  terms: createNativeTokenTransferAmountTerms({ maxAmount: config.maxAmount }),
  args: '0x00',
});

/**
 * Builds a caveat for the TokenTransferAmountEnforcer.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The token and its allowance.
 * @returns The Caveat.
 */
export const tokenTransferAmountBuilder = (
  environment: DelegationEnvironment,
  config: TokenTransferAmountBuilderConfig,
): Caveat => {
  const { tokenAddress, maxAmount } = config;

  return {
    enforcer: getEnforcerAddress(environment, 'TokenTransferAmountEnforcer'),
    terms: createTokenTransferAmountTerms({ tokenAddress, maxAmount }),
    args: '0x00',
  };
};
