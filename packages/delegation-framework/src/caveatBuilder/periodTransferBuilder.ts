import {
  createMultiTokenPeriodArgs,
  createMultiTokenPeriodTerms,
  createNativeTokenPeriodTransferTerms,
  createTokenPeriodTransferTerms,
  type Caveat,
  type MultiTokenPeriodTerms,
  type NativeTokenPeriodTransferTerms,
  type TokenPeriodTransferTerms,
} from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const nativeTokenPeriodTransfer = 'nativeTokenPeriodTransfer';
export const tokenPeriodTransfer = 'tokenPeriodTransfer';
export const multiTokenPeriod = 'multiTokenPeriod';

export type NativeTokenPeriodTransferBuilderConfig =
  NativeTokenPeriodTransferTerms;

export type TokenPeriodTransferBuilderConfig = TokenPeriodTransferTerms;

export type MultiTokenPeriodBuilderConfig = MultiTokenPeriodTerms & {
  /**
   * The token configuration the redemption is checked against. Can also be
   * chosen later by replacing the caveat's args.
   */
  index?: number;
};

export const nativeTokenPeriodTransferBuilder = (
  environment: DelegationEnvironment,
  config: NativeTokenPeriodTransferBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(
    environment,
    'NativeTokenPeriodTransferEnforcer',
  ),
  terms: createNativeTokenPeriodTransferTerms(config),
  args: '0x00',
});

export const tokenPeriodTransferBuilder = (
  environment: DelegationEnvironment,
  config: TokenPeriodTransferBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'TokenPeriodTransferEnforcer'),
  terms: createTokenPeriodTransferTerms(config),
  args: '0x00',
});

/**
 * Builds a caveat for the MultiTokenPeriodEnforcer.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - One period configuration per token, and optionally the selected index.
 * @returns The Caveat.
 * @throws Error if the index does not select a configured token.
 */
export const multiTokenPeriodBuilder = (
  environment: DelegationEnvironment,
  config: MultiTokenPeriodBuilderConfig,
): Caveat => {
  const { tokenConfigs, index = 0 } = config;

  if (!Number.isInteger(index) || index < 0 || index >= tokenConfigs.length) {
    throw new Error(
      `Invalid index: must select one of the ${tokenConfigs.length} token configurations`,
    );
  }

  return {
    enforcer: getEnforcerAddress(environment, 'MultiTokenPeriodEnforcer'),
    terms: createMultiTokenPeriodTerms({ tokenConfigs }),
    args: createMultiTokenPeriodArgs(index),
  };
};
