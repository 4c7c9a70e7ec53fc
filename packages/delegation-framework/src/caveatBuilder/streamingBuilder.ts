import {
  createNativeTokenStreamingTerms,
  createTokenStreamingTerms,
  type Caveat,
  type NativeTokenStreamingTerms,
  type TokenStreamingTerms,
} from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const nativeTokenStreaming = 'nativeTokenStreaming';
export const tokenStreaming = 'tokenStreaming';

export type NativeTokenStreamingBuilderConfig = NativeTokenStreamingTerms;

export type TokenStreamingBuilderConfig = TokenStreamingTerms;

/**
 * Builds a caveat for the NativeTokenStreamingEnforcer. The allowance starts
 * at `initialAmount` and grows by `amountPerSecond` up to `maxAmount`.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The stream configuration.
 * @returns The Caveat.
 * @throws Error if `maxAmount` is lower than `initialAmount`, or the start time is zero.
 */
export const nativeTokenStreamingBuilder = (
  environment: DelegationEnvironment,
  config: NativeTokenStreamingBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'NativeTokenStreamingEnforcer'),
  terms: createNativeTokenStreamingTerms(config),
  args: '0x00',
});

/**
 * Builds a caveat for the TokenStreamingEnforcer.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The token and the stream configuration.
 * @returns The Caveat.
 */
export const tokenStreamingBuilder = (
  environment: DelegationEnvironment,
  config: TokenStreamingBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'TokenStreamingEnforcer'),
  terms: createTokenStreamingTerms(config),
  args: '0x00',
});
