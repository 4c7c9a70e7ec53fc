import {
  createNativeBalanceChangeTerms,
  createTokenBalanceChangeTerms,
  type Caveat,
  type NativeBalanceChangeTerms,
  type TokenBalanceChangeTerms,
} from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const nativeBalanceChange = 'nativeBalanceChange';
export const tokenBalanceChange = 'tokenBalanceChange';
export const nativeTokenTotalBalanceChange = 'nativeTokenTotalBalanceChange';
export const tokenTotalBalanceChange = 'tokenTotalBalanceChange';

export type NativeBalanceChangeBuilderConfig = NativeBalanceChangeTerms;

export type TokenBalanceChangeBuilderConfig = TokenBalanceChangeTerms;

/**
 * Builds a caveat for the NativeBalanceChangeEnforcer, which checks the
 * recipient's balance around a single execution.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The expected change.
 * @returns The Caveat.
 * @throws Error if the change type is invalid.
 */
export const nativeBalanceChangeBuilder = (
  environment: DelegationEnvironment,
  config: NativeBalanceChangeBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'NativeBalanceChangeEnforcer'),
  terms: createNativeBalanceChangeTerms(config),
  args: '0x00',
});

export const tokenBalanceChangeBuilder = (
  environment: DelegationEnvironment,
  config: TokenBalanceChangeBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'TokenBalanceChangeEnforcer'),
  terms: createTokenBalanceChangeTerms(config),
  args: '0x00',
});

/**
 * Builds a caveat for the NativeTokenTotalBalanceChangeEnforcer. Caveats with
 * the same recipient in one redemption are validated together, once, after
 * every execution ran.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The expected change.
 * @returns The Caveat.
 */
export const nativeTokenTotalBalanceChangeBuilder = (
  environment: DelegationEnvironment,
  config: NativeBalanceChangeBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(
    environment,
    'NativeTokenTotalBalanceChangeEnforcer',
  ),
  terms: createNativeBalanceChangeTerms(config),
  args: '0x00',
});

export const tokenTotalBalanceChangeBuilder = (
  environment: DelegationEnvironment,
  config: TokenBalanceChangeBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'TokenTotalBalanceChangeEnforcer'),
  terms: createTokenBalanceChangeTerms(config),
  args: '0x00',
});
