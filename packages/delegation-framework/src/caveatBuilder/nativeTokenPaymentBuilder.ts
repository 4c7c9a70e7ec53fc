import {
  createNativeTokenPaymentTerms,
  encodeDelegations,
  type Address,
  type Caveat,
  type Delegation,
} from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const nativeTokenPayment = 'nativeTokenPayment';

export type NativeTokenPaymentBuilderConfig = {
  /**
   * Who gets paid when the delegation is redeemed.
   */
  recipient: Address;
  amount: bigint;
  /**
   * The allowance chain that pays, leaf first. Usually supplied by the
   * redeemer rather than the delegator, in which case it is left out here
   * and set on the caveat's args before redemption.
   */
  allowanceDelegations?: Delegation[];
};

/**
 * Builds a caveat for the NativeTokenPaymentEnforcer.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The payment recipient and amount.
 * @returns The Caveat.
 */
export const nativeTokenPaymentBuilder = (
  environment: DelegationEnvironment,
  config: NativeTokenPaymentBuilderConfig,
): Caveat => {
  const { recipient, amount, allowanceDelegations } = config;

  return {
    enforcer: getEnforcerAddress(environment, 'NativeTokenPaymentEnforcer'),
    terms: createNativeTokenPaymentTerms({ recipient, amount }),
    args: allowanceDelegations ? encodeDelegations(allowanceDelegations) : '0x',
  };
};
