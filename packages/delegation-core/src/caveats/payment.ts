import { concat } from 'viem';

import type { Address, Hex } from '../types';
import {
  assertAddress,
  assertPositive,
  assertTermsLength,
  encodeUint,
  readAddress,
  readUint,
  type DecodeTermsOptions,
} from './utils';

export type NativeTokenPaymentTerms = {
  recipient: Address;
  amount: bigint;
};

export const NATIVE_TOKEN_PAYMENT_TERMS_LENGTH = 52;

export function createNativeTokenPaymentTerms({
  recipient,
  amount,
}: NativeTokenPaymentTerms): Hex {
  assertPositive(amount, 'amount');
  return concat([
    assertAddress(recipient, 'recipient'),
    encodeUint(amount, 'amount'),
  ]);
}

export function decodeNativeTokenPaymentTerms(
  terms: Hex,
  { enforcerName = 'NativeTokenPaymentEnforcer' }: DecodeTermsOptions = {},
): NativeTokenPaymentTerms {
  assertTermsLength(terms, NATIVE_TOKEN_PAYMENT_TERMS_LENGTH, enforcerName);

  return {
    recipient: readAddress(terms, 0),
    amount: readUint(terms, 20),
  };
}

/**
 * Args for an ArgsEqualityCheckEnforcer guarding an allowance delegation that
 * is spent by a payment: the paid-for delegation hash and its redeemer.
 *
 * @param delegationHash - The hash of the delegation being paid for.
 * @param redeemer - The redeemer of that delegation.
 * @returns The packed args.
 */
export function createPaymentArgsEqualityTerms(
  delegationHash: Hex,
  redeemer: Address,
): Hex {
  return concat([delegationHash, redeemer]);
}
