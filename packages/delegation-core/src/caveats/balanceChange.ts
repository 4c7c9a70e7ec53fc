import { concat, hexToNumber, slice } from 'viem';

import type { Address, Hex } from '../types';
import {
  assertAddress,
  assertTermsLength,
  encodeUint,
  readAddress,
  readUint,
  type DecodeTermsOptions,
} from './utils';

export enum BalanceChangeType {
  Increase = 0x0,
  Decrease = 0x1,
}

export type NativeBalanceChangeTerms = {
  changeType: BalanceChangeType;
  recipient: Address;
  /**
   * The minimum increase, or the maximum decrease, of the recipient's balance.
   */
  balance: bigint;
};

export type TokenBalanceChangeTerms = NativeBalanceChangeTerms & {
  tokenAddress: Address;
};

export const NATIVE_BALANCE_CHANGE_TERMS_LENGTH = 53;

export const TOKEN_BALANCE_CHANGE_TERMS_LENGTH = 73;

const encodeChangeType = (changeType: BalanceChangeType): Hex => {
  if (
    changeType !== BalanceChangeType.Increase &&
    changeType !== BalanceChangeType.Decrease
  ) {
    throw new Error('Invalid changeType: must be either Increase or Decrease');
  }
  return encodeUint(BigInt(changeType), 'changeType', 1);
};

const readChangeType = (terms: Hex): BalanceChangeType =>
  // any non-zero flag enforces a bounded decrease
  hexToNumber(slice(terms, 0, 1)) === 0
    ? BalanceChangeType.Increase
    : BalanceChangeType.Decrease;

/**
 * Creates terms shared by the native balance change enforcers:
 * `changeType(1) ‖ recipient(20) ‖ balance(32)`.
 *
 * @param terms - The expected balance change.
 * @returns The encoded terms.
 */
export function createNativeBalanceChangeTerms(
  terms: NativeBalanceChangeTerms,
): Hex {
  return concat([
    encodeChangeType(terms.changeType),
    assertAddress(terms.recipient, 'recipient'),
    encodeUint(terms.balance, 'balance'),
  ]);
}

export function decodeNativeBalanceChangeTerms(
  terms: Hex,
  { enforcerName = 'NativeBalanceChangeEnforcer' }: DecodeTermsOptions = {},
): NativeBalanceChangeTerms {
  assertTermsLength(terms, NATIVE_BALANCE_CHANGE_TERMS_LENGTH, enforcerName);

  return {
    changeType: readChangeType(terms),
    recipient: readAddress(terms, 1),
    balance: readUint(terms, 21),
  };
}

/**
 * Creates terms shared by the token balance change enforcers:
 * `changeType(1) ‖ token(20) ‖ recipient(20) ‖ balance(32)`.
 *
 * @param terms - The expected balance change.
 * @returns The encoded terms.
 */
export function createTokenBalanceChangeTerms(
  terms: TokenBalanceChangeTerms,
): Hex {
  return concat([
    encodeChangeType(terms.changeType),
    assertAddress(terms.tokenAddress, 'tokenAddress'),
    assertAddress(terms.recipient, 'recipient'),
    encodeUint(terms.balance, 'balance'),
  ]);
}

export function decodeTokenBalanceChangeTerms(
  terms: Hex,
  { enforcerName = 'TokenBalanceChangeEnforcer' }: DecodeTermsOptions = {},
): TokenBalanceChangeTerms {
  assertTermsLength(terms, TOKEN_BALANCE_CHANGE_TERMS_LENGTH, enforcerName);

  return {
    changeType: readChangeType(terms),
    tokenAddress: readAddress(terms, 1),
    recipient: readAddress(terms, 21),
    balance: readUint(terms, 41),
  };
}
