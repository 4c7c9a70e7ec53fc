import { concat } from 'viem';

import type { Address, Hex } from '../types';
import {
  assertAddress,
  assertTermsLength,
  encodeUint,
  readAddress,
  readUint,
  type DecodeTermsOptions,
} from './utils';

export type TokenTransferAmountTerms = {
  tokenAddress: Address;
  maxAmount: bigint;
};

export const TOKEN_TRANSFER_AMOUNT_TERMS_LENGTH = 52;

export function createTokenTransferAmountTerms({
  tokenAddress,
  maxAmount,
}: TokenTransferAmountTerms): Hex {
  return concat([
    assertAddress(tokenAddress, 'tokenAddress'),
    encodeUint(maxAmount, 'maxAmount'),
  ]);
}

export function decodeTokenTransferAmountTerms(
  terms: Hex,
  { enforcerName = 'TokenTransferAmountEnforcer' }: DecodeTermsOptions = {},
): TokenTransferAmountTerms {
  assertTermsLength(terms, TOKEN_TRANSFER_AMOUNT_TERMS_LENGTH, enforcerName);

  return {
    tokenAddress: readAddress(terms, 0),
    maxAmount: readUint(terms, 20),
  };
}
