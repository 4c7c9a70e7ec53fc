import { concat, isHex } from 'viem';

import { InvalidTermsLengthError } from '../errors';
import type { Address, Hex } from '../types';
import {
  assertAddress,
  encodeUint,
  readAddress,
  readBytes,
  readUint,
  termsSize,
  type DecodeTermsOptions,
} from './utils';

export type SpecificActionTokenTransferBatchTerms = {
  tokenAddress: Address;
  recipient: Address;
  amount: bigint;
  /**
   * The target of the first call in the batch.
   */
  target: Address;
  /**
   * The exact calldata of the first call in the batch.
   */
  callData: Hex;
};

export const SPECIFIC_ACTION_MIN_TERMS_LENGTH = 92;

export function createSpecificActionTokenTransferBatchTerms(
  terms: SpecificActionTokenTransferBatchTerms,
): Hex {
  if (!isHex(terms.callData, { strict: true })) {
    throw new Error('Invalid callData: must be a valid hex string');
  }

  return concat([
    assertAddress(terms.tokenAddress, 'tokenAddress'),
    assertAddress(terms.recipient, 'recipient'),
    encodeUint(terms.amount, 'amount'),
    assertAddress(terms.target, 'target'),
    terms.callData,
  ]);
}

export function decodeSpecificActionTokenTransferBatchTerms(
  terms: Hex,
  {
    enforcerName = 'SpecificActionTokenTransferBatchEnforcer',
  }: DecodeTermsOptions = {},
): SpecificActionTokenTransferBatchTerms {
  const length = termsSize(terms, enforcerName);
  if (length < SPECIFIC_ACTION_MIN_TERMS_LENGTH) {
    throw new InvalidTermsLengthError(enforcerName, {
      details: `Expected at least ${SPECIFIC_ACTION_MIN_TERMS_LENGTH} bytes, received ${length}`,
    });
  }

  return {
    tokenAddress: readAddress(terms, 0),
    recipient: readAddress(terms, 20),
    amount: readUint(terms, 40),
    target: readAddress(terms, 72),
    callData: readBytes(terms, 92),
  };
}
