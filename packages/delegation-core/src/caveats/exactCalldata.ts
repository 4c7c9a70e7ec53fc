import type { Hex } from '../types';
import { termsSize, type DecodeTermsOptions } from './utils';

export type ExactCalldataTerms = {
  callData: Hex;
};

export function createExactCalldataTerms({ callData }: ExactCalldataTerms): Hex {
  termsSize(callData, 'ExactCalldataEnforcer');
  return callData;
}

export function decodeExactCalldataTerms(
  terms: Hex,
  { enforcerName = 'ExactCalldataEnforcer' }: DecodeTermsOptions = {},
): ExactCalldataTerms {
  termsSize(terms, enforcerName);
  return { callData: terms };
}
