import { concat } from 'viem';

import { InvalidTermsLengthError } from '../errors';
import type { Address, Hex } from '../types';
import {
  assertAddress,
  readAddress,
  termsSize,
  type DecodeTermsOptions,
} from './utils';

export type AllowedTargetsTerms = {
  targets: Address[];
};

export type RedeemerTerms = {
  redeemers: Address[];
};

const encodeAddressList = (addresses: string[], name: string): Hex => {
  if (addresses.length === 0) {
    throw new Error(`Invalid ${name}: must provide at least one address`);
  }
  return concat(addresses.map((address) => assertAddress(address, name)));
};

const decodeAddressList = (terms: Hex, enforcerName: string): Address[] => {
  const length = termsSize(terms, enforcerName);
  if (length === 0 || length % 20 !== 0) {
    throw new InvalidTermsLengthError(enforcerName, {
      details: `Expected a non-zero multiple of 20 bytes, received ${length}`,
    });
  }

  const addresses: Address[] = [];
  for (let offset = 0; offset < length; offset += 20) {
    addresses.push(readAddress(terms, offset));
  }
  return addresses;
};

export function createAllowedTargetsTerms({ targets }: AllowedTargetsTerms): Hex {
  return encodeAddressList(targets, 'targets');
}

export function decodeAllowedTargetsTerms(
  terms: Hex,
  { enforcerName = 'AllowedTargetsEnforcer' }: DecodeTermsOptions = {},
): AllowedTargetsTerms {
  return { targets: decodeAddressList(terms, enforcerName) };
}

export function createRedeemerTerms({ redeemers }: RedeemerTerms): Hex {
  return encodeAddressList(redeemers, 'redeemers');
}

export function decodeRedeemerTerms(
  terms: Hex,
  { enforcerName = 'RedeemerEnforcer' }: DecodeTermsOptions = {},
): RedeemerTerms {
  return { redeemers: decodeAddressList(terms, enforcerName) };
}
