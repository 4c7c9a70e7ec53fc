import { maxUint128, maxUint256, toFunctionSelector, zeroAddress } from 'viem';

import type { Address, Hex } from './types';

/**
 * The authority of a delegation that is not derived from another delegation.
 */
export const ROOT_AUTHORITY: Hex =
  '0xffffffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff';

/**
 * Delegate value for open delegations, which may be redeemed by anyone.
 */
export const ANY_BENEFICIARY: Address =
  '0x0000000000000000000000000000000000000a11';

/**
 * The asset identifier of the native token in the ledger.
 */
export const NATIVE_TOKEN_ADDRESS: Address = zeroAddress;

export const TRANSFER_SELECTOR: Hex = toFunctionSelector(
  'transfer(address,uint256)',
);

export const MAX_UINT128 = maxUint128;

export const MAX_UINT256 = maxUint256;
