import type { Hex } from '@metamask/utils';
import type { Address } from 'viem';

export type { Hex } from '@metamask/utils';
export type { Address } from 'viem';

/**
 * Represents a caveat that restricts or conditions a delegation.
 *
 * enforcer - The address of the enforcer that checks this caveat's conditions.
 *
 * terms - The terms of the caveat, fixed when the delegation is signed.
 *
 * args - Arguments supplied by the redeemer at redemption time. They are not
 * covered by the delegation hash.
 */
export type Caveat = {
  enforcer: Address;
  terms: Hex;
  args: Hex;
};

/**
 * Represents a delegation that grants permissions from a delegator to a delegate.
 *
 * delegate - The address of the entity receiving the delegation.
 *
 * delegator - The address of the entity granting the delegation.
 *
 * authority - The authority under which this delegation is granted. For root delegations, this is ROOT_AUTHORITY.
 *
 * caveats - An array of restrictions or conditions applied to this delegation.
 *
 * salt - A unique value distinguishing otherwise identical delegations.
 *
 * signature - The signature validating this delegation.
 */
export type Delegation = {
  delegate: Address;
  delegator: Address;
  authority: Hex;
  caveats: Caveat[];
  salt: bigint;
  signature: Hex;
};

/**
 * A delegation chain, leaf first, or its encoded form.
 */
export type PermissionContext = Delegation[] | Hex;

/**
 * A single unit of work authorized by a delegation.
 */
export type ExecutionStruct = {
  target: Address;
  value: bigint;
  callData: Hex;
};
