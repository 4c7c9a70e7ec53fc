import {
  ANY_BENEFICIARY,
  ROOT_AUTHORITY,
  hashDelegation,
  type Address,
  type Delegation,
  type Hex,
} from '@caveatkit/delegation-core';

import {
  resolveCaveats,
  type CaveatBuilderConfig,
  type Caveats,
} from './caveatBuilder';
import type { DelegationEnvironment } from './environment';
import type { DelegationSigner } from './runtime';

/**
 * Gets a delegation hash offchain.
 *
 * @param input - The delegation to get the hash for.
 * @returns The hash of the delegation parameters.
 */
export const getDelegationHashOffchain = (input: Delegation): Hex =>
  hashDelegation(input);

type BaseCreateDelegationOptions = CaveatBuilderConfig & {
  environment: DelegationEnvironment;
  from: Address;
  caveats: Caveats;
  parentDelegation?: Delegation | Hex;
  salt?: bigint;
};

/**
 * Options for creating a specific delegation
 */
export type CreateDelegationOptions = BaseCreateDelegationOptions & {
  to: Address;
};

/**
 * Options for creating an open delegation
 */
export type CreateOpenDelegationOptions = BaseCreateDelegationOptions;

/**
 * Resolves the authority for a delegation based on the parent delegation.
 *
 * @param parentDelegation - The parent delegation or its hash.
 * @returns The resolved authority hash.
 */
export const resolveAuthority = (parentDelegation?: Delegation | Hex): Hex => {
  if (!parentDelegation) {
    return ROOT_AUTHORITY;
  }

  if (typeof parentDelegation === 'string') {
    return parentDelegation;
  }

  return getDelegationHashOffchain(parentDelegation);
};

const toCaveats = ({
  environment,
  caveats,
  allowInsecureUnrestrictedDelegation,
}: BaseCreateDelegationOptions) =>
  resolveCaveats({
    environment,
    caveats,
    config: { allowInsecureUnrestrictedDelegation },
  });

/**
 * Creates a delegation with specific delegate.
 *
 * @param options - The options for creating the delegation.
 * @returns The created, unsigned delegation.
 */
export const createDelegation = (
  options: CreateDelegationOptions,
): Delegation => ({
  delegate: options.to,
  delegator: options.from,
  authority: resolveAuthority(options.parentDelegation),
  caveats: toCaveats(options),
  salt: options.salt ?? 0n,
  signature: '0x',
});

/**
 * Creates an open delegation that can be redeemed by any delegate.
 *
 * @param options - The options for creating the open delegation.
 * @returns The created, unsigned delegation.
 */
export const createOpenDelegation = (
  options: CreateOpenDelegationOptions,
): Delegation => ({
  delegate: ANY_BENEFICIARY,
  delegator: options.from,
  authority: resolveAuthority(options.parentDelegation),
  caveats: toCaveats(options),
  salt: options.salt ?? 0n,
  signature: '0x',
});

/**
 * Signs a delegation with the delegator's signer.
 *
 * @param params - The parameters for signing the delegation.
 * @param params.signer - The delegator's signer.
 * @param params.delegation - The delegation to sign.
 * @param params.allowInsecureUnrestrictedDelegation - Whether to allow signing a delegation without caveats.
 * @returns The signature.
 * @throws Error if the delegation has no caveats and unrestricted delegations are not allowed.
 */
export const signDelegation = ({
  signer,
  delegation,
  allowInsecureUnrestrictedDelegation = false,
}: {
  signer: Pick<DelegationSigner, 'sign'>;
  delegation: Omit<Delegation, 'signature'>;
  allowInsecureUnrestrictedDelegation?: boolean;
}): Hex => {
  if (
    delegation.caveats.length === 0 &&
    !allowInsecureUnrestrictedDelegation
  ) {
    throw new Error(
      'No caveats found. If you definitely want to sign a delegation without caveats, set `allowInsecureUnrestrictedDelegation` to `true`.',
    );
  }

  return signer.sign(hashDelegation({ ...delegation, signature: '0x' }));
};
