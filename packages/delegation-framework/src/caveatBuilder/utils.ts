import type { Address } from '@caveatkit/delegation-core';

import type { CaveatEnforcerName, DelegationEnvironment } from '../environment';

/**
 * Looks up an enforcer's address in an environment.
 *
 * @param environment - The DelegationEnvironment.
 * @param enforcerName - The name of the enforcer.
 * @returns The enforcer address.
 * @throws Error if the environment does not include the enforcer.
 */
export function getEnforcerAddress(
  environment: DelegationEnvironment,
  enforcerName: CaveatEnforcerName,
): Address {
  const enforcerAddress = environment.caveatEnforcers[enforcerName];
  if (!enforcerAddress) {
    throw new Error(`${enforcerName} not found in environment`);
  }
  return enforcerAddress;
}
