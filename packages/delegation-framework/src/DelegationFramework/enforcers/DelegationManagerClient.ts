import { ExecutionError, type Address } from '@caveatkit/delegation-core';

import type { ExecutionRuntime } from '../../runtime/ExecutionRuntime';
import { DelegationManager } from '../DelegationManager';

/**
 * Resolves the delegation manager an enforcer redeems nested delegations
 * through.
 *
 * @param runtime - The runtime the manager is deployed in.
 * @param address - The manager's address.
 * @param component - The component reported if the manager is missing.
 * @returns The manager.
 */
export function getDelegationManager(
  runtime: ExecutionRuntime,
  address: Address,
  component: string,
): DelegationManager {
  const contract = runtime.getContract(address);
  if (!(contract instanceof DelegationManager)) {
    throw new ExecutionError(component, 'UnknownContract', {
      details: `No delegation manager deployed at ${address}`,
    });
  }
  return contract;
}
