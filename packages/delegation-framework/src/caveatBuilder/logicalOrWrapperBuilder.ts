import {
  createLogicalOrWrapperArgs,
  createLogicalOrWrapperTerms,
  type Caveat,
  type CaveatGroup,
} from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const logicalOrWrapper = 'logicalOrWrapper';

export type LogicalOrWrapperBuilderConfig = {
  /**
   * Alternative caveat groups. A redemption satisfies the caveat when every
   * caveat of the selected group passes.
   */
  groups: CaveatGroup[];
  /**
   * The group preselected in the caveat's args. Defaults to the first group,
   * with each inner caveat's own args.
   */
  groupIndex?: number;
};

/**
 * Builds a caveat for the LogicalOrWrapperEnforcer.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The caveat groups.
 * @returns The Caveat.
 * @throws Error if there are no groups, or the selected group does not exist.
 */
export const logicalOrWrapperBuilder = (
  environment: DelegationEnvironment,
  config: LogicalOrWrapperBuilderConfig,
): Caveat => {
  const { groups, groupIndex = 0 } = config;

  if (groups.length === 0) {
    throw new Error('Invalid groups: must provide at least one caveat group');
  }

  const selected = groups[groupIndex];
  if (!selected) {
    throw new Error(`Invalid groupIndex: ${groupIndex} does not select a group`);
  }

  return {
    enforcer: getEnforcerAddress(environment, 'LogicalOrWrapperEnforcer'),
    terms: createLogicalOrWrapperTerms({ groups }),
    args: createLogicalOrWrapperArgs({
      groupIndex: BigInt(groupIndex),
      caveatArgs: selected.caveats.map(({ args }) => args),
    }),
  };
};
