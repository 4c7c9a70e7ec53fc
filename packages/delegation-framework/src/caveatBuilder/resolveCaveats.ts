import type { Caveat } from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import {
  CaveatBuilder,
  type CaveatBuilderConfig,
  type CaveatConfiguration,
} from './caveatBuilder';

export type Caveats = CaveatBuilder | (Caveat | CaveatConfiguration)[];

/**
 * Resolves the array of Caveat from a Caveats argument.
 *
 * @param options - The options object.
 * @param options.environment - The environment to build named caveats against.
 * @param options.caveats - A CaveatBuilder, or an array of Caveat and CaveatConfiguration.
 * @param options.config - The builder configuration used for an array of caveats.
 * @returns The resolved array of caveats.
 */
export const resolveCaveats = ({
  environment,
  caveats,
  config,
}: {
  environment: DelegationEnvironment;
  caveats: Caveats;
  config?: CaveatBuilderConfig;
}): Caveat[] => {
  if (caveats instanceof CaveatBuilder) {
    return caveats.build();
  }

  const builder = new CaveatBuilder(environment, config);

  caveats.forEach((caveat) => {
    try {
      if ('type' in caveat) {
        builder.addCaveat(caveat.type, caveat.config);
      } else {
        builder.addCaveat(caveat);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid caveat: ${message}`);
    }
  });

  return builder.build();
};
