import type { Caveat } from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { allowedCalldata, allowedCalldataBuilder } from './allowedCalldataBuilder';
import { allowedMethods, allowedMethodsBuilder } from './allowedMethodsBuilder';
import { allowedTargets, allowedTargetsBuilder } from './allowedTargetsBuilder';
import {
  argsEqualityCheck,
  argsEqualityCheckBuilder,
} from './argsEqualityCheckBuilder';
import {
  nativeBalanceChange,
  nativeBalanceChangeBuilder,
  nativeTokenTotalBalanceChange,
  nativeTokenTotalBalanceChangeBuilder,
  tokenBalanceChange,
  tokenBalanceChangeBuilder,
  tokenTotalBalanceChange,
  tokenTotalBalanceChangeBuilder,
} from './balanceChangeBuilder';
import { blockNumber, blockNumberBuilder } from './blockNumberBuilder';
import {
  exactCalldata,
  exactCalldataBatch,
  exactCalldataBatchBuilder,
  exactCalldataBuilder,
} from './exactCalldataBuilder';
import {
  exactExecution,
  exactExecutionBatch,
  exactExecutionBatchBuilder,
  exactExecutionBuilder,
} from './exactExecutionBuilder';
import { id, idBuilder } from './idBuilder';
import {
  limitedCalls,
  limitedCallsBuilder,
  redeemerLimitedCalls,
  redeemerLimitedCallsBuilder,
} from './limitedCallsBuilder';
import {
  logicalOrWrapper,
  logicalOrWrapperBuilder,
} from './logicalOrWrapperBuilder';
import {
  nativeTokenPayment,
  nativeTokenPaymentBuilder,
} from './nativeTokenPaymentBuilder';
import { noCalldata, noCalldataBuilder } from './noCalldataBuilder';
import { nonce, nonceBuilder } from './nonceBuilder';
import {
  multiTokenPeriod,
  multiTokenPeriodBuilder,
  nativeTokenPeriodTransfer,
  nativeTokenPeriodTransferBuilder,
  tokenPeriodTransfer,
  tokenPeriodTransferBuilder,
} from './periodTransferBuilder';
import { redeemer, redeemerBuilder } from './redeemerBuilder';
import {
  specificActionTokenTransferBatch,
  specificActionTokenTransferBatchBuilder,
} from './specificActionTokenTransferBatchBuilder';
import {
  nativeTokenStreaming,
  nativeTokenStreamingBuilder,
  tokenStreaming,
  tokenStreamingBuilder,
} from './streamingBuilder';
import { swapOffer, swapOfferBuilder } from './swapOfferBuilder';
import { timestamp, timestampBuilder } from './timestampBuilder';
import {
  nativeTokenTransferAmount,
  nativeTokenTransferAmountBuilder,
  tokenTransferAmount,
  tokenTransferAmountBuilder,
} from './transferAmountBuilder';
import { valueLte, valueLteBuilder } from './valueLteBuilder';

const caveatBuilders = {
  [allowedCalldata]: allowedCalldataBuilder,
  [allowedMethods]: allowedMethodsBuilder,
  [allowedTargets]: allowedTargetsBuilder,
  [argsEqualityCheck]: argsEqualityCheckBuilder,
  [blockNumber]: blockNumberBuilder,
  [exactCalldata]: exactCalldataBuilder,
  [exactCalldataBatch]: exactCalldataBatchBuilder,
  [exactExecution]: exactExecutionBuilder,
  [exactExecutionBatch]: exactExecutionBatchBuilder,
  [id]: idBuilder,
  [limitedCalls]: limitedCallsBuilder,
  [logicalOrWrapper]: logicalOrWrapperBuilder,
  [multiTokenPeriod]: multiTokenPeriodBuilder,
  [nativeBalanceChange]: nativeBalanceChangeBuilder,
  [nativeTokenPayment]: nativeTokenPaymentBuilder,
  [nativeTokenPeriodTransfer]: nativeTokenPeriodTransferBuilder,
  [nativeTokenStreaming]: nativeTokenStreamingBuilder,
  [nativeTokenTotalBalanceChange]: nativeTokenTotalBalanceChangeBuilder,
  [nativeTokenTransferAmount]: nativeTokenTransferAmountBuilder,
  [noCalldata]: noCalldataBuilder,
  [nonce]: nonceBuilder,
  [redeemer]: redeemerBuilder,
  [redeemerLimitedCalls]: redeemerLimitedCallsBuilder,
  [specificActionTokenTransferBatch]: specificActionTokenTransferBatchBuilder,
  [swapOffer]: swapOfferBuilder,
  [timestamp]: timestampBuilder,
  [tokenBalanceChange]: tokenBalanceChangeBuilder,
  [tokenPeriodTransfer]: tokenPeriodTransferBuilder,
  [tokenStreaming]: tokenStreamingBuilder,
  [tokenTotalBalanceChange]: tokenTotalBalanceChangeBuilder,
  [tokenTransferAmount]: tokenTransferAmountBuilder,
  [valueLte]: valueLteBuilder,
};

export type CaveatName = keyof typeof caveatBuilders;

/**
 * The configuration each named builder takes.
 */
export type CaveatConfigs = {
  [TName in CaveatName]: Parameters<(typeof caveatBuilders)[TName]>[1];
};

/**
 * A caveat described by its builder name and that builder's configuration.
 */
export type CaveatConfiguration = {
  [TName in CaveatName]: { type: TName; config: CaveatConfigs[TName] };
}[CaveatName];

const builders: {
  [TName in CaveatName]: (
    environment: DelegationEnvironment,
    config: CaveatConfigs[TName],
  ) => Caveat;
} = caveatBuilders;

type CaveatWithOptionalArgs = Omit<Caveat, 'args'> & {
  args?: Caveat['args'];
};

const INSECURE_UNRESTRICTED_DELEGATION_ERROR_MESSAGE =
  'No caveats found. If you definitely want to create an empty caveat collection, set `allowInsecureUnrestrictedDelegation` to `true`.';

export type CaveatBuilderConfig = {
  allowInsecureUnrestrictedDelegation?: boolean;
};

/**
 * A builder class for creating and managing caveats.
 */
export class CaveatBuilder {
  #results: Caveat[] = [];

  #hasBeenBuilt = false;

  readonly #environment: DelegationEnvironment;

  readonly #config: CaveatBuilderConfig;

  constructor(
    environment: DelegationEnvironment,
    config: CaveatBuilderConfig = {},
  ) {
    this.#environment = environment;
    this.#config = config;
  }

  /**
   * Adds a caveat directly using a Caveat object.
   *
   * @param caveat - The caveat to add.
   * @returns The CaveatBuilder instance for chaining.
   */
  addCaveat(caveat: CaveatWithOptionalArgs): CaveatBuilder;

  /**
   * Adds a caveat using a named builder.
   *
   * @param name - The name of the builder to use.
   * @param config - The configuration to pass to the builder.
   * @returns The CaveatBuilder instance for chaining.
   */
  addCaveat<TName extends CaveatName>(
    name: TName,
    config: CaveatConfigs[TName],
  ): CaveatBuilder;

  addCaveat<TName extends CaveatName>(
    nameOrCaveat: TName | CaveatWithOptionalArgs,
    config?: CaveatConfigs[TName],
  ): CaveatBuilder {
    if (typeof nameOrCaveat === 'object') {
      const caveat: Caveat = {
        args: '0x00',
        ...nameOrCaveat,
      };

      this.#results = [...this.#results, caveat];

      return this;
    }

    if (!Object.hasOwn(builders, nameOrCaveat)) {
      throw new Error(`Function "${String(nameOrCaveat)}" does not exist.`);
    }

    const result = this.#build(nameOrCaveat, config);
    this.#results = [...this.#results, result];

    return this;
  }

  /**
   * Returns the caveats that have been built using this CaveatBuilder.
   *
   * @returns The array of built caveats.
   * @throws Error if the builder has already been built or if no caveats are found and empty caveats are not allowed.
   */
  build(): Caveat[] {
    if (this.#hasBeenBuilt) {
      throw new Error('This CaveatBuilder has already been built.');
    }

    if (
      this.#results.length === 0 &&
      !this.#config.allowInsecureUnrestrictedDelegation
    ) {
      throw new Error(INSECURE_UNRESTRICTED_DELEGATION_ERROR_MESSAGE);
    }

    this.#hasBeenBuilt = true;

    return this.#results;
  }

  #build<TName extends CaveatName>(
    name: TName,
    config: CaveatConfigs[TName] | undefined,
  ): Caveat {
    if (config === undefined) {
      throw new Error(`Missing configuration for "${name}".`);
    }
    return builders[name](this.#environment, config);
  }
}

/**
 * Creates a caveat builder for every enforcer the environment deploys.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The builder configuration.
 * @returns The CaveatBuilder.
 */
export const createCaveatBuilder = (
  environment: DelegationEnvironment,
  config?: CaveatBuilderConfig,
): CaveatBuilder => new CaveatBuilder(environment, config);
