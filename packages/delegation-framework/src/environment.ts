import type { Address } from '@caveatkit/delegation-core';
import { getAddress, keccak256, slice, toHex } from 'viem';

import { CaveatBuilder } from './caveatBuilder/caveatBuilder';
import { loadConfig, type FrameworkConfig } from './config';
import { DelegationManager } from './DelegationFramework/DelegationManager';
import {
  AllowedCalldataEnforcer,
  AllowedMethodsEnforcer,
  AllowedTargetsEnforcer,
  ArgsEqualityCheckEnforcer,
  BlockNumberEnforcer,
  ExactCalldataBatchEnforcer,
  ExactCalldataEnforcer,
  ExactExecutionBatchEnforcer,
  ExactExecutionEnforcer,
  IdEnforcer,
  LimitedCallsEnforcer,
  LogicalOrWrapperEnforcer,
  MultiTokenPeriodEnforcer,
  NativeBalanceChangeEnforcer,
  NativeTokenPaymentEnforcer,
  NativeTokenPeriodTransferEnforcer,
  NativeTokenStreamingEnforcer,
  NativeTokenTotalBalanceChangeEnforcer,
  NativeTokenTransferAmountEnforcer,
  NoCalldataEnforcer,
  NonceEnforcer,
  RedeemerEnforcer,
  RedeemerLimitedCallsEnforcer,
  SpecificActionTokenTransferBatchEnforcer,
  SwapOfferEnforcer,
  TimestampEnforcer,
  TokenBalanceChangeEnforcer,
  TokenPeriodTransferEnforcer,
  TokenStreamingEnforcer,
  TokenTotalBalanceChangeEnforcer,
  TokenTransferAmountEnforcer,
  ValueLteEnforcer,
} from './DelegationFramework/enforcers';
import { getLogger, type Logger } from './logger';
import { ManualClock, SystemClock, type Clock } from './runtime/clock';
import { ExecutionRuntime } from './runtime/ExecutionRuntime';
import type { SignatureVerifier } from './runtime/SignatureVerifier';

export type CaveatEnforcers = {
  AllowedCalldataEnforcer: AllowedCalldataEnforcer;
  AllowedMethodsEnforcer: AllowedMethodsEnforcer;
  AllowedTargetsEnforcer: AllowedTargetsEnforcer;
  ArgsEqualityCheckEnforcer: ArgsEqualityCheckEnforcer;
  BlockNumberEnforcer: BlockNumberEnforcer;
  ExactCalldataBatchEnforcer: ExactCalldataBatchEnforcer;
  ExactCalldataEnforcer: ExactCalldataEnforcer;
  ExactExecutionBatchEnforcer: ExactExecutionBatchEnforcer;
  ExactExecutionEnforcer: ExactExecutionEnforcer;
  IdEnforcer: IdEnforcer;
  LimitedCallsEnforcer: LimitedCallsEnforcer;
  LogicalOrWrapperEnforcer: LogicalOrWrapperEnforcer;
  MultiTokenPeriodEnforcer: MultiTokenPeriodEnforcer;
  NativeBalanceChangeEnforcer: NativeBalanceChangeEnforcer;
  NativeTokenPaymentEnforcer: NativeTokenPaymentEnforcer;
  NativeTokenPeriodTransferEnforcer: NativeTokenPeriodTransferEnforcer;
  NativeTokenStreamingEnforcer: NativeTokenStreamingEnforcer;
  NativeTokenTotalBalanceChangeEnforcer: NativeTokenTotalBalanceChangeEnforcer;
  NativeTokenTransferAmountEnforcer: NativeTokenTransferAmountEnforcer;
  NoCalldataEnforcer: NoCalldataEnforcer;
  NonceEnforcer: NonceEnforcer;
  RedeemerEnforcer: RedeemerEnforcer;
  RedeemerLimitedCallsEnforcer: RedeemerLimitedCallsEnforcer;
  SpecificActionTokenTransferBatchEnforcer: SpecificActionTokenTransferBatchEnforcer;
  SwapOfferEnforcer: SwapOfferEnforcer;
  TimestampEnforcer: TimestampEnforcer;
  TokenBalanceChangeEnforcer: TokenBalanceChangeEnforcer;
  TokenPeriodTransferEnforcer: TokenPeriodTransferEnforcer;
  TokenStreamingEnforcer: TokenStreamingEnforcer;
  TokenTotalBalanceChangeEnforcer: TokenTotalBalanceChangeEnforcer;
  TokenTransferAmountEnforcer: TokenTransferAmountEnforcer;
  ValueLteEnforcer: ValueLteEnforcer;
};

export type CaveatEnforcerName = keyof CaveatEnforcers;

/**
 * The addresses of a deployed delegation framework.
 */
export type DelegationEnvironment = {
  DelegationManager: Address;
  caveatEnforcers: { [Name in CaveatEnforcerName]?: Address };
};

export type DelegationFramework = {
  runtime: ExecutionRuntime;
  environment: DelegationEnvironment;
  manager: DelegationManager;
  enforcers: CaveatEnforcers;
  config: FrameworkConfig;
  /**
   * Creates a caveat builder for this framework's environment, honouring
   * `config.allowInsecureUnrestrictedDelegation`.
   */
  createCaveatBuilder(): CaveatBuilder;
};

/**
 * The address a framework contract is deployed at. Every runtime uses the
 * same addresses, so delegations can be created before deployment.
 *
 * @param name - The name of the contract.
 * @returns The address.
 */
export const getContractAddress = (name: string): Address =>
  getAddress(slice(keccak256(toHex(`caveatkit:${name}`)), 12));

/**
 * Deploys the delegation manager and every caveat enforcer into a runtime.
 *
 * @param runtime - The runtime to deploy into.
 * @param options - Deployment options.
 * @param options.signatureVerifier - Overrides how the manager checks delegation signatures.
 * @returns The deployed contracts and their addresses.
 */
export function deployDelegationFramework(
  runtime: ExecutionRuntime,
  { signatureVerifier }: { signatureVerifier?: SignatureVerifier } = {},
): Pick<DelegationFramework, 'environment' | 'manager' | 'enforcers'> {
  const delegationManager = getContractAddress('DelegationManager');
  const manager = runtime.deploy(
    new DelegationManager({
      runtime,
      address: delegationManager,
      signatureVerifier,
    }),
  );

  const caveatEnforcers: DelegationEnvironment['caveatEnforcers'] = {};
  const at = (name: CaveatEnforcerName) => {
    const address = getContractAddress(name);
    caveatEnforcers[name] = address;
    return { runtime, address };
  };

  const enforcers: CaveatEnforcers = {
    AllowedCalldataEnforcer: new AllowedCalldataEnforcer(at('AllowedCalldataEnforcer')),
    AllowedMethodsEnforcer: new AllowedMethodsEnforcer(at('AllowedMethodsEnforcer')),
    AllowedTargetsEnforcer: new AllowedTargetsEnforcer(at('AllowedTargetsEnforcer')),
    ArgsEqualityCheckEnforcer: new ArgsEqualityCheckEnforcer(at('ArgsEqualityCheckEnforcer')),
    BlockNumberEnforcer: new BlockNumberEnforcer(at('BlockNumberEnforcer')),
    ExactCalldataBatchEnforcer: new ExactCalldataBatchEnforcer(at('ExactCalldataBatchEnforcer')),
    ExactCalldataEnforcer: new ExactCalldataEnforcer(at('ExactCalldataEnforcer')),
    ExactExecutionBatchEnforcer: new ExactExecutionBatchEnforcer(at('ExactExecutionBatchEnforcer')),
    ExactExecutionEnforcer: new ExactExecutionEnforcer(at('ExactExecutionEnforcer')),
    IdEnforcer: new IdEnforcer(at('IdEnforcer')),
    LimitedCallsEnforcer: new LimitedCallsEnforcer(at('LimitedCallsEnforcer')),
    LogicalOrWrapperEnforcer: new LogicalOrWrapperEnforcer({
      ...at('LogicalOrWrapperEnforcer'),
      delegationManager,
    }),
    MultiTokenPeriodEnforcer: new MultiTokenPeriodEnforcer(at('MultiTokenPeriodEnforcer')),
    NativeBalanceChangeEnforcer: new NativeBalanceChangeEnforcer(at('NativeBalanceChangeEnforcer')),
    NativeTokenPaymentEnforcer: new NativeTokenPaymentEnforcer({
      ...at('NativeTokenPaymentEnforcer'),
      delegationManager,
      argsEqualityCheckEnforcer: getContractAddress('ArgsEqualityCheckEnforcer'),
    }),
    NativeTokenPeriodTransferEnforcer: new NativeTokenPeriodTransferEnforcer(
      at('NativeTokenPeriodTransferEnforcer'),
    ),
    NativeTokenStreamingEnforcer: new NativeTokenStreamingEnforcer(
      at('NativeTokenStreamingEnforcer'),
    ),
    NativeTokenTotalBalanceChangeEnforcer: new NativeTokenTotalBalanceChangeEnforcer(
      at('NativeTokenTotalBalanceChangeEnforcer'),
    ),
    NativeTokenTransferAmountEnforcer: new NativeTokenTransferAmountEnforcer(
      at('NativeTokenTransferAmountEnforcer'),
    ),
    NoCalldataEnforcer: new NoCalldataEnforcer(at('NoCalldataEnforcer')),
    NonceEnforcer: new NonceEnforcer(at('NonceEnforcer')),
    RedeemerEnforcer: new RedeemerEnforcer(at('RedeemerEnforcer')),
    RedeemerLimitedCallsEnforcer: new RedeemerLimitedCallsEnforcer(
      at('RedeemerLimitedCallsEnforcer'),
    ),
    SpecificActionTokenTransferBatchEnforcer: new SpecificActionTokenTransferBatchEnforcer(
      at('SpecificActionTokenTransferBatchEnforcer'),
    ),
    SwapOfferEnforcer: new SwapOfferEnforcer({
      ...at('SwapOfferEnforcer'),
      delegationManager,
    }),
    TimestampEnforcer: new TimestampEnforcer(at('TimestampEnforcer')),
    TokenBalanceChangeEnforcer: new TokenBalanceChangeEnforcer(at('TokenBalanceChangeEnforcer')),
    TokenPeriodTransferEnforcer: new TokenPeriodTransferEnforcer(at('TokenPeriodTransferEnforcer')),
    TokenStreamingEnforcer: new TokenStreamingEnforcer(at('TokenStreamingEnforcer')),
    TokenTotalBalanceChangeEnforcer: new TokenTotalBalanceChangeEnforcer(
      at('TokenTotalBalanceChangeEnforcer'),
    ),
    TokenTransferAmountEnforcer: new TokenTransferAmountEnforcer(at('TokenTransferAmountEnforcer')),
    ValueLteEnforcer: new ValueLteEnforcer(at('ValueLteEnforcer')),
  };

  for (const enforcer of Object.values(enforcers)) {
    runtime.deploy(enforcer);
  }

  getLogger('environment').debug(
    { delegationManager, enforcers: Object.keys(caveatEnforcers).length },
    'delegation framework deployed',
  );

  return {
    environment: { DelegationManager: delegationManager, caveatEnforcers },
    manager,
    enforcers,
  };
}

/**
 * Creates a runtime from configuration and deploys the framework into it.
 *
 * @param config - The configuration, read from the environment by default.
 * @param options - Creation options.
 * @param options.signatureVerifier - Overrides how the manager checks delegation signatures.
 * @param options.logger - The logger whose level is set from the configuration.
 * @returns The deployed framework.
 */
export function createDelegationFramework(
  config: FrameworkConfig = loadConfig(),
  { signatureVerifier, logger = getLogger() }: {
    signatureVerifier?: SignatureVerifier;
    logger?: Logger;
  } = {},
): DelegationFramework {
  logger.level = config.logLevel;

  const runtime = new ExecutionRuntime({ clock: createClock(config) });
  const deployed = deployDelegationFramework(runtime, { signatureVerifier });

  return {
    runtime,
    config,
    ...deployed,
    createCaveatBuilder: () =>
      new CaveatBuilder(deployed.environment, {
        allowInsecureUnrestrictedDelegation:
          config.allowInsecureUnrestrictedDelegation,
      }),
  };
}

const createClock = ({ startTimestamp, startBlock }: FrameworkConfig): Clock =>
  startTimestamp === undefined && startBlock === undefined
    ? new SystemClock()
    : new ManualClock({ timestamp: startTimestamp, blockNumber: startBlock });
