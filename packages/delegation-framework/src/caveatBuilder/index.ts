export {
  CaveatBuilder,
  createCaveatBuilder,
  type CaveatBuilderConfig,
  type CaveatConfigs,
  type CaveatConfiguration,
  type CaveatName,
} from './caveatBuilder';
export { resolveCaveats, type Caveats } from './resolveCaveats';
export { getEnforcerAddress } from './utils';

export type { AllowedCalldataBuilderConfig } from './allowedCalldataBuilder';
export type { AllowedMethodsBuilderConfig } from './allowedMethodsBuilder';
export type { AllowedTargetsBuilderConfig } from './allowedTargetsBuilder';
export type { ArgsEqualityCheckBuilderConfig } from './argsEqualityCheckBuilder';
export type {
  NativeBalanceChangeBuilderConfig,
  TokenBalanceChangeBuilderConfig,
} from './balanceChangeBuilder';
export type { BlockNumberBuilderConfig } from './blockNumberBuilder';
export type {
  ExactCalldataBatchBuilderConfig,
  ExactCalldataBuilderConfig,
} from './exactCalldataBuilder';
export type {
  ExactExecutionBatchBuilderConfig,
  ExactExecutionBuilderConfig,
} from './exactExecutionBuilder';
export type { IdBuilderConfig } from './idBuilder';
export type { LimitedCallsBuilderConfig } from './limitedCallsBuilder';
export type { LogicalOrWrapperBuilderConfig } from './logicalOrWrapperBuilder';
export type { NativeTokenPaymentBuilderConfig } from './nativeTokenPaymentBuilder';
export type { NonceBuilderConfig } from './nonceBuilder';
export type {
  MultiTokenPeriodBuilderConfig,
  NativeTokenPeriodTransferBuilderConfig,
  TokenPeriodTransferBuilderConfig,
} from './periodTransferBuilder';
export type { RedeemerBuilderConfig } from './redeemerBuilder';
export type { SpecificActionTokenTransferBatchBuilderConfig } from './specificActionTokenTransferBatchBuilder';
export type {
  NativeTokenStreamingBuilderConfig,
  TokenStreamingBuilderConfig,
} from './streamingBuilder';
export type { SwapOfferBuilderConfig } from './swapOfferBuilder';
export type { TimestampBuilderConfig } from './timestampBuilder';
export type {
  NativeTokenTransferAmountBuilderConfig,
  TokenTransferAmountBuilderConfig,
} from './transferAmountBuilder';
export type { ValueLteBuilderConfig } from './valueLteBuilder';
