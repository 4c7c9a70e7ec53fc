export * from './AllowedCalldataEnforcer';
export * from './AllowedMethodsEnforcer';
export * from './AllowedTargetsEnforcer';
export * from './ArgsEqualityCheckEnforcer';
export * from './BalanceChangeEnforcer';
export * from './BlockNumberEnforcer';
export * from './CaveatEnforcer';
export * from './DelegationManagerClient';
export * from './ExactCalldataBatchEnforcer';
export * from './ExactCalldataEnforcer';
export * from './ExactExecutionBatchEnforcer';
export * from './ExactExecutionEnforcer';
export * from './IdEnforcer';
export * from './LimitedCallsEnforcer';
export * from './LogicalOrWrapperEnforcer';
export * from './MultiTokenPeriodEnforcer';
export * from './NativeBalanceChangeEnforcer';
export * from './NativeTokenPaymentEnforcer';
export * from './NativeTokenPeriodTransferEnforcer';
export * from './NativeTokenStreamingEnforcer';
export * from './NativeTokenTotalBalanceChangeEnforcer';
export * from './NativeTokenTransferAmountEnforcer';
export * from './NoCalldataEnforcer';
export * from './NonceEnforcer';
export * from './PeriodTransferEnforcer';
export * from './RedeemerEnforcer';
export * from './RedeemerLimitedCallsEnforcer';
export * from './SpecificActionTokenTransferBatchEnforcer';
export * from './StreamingEnforcer';
export * from './SwapOfferEnforcer';
export * from './TimestampEnforcer';
export * from './TokenBalanceChangeEnforcer';
export * from './TokenPeriodTransferEnforcer';
export * from './TokenStreamingEnforcer';
export * from './TokenTotalBalanceChangeEnforcer';
export * from './TokenTransferAmountEnforcer';
export * from './TotalBalanceChangeEnforcer';
export * from './ValueLteEnforcer';
