import {
  decodeMultiTokenPeriodTerms,
  decodeSingleExecution,
  isNativeTokenConfig,
  type Address,
  type Hex,
  type MultiTokenPeriodTerms,
  type TokenPeriodTransferTerms,
} from '@caveatkit/delegation-core';
import { hexToBigInt, size } from 'viem';

import type { HookParams } from './CaveatEnforcer';
import {
  PeriodTransferEnforcer,
  type PeriodTransferResult,
} from './PeriodTransferEnforcer';

/**
 * A periodic allowance per token. The redeemer picks the token configuration
 * with a 32 byte index in the caveat args.
 */
export class MultiTokenPeriodEnforcer extends PeriodTransferEnforcer<MultiTokenPeriodTerms> {
  readonly name = 'MultiTokenPeriodEnforcer';

  getAvailableAmount({
    delegationHash,
    delegationManager,
    terms,
    args,
  }: {
    delegationHash: Hex;
    delegationManager: Address;
    terms: Hex;
    args: Hex;
  }): PeriodTransferResult {
    const config = this.#selectConfig(terms, args);
    return this.availableInPeriod(
      [delegationManager, delegationHash, config.tokenAddress],
      config,
    );
  }

  override beforeHook({
    caller,
    terms,
    args,
    mode,
    executionCallData,
    delegationHash,
    redeemer,
  }: HookParams): void {
    this.onlySingleCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    const config = this.#selectConfig(terms, args);
    const execution = decodeSingleExecution(executionCallData);

    let amount: bigint;
    if (isNativeTokenConfig(config)) {
      if (execution.callData !== '0x') {
        throw this.violation('invalid-execution-length', 'InvalidCalldata');
      }
      amount = execution.value;
    } else {
      amount = this.decodeTokenTransfer(execution, config.tokenAddress).amount;
    }

    this.consumeInPeriod({
      key: [caller, delegationHash, config.tokenAddress],
      period: config,
      amount,
      token: config.tokenAddress,
      caller,
      redeemer,
      delegationHash,
    });
  }

  getTermsInfo(terms: Hex): MultiTokenPeriodTerms {
    return decodeMultiTokenPeriodTerms(terms, { enforcerName: this.name });
  }

  #selectConfig(terms: Hex, args: Hex): TokenPeriodTransferTerms {
    const { tokenConfigs } = this.getTermsInfo(terms);

    if (size(args) !== 32) {
      throw this.violation('invalid-args-length', 'InvalidArgs');
    }

    const index = hexToBigInt(args);
    const config =
      index < BigInt(tokenConfigs.length) ? tokenConfigs[Number(index)] : undefined;
    if (!config) {
      throw this.violation('invalid-token-index', 'InvalidArgs');
    }
    return config;
  }
}
