import {
  CallType,
  ExecutionMode,
  ROOT_AUTHORITY,
  decodeExecutionMode,
  encodeBatchExecution,
  encodeSingleExecution,
  hashDelegation,
  type Address,
  type Caveat,
  type Delegation,
  type ExecutionStruct,
  type Hex,
} from '@caveatkit/delegation-core';
import {
  concat,
  decodeFunctionData,
  encodeFunctionResult,
  keccak256,
  parseAbi,
  toHex,
} from 'viem';

import { deployDelegationFramework, getContractAddress } from '../src/environment';
import type { HookParams } from '../src/DelegationFramework/enforcers/CaveatEnforcer';
import { ManualClock } from '../src/runtime/clock';
import {
  DelegatorAccount,
  type DelegationSigner,
} from '../src/runtime/DelegatorAccount';
import {
  ExecutionRuntime,
  type CallContext,
  type Contract,
} from '../src/runtime/ExecutionRuntime';
import type { StateStore } from '../src/runtime/StateJournal';

/**
 * A keyed hash standing in for a private key signature.
 *
 * @param secret - The signer's secret.
 * @returns The signer.
 */
export const createTestSigner = (secret: string): DelegationSigner => {
  const sign = (hash: Hex): Hex => keccak256(concat([toHex(secret), hash]));
  return {
    sign,
    verify: (hash, signature) => signature.toLowerCase() === sign(hash),
  };
};

export const createTestFramework = ({
  timestamp = 1_000n,
  blockNumber = 100n,
}: { timestamp?: bigint; blockNumber?: bigint } = {}) => {
  const clock = new ManualClock({ timestamp, blockNumber });
  const runtime = new ExecutionRuntime({ clock });
  return { clock, runtime, ...deployDelegationFramework(runtime) };
};

export type TestFramework = ReturnType<typeof createTestFramework>;

export const createAccount = (
  { runtime, environment }: Pick<TestFramework, 'runtime' | 'environment'>,
  name: string,
): DelegatorAccount =>
  runtime.deploy(
    new DelegatorAccount({
      runtime,
      address: getContractAddress(`account:${name}`),
      signer: createTestSigner(`test-secret-${name}`),
      delegationManager: environment.DelegationManager,
    }),
  );

/**
 * Creates a delegation from `from` and signs it with `from`'s signer.
 *
 * @param options - The delegation to create.
 * @param options.from - The delegator.
 * @param options.to - The delegate.
 * @param options.caveats - The caveats of the delegation.
 * @param options.parent - The parent delegation, if any.
 * @param options.salt - The salt.
 * @returns The signed delegation.
 */
export const createSignedDelegation = ({
  from,
  to,
  caveats = [],
  parent,
  salt = 0n,
}: {
  from: DelegatorAccount;
  to: Address;
  caveats?: Caveat[];
  parent?: Delegation;
  salt?: bigint;
}): Delegation => {
  const delegation: Delegation = {
    delegate: to,
    delegator: from.address,
    authority: parent ? hashDelegation(parent) : ROOT_AUTHORITY,
    caveats,
    salt,
    signature: '0x',
  };
  return { ...delegation, signature: from.signDelegation(delegation) };
};

/**
 * Encodes executions for a mode: packed for a single call type, ABI encoded
 * for a batch.
 *
 * @param mode - The execution mode.
 * @param executions - The executions.
 * @returns The execution calldata.
 */
export const encodeForMode = (
  mode: ExecutionMode,
  executions: ExecutionStruct[],
): Hex => {
  if (decodeExecutionMode(mode).callType === CallType.Batch) {
    return encodeBatchExecution(executions);
  }
  const [execution] = executions;
  if (!execution || executions.length > 1) {
    throw new Error('A single call type mode takes exactly one execution');
  }
  return encodeSingleExecution(execution);
};

export const defaultModeFor = (executions: ExecutionStruct[]): ExecutionMode =>
  executions.length === 1 ? ExecutionMode.SingleDefault : ExecutionMode.BatchDefault;

/**
 * Builds hook params as the delegation manager would pass them.
 *
 * @param overrides - The params that differ from the defaults.
 * @returns The hook params.
 */
export const createHookParams = (
  overrides: Partial<HookParams> & Pick<HookParams, 'terms'>,
): HookParams => ({
  caller: getContractAddress('DelegationManager'),
  args: '0x',
  mode: ExecutionMode.SingleDefault,
  executionCallData: encodeSingleExecution({
    target: getContractAddress('target'),
    value: 0n,
    callData: '0x',
  }),
  delegationHash: keccak256(toHex('delegation')),
  delegator: getContractAddress('account:alice'),
  redeemer: getContractAddress('account:bob'),
  ...overrides,
});

export const counterAbi = parseAbi([
  'function setCount(uint256 count)',
  'function increment()',
  'function count() view returns (uint256)',
  'function fail()',
]);

/**
 * A contract holding one journaled counter, used as the target of executions.
 */
export class CounterContract implements Contract {
  readonly address: Address;

  readonly #count: StateStore<bigint>;

  constructor({ runtime, address }: { runtime: ExecutionRuntime; address: Address }) {
    this.address = address;
    this.#count = runtime.journal.createStore(`Counter.${address}`);
  }

  get count(): bigint {
    return this.#count.get(['count']) ?? 0n;
  }

  call({ data }: CallContext): Hex {
    const decoded = decodeFunctionData({ abi: counterAbi, data });
    switch (decoded.functionName) {
      case 'setCount':
        this.#count.set(['count'], decoded.args[0]);
        return '0x';
      case 'increment':
        this.#count.set(['count'], this.count + 1n);
        return '0x';
      case 'count':
        return encodeFunctionResult({
          abi: counterAbi,
          functionName: 'count',
          result: this.count,
        });
      case 'fail':
        throw new Error('Counter:failed');
      default:
        throw new Error('Counter:unknown-function');
    }
  }
}

export const deployCounter = (runtime: ExecutionRuntime, name = 'counter') =>
  runtime.deploy(
    new CounterContract({ runtime, address: getContractAddress(name) }),
  );
