import { secp256k1 } from '@noble/curves/secp256k1';
import {
  ExecutionMode,
  encodeBatchExecution,
  encodeSingleExecution,
  type Address,
  type Delegation,
  type ExecutionStruct,
  type Hex,
} from '@caveatkit/delegation-core';
import {
  DelegatorAccount,
  ExecutionRuntime,
  ManualClock,
  TokenContract,
  deployDelegationFramework,
  getContractAddress,
  type CallContext,
  type Contract,
  type DelegationSigner,
  type StateStore,
} from '@caveatkit/delegation-framework';
import {
  bytesToHex,
  decodeFunctionData,
  encodeFunctionData,
  encodeFunctionResult,
  erc20Abi,
  hexToBytes,
  parseAbi,
} from 'viem';
import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts';

/**
 * Signs delegation hashes with a secp256k1 key.
 *
 * @param privateKey - The signing key.
 * @returns The signer and the address derived from its key.
 */
export const createKeySigner = (
  privateKey: Hex = generatePrivateKey(),
): DelegationSigner & { address: Address } => {
  const { address, publicKey } = privateKeyToAccount(privateKey);
  const key = hexToBytes(privateKey);

  return {
    address,
    sign: (hash) =>
      bytesToHex(secp256k1.sign(hexToBytes(hash), key).toCompactRawBytes()),
    verify: (hash, signature) => {
      try {
        return secp256k1.verify(
          hexToBytes(signature),
          hexToBytes(hash),
          hexToBytes(publicKey),
        );
      } catch {
        return false;
      }
    },
  };
};

export const createScenario = ({
  timestamp = 1_000n,
  blockNumber = 100n,
}: { timestamp?: bigint; blockNumber?: bigint } = {}) => {
  const clock = new ManualClock({ timestamp, blockNumber });
  const runtime = new ExecutionRuntime({ clock });
  const framework = deployDelegationFramework(runtime);

  const createSmartAccount = () => {
    const signer = createKeySigner();
    return runtime.deploy(
      new DelegatorAccount({
        runtime,
        address: signer.address,
        signer,
        delegationManager: framework.environment.DelegationManager,
      }),
    );
  };

  const deployToken = (symbol: string) =>
    runtime.deploy(
      new TokenContract({
        runtime,
        address: getContractAddress(`token:${symbol}`),
        symbol,
      }),
    );

  return { clock, runtime, ...framework, createSmartAccount, deployToken };
};

export type Scenario = ReturnType<typeof createScenario>;

/**
 * Signs a delegation as its delegator.
 *
 * @param delegator - The account granting the delegation.
 * @param delegation - The unsigned delegation.
 * @returns The signed delegation.
 */
export const signAs = (
  delegator: DelegatorAccount,
  delegation: Delegation,
): Delegation => ({
  ...delegation,
  signature: delegator.signDelegation(delegation),
});

export type Redemption = {
  /**
   * The delegation chain, leaf first. Empty for a self-execution.
   */
  delegations: Delegation[];
  executions: ExecutionStruct[];
  mode?: ExecutionMode;
};

/**
 * Redeems one or more delegation chains in a single call to the manager.
 *
 * @param scenario - The scenario.
 * @param redeemer - The identity redeeming.
 * @param redemptions - The chains and their executions.
 */
export const redeem = (
  { manager }: Pick<Scenario, 'manager'>,
  redeemer: Address,
  redemptions: Redemption[],
): void => {
  const modes = redemptions.map(
    ({ executions, mode }) =>
      mode ??
      (executions.length === 1 ? ExecutionMode.SingleDefault : ExecutionMode.BatchDefault),
  );

  manager.redeemDelegations({
    caller: redeemer,
    permissionContexts: redemptions.map(({ delegations }) => delegations),
    modes,
    executionCallDatas: redemptions.map(({ executions }, index) =>
      modes[index] === ExecutionMode.SingleDefault ||
      modes[index] === ExecutionMode.SingleTry
        ? encodeSingle(executions)
        : encodeBatchExecution(executions),
    ),
  });
};

const encodeSingle = (executions: ExecutionStruct[]): Hex => {
  const [execution] = executions;
  if (!execution || executions.length !== 1) {
    throw new Error('A single call type mode takes exactly one execution');
  }
  return encodeSingleExecution(execution);
};

export const transferCall = (
  token: Pick<TokenContract, 'address'>,
  to: Address,
  amount: bigint,
): ExecutionStruct => ({
  target: token.address,
  value: 0n,
  callData: encodeFunctionData({
    abi: erc20Abi,
    functionName: 'transfer',
    args: [to, amount],
  }),
});

export const counterAbi = parseAbi([
  'function setCount(uint256 count)',
  'function increment()',
  'function count() view returns (uint256)',
]);

/**
 * A counter owned by one account: only the owner may change it.
 */
export class CounterContract implements Contract {
  readonly address: Address;

  readonly owner: Address;

  readonly #count: StateStore<bigint>;

  constructor({
    runtime,
    owner,
  }: {
    runtime: ExecutionRuntime;
    owner: Address;
  }) {
    this.address = getContractAddress(`counter:${owner}`);
    this.owner = owner;
    this.#count = runtime.journal.createStore(`Counter.${this.address}`);
  }

  get count(): bigint {
    return this.#count.get(['count']) ?? 0n;
  }

  call({ from, data }: CallContext): Hex {
    const decoded = decodeFunctionData({ abi: counterAbi, data });
    if (decoded.functionName === 'count') {
      return encodeFunctionResult({
        abi: counterAbi,
        functionName: 'count',
        result: this.count,
      });
    }

    if (from.toLowerCase() !== this.owner.toLowerCase()) {
      throw new Error('Counter:not-owner');
    }

    this.#count.set(
      ['count'],
      decoded.functionName === 'setCount' ? decoded.args[0] : this.count + 1n,
    );
    return '0x';
  }
}

export const deployCounter = (
  { runtime }: Pick<Scenario, 'runtime'>,
  owner: Address,
): CounterContract => runtime.deploy(new CounterContract({ runtime, owner }));

export const setCountCall = (
  counter: CounterContract,
  count: bigint,
): ExecutionStruct => ({
  target: counter.address,
  value: 0n,
  callData: encodeFunctionData({
    abi: counterAbi,
    functionName: 'setCount',
    args: [count],
  }),
});

export const incrementCall = (counter: CounterContract): ExecutionStruct => ({
  target: counter.address,
  value: 0n,
  callData: encodeFunctionData({ abi: counterAbi, functionName: 'increment' }),
});
