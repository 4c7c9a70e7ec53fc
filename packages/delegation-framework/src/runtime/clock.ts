export type Clock = {
  /**
   * The current time in seconds.
   */
  getTimestamp(): bigint;
  getBlockNumber(): bigint;
};

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  #timestamp: bigint;

  #blockNumber: bigint;

  constructor({
    timestamp = 1n,
    blockNumber = 1n,
  }: { timestamp?: bigint; blockNumber?: bigint } = {}) {
    this.#timestamp = timestamp;
    this.#blockNumber = blockNumber;
  }

  getTimestamp(): bigint {
    return this.#timestamp;
  }

  getBlockNumber(): bigint {
    return this.#blockNumber;
  }

  setTimestamp(timestamp: bigint): void {
    this.#timestamp = timestamp;
  }

  setBlockNumber(blockNumber: bigint): void {
    this.#blockNumber = blockNumber;
  }

  /**
   * Moves time forward, mining one block per call.
   *
   * @param seconds - How far to move.
   */
  advance(seconds: bigint): void {
    this.#timestamp += seconds;
    this.#blockNumber += 1n;
  }
}

/**
 * Wall clock time. Block numbers count seconds since the clock was created.
 */
export class SystemClock implements Clock {
  readonly #createdAt = SystemClock.#now();

  static #now(): bigint {
    return BigInt(Math.floor(Date.now() / 1000));
  }

  getTimestamp(): bigint {
    return SystemClock.#now();
  }

  getBlockNumber(): bigint {
    return SystemClock.#now() - this.#createdAt + 1n;
  }
}
