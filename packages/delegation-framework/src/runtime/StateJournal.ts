export type StateKeyPart = string | bigint | number;

/**
 * Joins key parts into a store key. Hex strings are compared case-insensitively.
 *
 * @param parts - The parts of the key.
 * @returns The key.
 */
export const toStateKey = (parts: readonly StateKeyPart[]): string =>
  parts
    .map((part) =>
      typeof part === 'string' ? part.toLowerCase() : part.toString(),
    )
    .join(':');

/**
 * A key-value store whose contents the journal can checkpoint and restore.
 * Values are replaced, never mutated in place.
 */
export class StateStore<TValue> {
  readonly name: string;

  #entries = new Map<string, TValue>();

  constructor(name: string) {
    this.name = name;
  }

  get(key: readonly StateKeyPart[]): TValue | undefined {
    return this.#entries.get(toStateKey(key));
  }

  has(key: readonly StateKeyPart[]): boolean {
    return this.#entries.has(toStateKey(key));
  }

  set(key: readonly StateKeyPart[], value: TValue): void {
    this.#entries.set(toStateKey(key), value);
  }

  delete(key: readonly StateKeyPart[]): void {
    this.#entries.delete(toStateKey(key));
  }

  get size(): number {
    return this.#entries.size;
  }

  /** @internal */
  copyEntries(): Map<string, TValue> {
    return new Map(this.#entries);
  }

  /** @internal */
  restoreEntries(entries: Map<string, TValue>): void {
    this.#entries = new Map(entries);
  }
}

export type Checkpoint = {
  readonly entries: ReadonlyMap<StateStore<unknown>, Map<string, unknown>>;
};

/**
 * Owns every state store of a runtime so that a failed transaction can put
 * all of them back the way they were.
 */
export class StateJournal {
  readonly #stores: StateStore<unknown>[] = [];

  createStore<TValue>(name: string): StateStore<TValue> {
    const store = new StateStore<TValue>(name);
    this.#stores.push(store);
    return store;
  }

  checkpoint(): Checkpoint {
    return {
      entries: new Map(
        this.#stores.map((store) => [store, store.copyEntries()]),
      ),
    };
  }

  revert(checkpoint: Checkpoint): void {
    for (const store of this.#stores) {
      store.restoreEntries(checkpoint.entries.get(store) ?? new Map());
    }
  }
}
