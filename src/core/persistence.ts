/**
 * persistence.ts
 *
 * The durable-storage seam. The engine hands snapshots to a
 * PersistenceAdapter and reads them back on load; codecs, encryption and the
 * actual medium live behind the adapter.
 */

export interface PersistenceAdapter<TRecord> {
  save(records: ReadonlyArray<TRecord>): Promise<void>
  load(): Promise<TRecord[]>
}

/**
 * Adapter that keeps records in process memory. Copies on both sides so
 * callers cannot mutate what was "persisted". Useful as a default and in tests.
 */
export class MemoryStorage<TRecord> implements PersistenceAdapter<TRecord> {
  #records: TRecord[] = []
  saveCount = 0

  constructor(initial: ReadonlyArray<TRecord> = []) {
    this.#records = structuredClone([...initial])
  }

  async save(records: ReadonlyArray<TRecord>): Promise<void> {
    this.#records = structuredClone([...records])
    this.saveCount++
  }

  async load(): Promise<TRecord[]> {
    return structuredClone(this.#records)
  }

  /** Current persisted snapshot, for assertions. */
  peek(): ReadonlyArray<TRecord> {
    return this.#records
  }
}
