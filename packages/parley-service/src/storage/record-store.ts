/**
 * Durable record store boundary.
 *
 * The invitation core only needs named collections of JSON records keyed by
 * ID. Hosts supply the durable implementation (see `@parley/node`'s file
 * store); {@link MemoryRecordStore} backs tests and ephemeral sessions.
 *
 * Every call resolves only once the write is durable, so a caller that awaits
 * it may rely on the record surviving a restart.
 */

export interface RecordStore {
  get(collection: string, id: string): Promise<unknown | undefined>;
  put(collection: string, id: string, record: unknown): Promise<void>;
  /** @returns true if a record was removed */
  delete(collection: string, id: string): Promise<boolean>;
  /** Snapshot of every record in the collection. */
  list(collection: string): Promise<unknown[]>;
}

/**
 * In-process RecordStore. Records are copied through JSON on the way in and
 * out, so callers never share references with the stored state.
 */
export class MemoryRecordStore implements RecordStore {
  private collections = new Map<string, Map<string, string>>();

  async get(collection: string, id: string): Promise<unknown | undefined> {
    const raw = this.collections.get(collection)?.get(id);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async put(collection: string, id: string, record: unknown): Promise<void> {
    let rows = this.collections.get(collection);
    if (!rows) {
      rows = new Map();
      this.collections.set(collection, rows);
    }
    rows.set(id, JSON.stringify(record));
  }

  async delete(collection: string, id: string): Promise<boolean> {
    return this.collections.get(collection)?.delete(id) ?? false;
  }

  async list(collection: string): Promise<unknown[]> {
    const rows = this.collections.get(collection);
    if (!rows) return [];
    return Array.from(rows.values(), (raw) => JSON.parse(raw));
  }
}
