/**
 * File-backed record store.
 *
 * One JSON file per collection under the data directory, mapping record ID
 * to record. A write replaces the whole file through a temporary file and a
 * rename, and resolves only after the rename, so a crash leaves either the old
 * or the new file on disk.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import { ErrorCode, KeyedMutex, ParleyError, getLogger, isRecord } from '@parley/service';
import type { RecordStore } from '@parley/service';

const COLLECTION_NAME = /^[a-z][a-z0-9_]*$/;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileRecordStore implements RecordStore {
  /** Loaded collections: record ID → serialized record */
  private collections = new Map<string, Map<string, string>>();
  private locks = new KeyedMutex();
  private log = getLogger().child({ module: 'file-store' });

  constructor(private readonly dir: string) {}

  async get(collection: string, id: string): Promise<unknown | undefined> {
    return this.locks.withLock(collection, async () => {
      const raw = (await this.load(collection)).get(id);
      return raw === undefined ? undefined : JSON.parse(raw);
    });
  }

  async put(collection: string, id: string, record: unknown): Promise<void> {
    await this.locks.withLock(collection, async () => {
      const next = new Map(await this.load(collection));
      next.set(id, JSON.stringify(record));
      await this.persist(collection, next);
    });
  }

  async delete(collection: string, id: string): Promise<boolean> {
    return this.locks.withLock(collection, async () => {
      const current = await this.load(collection);
      if (!current.has(id)) return false;
      const next = new Map(current);
      next.delete(id);
      await this.persist(collection, next);
      return true;
    });
  }

  async list(collection: string): Promise<unknown[]> {
    return this.locks.withLock(collection, async () => {
      const rows = await this.load(collection);
      return Array.from(rows.values(), (raw) => JSON.parse(raw));
    });
  }

  /** Path of the file backing `collection`. */
  pathFor(collection: string): string {
    if (!COLLECTION_NAME.test(collection)) {
      throw new ParleyError(ErrorCode.Internal, `Invalid collection name: ${collection}`);
    }
    return join(this.dir, `${collection}.json`);
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  private async load(collection: string): Promise<Map<string, string>> {
    const cached = this.collections.get(collection);
    if (cached) return cached;

    const path = this.pathFor(collection);
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (err) {
      if (!isMissingFile(err)) {
        throw new ParleyError(ErrorCode.StorageCorrupted, `Cannot read ${path}`, false, err);
      }
      const empty = new Map<string, string>();
      this.collections.set(collection, empty);
      return empty;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new ParleyError(ErrorCode.StorageCorrupted, `${path} is not valid JSON`, false, err);
    }
    if (!isRecord(parsed)) {
      throw new ParleyError(ErrorCode.StorageCorrupted, `${path} does not hold an object`);
    }

    const rows = new Map<string, string>();
    for (const [id, record] of Object.entries(parsed)) {
      rows.set(id, JSON.stringify(record));
    }
    this.collections.set(collection, rows);
    this.log.debug({ collection, count: rows.size }, 'Loaded collection');
    return rows;
  }

  private async persist(collection: string, rows: Map<string, string>): Promise<void> {
    const path = this.pathFor(collection);
    const tmp = `${path}.tmp`;
    const body: Record<string, unknown> = {};
    for (const [id, raw] of rows) {
      body[id] = JSON.parse(raw);
    }

    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(tmp, JSON.stringify(body, null, 2), 'utf-8');
      await rename(tmp, path);
    } catch (err) {
      this.log.error({ err, path }, 'Failed to write collection');
      throw new ParleyError(ErrorCode.StorageWriteError, `Cannot write ${path}`, true, err);
    }
    this.collections.set(collection, rows);
  }
}
