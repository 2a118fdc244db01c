/**
 * Key-value storage boundary
 *
 * Values are opaque strings under string keys. The file store keeps every
 * key in one JSON document and replaces it with a rename, so a put either
 * lands whole or not at all.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { StorageError } from '../errors';

export interface KeyValueStore {
  get(key: string): string | undefined;
  put(key: string, value: string): void;
  close(): void;
}

type Entries = Record<string, string>;

function parseEntries(raw: string, path: string): Entries {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new StorageError('open', `could not open store ${path}: not valid JSON`, { cause: err });
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new StorageError('open', `could not open store ${path}: expected an object of entries`);
  }
  const entries: Entries = {};
  for (const [key, value] of Object.entries(data)) {
    if (typeof value !== 'string') {
      throw new StorageError('open', `could not open store ${path}: entry "${key}" is not a string`);
    }
    entries[key] = value;
  }
  return entries;
}

/**
 * Open (creating if needed) a JSON-file backed store
 */
export function openFileStore(path: string): KeyValueStore {
  let entries: Entries = {};
  try {
    mkdirSync(dirname(path), { recursive: true });
    if (existsSync(path)) {
      const raw = readFileSync(path, 'utf-8');
      entries = raw.trim() === '' ? {} : parseEntries(raw, path);
    }
  } catch (err) {
    if (err instanceof StorageError) throw err;
    throw new StorageError('open', `could not open store ${path}`, { cause: err });
  }

  let closed = false;
  const tmpPath = `${path}.tmp`;

  function assertOpen(): void {
    if (closed) throw new StorageError('read', `store ${path} is closed`);
  }

  return {
    get(key: string) {
      assertOpen();
      return Object.hasOwn(entries, key) ? entries[key] : undefined;
    },
    put(key: string, value: string) {
      assertOpen();
      const next = { ...entries, [key]: value };
      try {
        writeFileSync(tmpPath, JSON.stringify(next, null, 2), { mode: 0o600 });
        renameSync(tmpPath, path);
      } catch (err) {
        rmSync(tmpPath, { force: true });
        throw new StorageError('write', `could not write "${key}" to ${path}`, { cause: err });
      }
      entries = next;
    },
    close() {
      closed = true;
    },
  };
}

/**
 * In-process store, for tests and for embedding without a disk
 */
export function createMemoryStore(initial: Entries = {}): KeyValueStore & { entries(): Entries } {
  const entries = new Map(Object.entries(initial));
  return {
    get: key => entries.get(key),
    put: (key, value) => { entries.set(key, value); },
    close: () => {},
    entries: () => Object.fromEntries(entries),
  };
}
