// src/store.ts
import { statSync } from 'node:fs';
import Database from 'better-sqlite3';
import { StoreReadError, errorMessage } from './errors.js';

export type Store = Database.Database;

let client: Store | null = null;
let clientPath: string | null = null;
let clientStamp: string | null = null;

/** Opens an existing store read-only. The store is never mutated after ingestion. */
export function openReadStore(path: string): Store {
  try {
    return new Database(path, { readonly: true, fileMustExist: true });
  } catch (e: unknown) {
    throw new StoreReadError(`cannot open store ${path}: ${errorMessage(e)}`, e);
  }
}

// a rebuild renames a new file over the path, so the inode changes
function fileStamp(path: string): string | null {
  const st = statSync(path, { throwIfNoEntry: false });
  return st ? `${st.ino}:${st.mtimeMs}` : null;
}

/** Shared handle for `path`, reopened when the file there has been replaced. */
export function getStore(path: string): Store {
  const stamp = fileStamp(path);
  if (client && clientPath === path && stamp !== null && clientStamp === stamp) return client;
  closeStore();
  client = openReadStore(path);
  clientPath = path;
  clientStamp = stamp;
  return client;
}

export function closeStore(): void {
  if (client) client.close();
  client = null;
  clientPath = null;
  clientStamp = null;
}
