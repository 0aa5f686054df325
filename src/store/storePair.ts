import { FileTextStore, MemoryTextStore, type TextStore } from "./textStore";

/**
 * The two persisted artifacts a reconcile works on, passed explicitly
 * rather than found through ambient paths.
 */
export interface StorePair {
  /** Last committed fingerprint. */
  hash: TextStore;
  /** Current version, as a `Version: N` file. */
  version: TextStore;
}

export function createFileStorePair(paths: {
  hashFile: string;
  versionFile: string;
}): StorePair {
  return {
    hash: new FileTextStore(paths.hashFile),
    version: new FileTextStore(paths.versionFile),
  };
}

export interface MemoryStorePair extends StorePair {
  hash: MemoryTextStore;
  version: MemoryTextStore;
}

export function createMemoryStorePair(initial?: {
  hash?: string;
  version?: string;
}): MemoryStorePair {
  return {
    hash: new MemoryTextStore("memory:hash", initial?.hash),
    version: new MemoryTextStore("memory:version", initial?.version),
  };
}
