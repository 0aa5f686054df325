import { firstNonBlankLine, parseVersion } from "../domain";
import type { StorePair } from "../store";
import { computeFingerprint, type FileReader } from "./checksum";

export type SyncStatus = "uninitialized" | "in_sync" | "stale";

export interface StoreStatus {
  status: SyncStatus;
  hashStoreExists: boolean;
  versionStoreExists: boolean;
  storedFingerprint: string;
  currentFingerprint: string;
  /** Parsed version, or null when the store is missing or unparseable. */
  version: number | null;
  versionError?: string;
  /** Whether the next reconcile would advance the version. */
  willAdvance: boolean;
}

/**
 * Report how the stores compare to the observed files without creating or
 * writing anything.
 */
export async function inspectStores(
  pair: StorePair,
  observed: readonly string[],
  readFile?: FileReader,
): Promise<StoreStatus> {
  const hashStoreExists = await pair.hash.exists();
  const versionStoreExists = await pair.version.exists();

  const storedFingerprint = hashStoreExists
    ? firstNonBlankLine(await pair.hash.read())
    : "";
  const currentFingerprint = await computeFingerprint(observed, readFile);

  let version: number | null = null;
  let versionError: string | undefined;
  if (versionStoreExists) {
    const parsed = parseVersion(await pair.version.read());
    if (parsed.ok) {
      version = parsed.version;
    } else {
      versionError = parsed.reason;
    }
  }

  const willAdvance = storedFingerprint !== currentFingerprint;
  let status: SyncStatus;
  if (!hashStoreExists || !versionStoreExists) {
    status = "uninitialized";
  } else {
    status = willAdvance ? "stale" : "in_sync";
  }

  return {
    status,
    hashStoreExists,
    versionStoreExists,
    storedFingerprint,
    currentFingerprint,
    version,
    ...(versionError !== undefined ? { versionError } : {}),
    willAdvance,
  };
}
