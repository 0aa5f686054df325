import type { Logger } from "../logging";
import { VersionParseError } from "../errors";
import {
  firstNonBlankLine,
  incrementVersion,
  parseVersion,
  renderVersionFile,
} from "../domain";
import { bootstrapStores, type StorePair } from "../store";
import { computeFingerprint, type FileReader } from "./checksum";

export type ReconcileState = "unchanged" | "advanced";

/**
 * Outcome of one reconcile. A bootstrap is not a separate state: it is
 * reported through `bootstrapped`, alongside whichever of `unchanged` or
 * `advanced` the run then reached.
 */
export interface ReconcileResult {
  state: ReconcileState;
  /** True when this run had to create at least one store. */
  bootstrapped: boolean;
  previousFingerprint: string;
  fingerprint: string;
  /** Version before the run; only read when the fingerprint changed. */
  previousVersion?: number;
  /** Version after the run; only known when the version was advanced. */
  version?: number;
}

export interface ReconcileOptions {
  logger?: Logger;
  readFile?: FileReader;
}

/**
 * Compare the observed files against the committed fingerprint and, when
 * they differ, advance the version by one.
 *
 * Steps:
 * 1. Create missing stores (empty hash, version 0)
 * 2. Read the committed fingerprint
 * 3. Fingerprint the observed files
 * 4. Same fingerprint: done, nothing written
 * 5. Otherwise parse and increment the version, then overwrite the hash
 *    store and the version store, in that order
 *
 * Nothing is written until the new version is known, so a parse or
 * arithmetic failure leaves both stores as they were. The two overwrites
 * are sequential, not a transaction.
 */
export async function reconcile(
  pair: StorePair,
  observed: readonly string[],
  options: ReconcileOptions = {},
): Promise<ReconcileResult> {
  const log = options.logger;

  const bootstrap = await bootstrapStores(pair, log);
  const bootstrapped = bootstrap.hashCreated || bootstrap.versionCreated;
  if (bootstrapped) {
    log?.info("Initialized version stores");
  }

  const previousFingerprint = firstNonBlankLine(await pair.hash.read());
  log?.debug(`Stored fingerprint: ${previousFingerprint || "(none)"}`);

  const fingerprint = await computeFingerprint(observed, options.readFile);
  log?.debug(`Current fingerprint: ${fingerprint}`);

  if (previousFingerprint === fingerprint) {
    return { state: "unchanged", bootstrapped, previousFingerprint, fingerprint };
  }

  const parsed = parseVersion(await pair.version.read());
  if (!parsed.ok) {
    throw new VersionParseError(pair.version.location, parsed.reason);
  }
  const previousVersion = parsed.version;
  const version = incrementVersion(previousVersion);

  await pair.hash.write(fingerprint);
  await pair.version.write(renderVersionFile(version));

  return {
    state: "advanced",
    bootstrapped,
    previousFingerprint,
    fingerprint,
    previousVersion,
    version,
  };
}
