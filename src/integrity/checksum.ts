import * as crypto from "node:crypto";
import * as fs from "node:fs/promises";
import { ConfigError, ObservedFileError } from "../errors";

/**
 * 160-bit digest. Detects accidental content drift; it is not meant to
 * resist tampering.
 */
export const FINGERPRINT_ALGORITHM = "sha1";

export type FileReader = (filePath: string) => Promise<Uint8Array>;

const readFromDisk: FileReader = (filePath) => fs.readFile(filePath);

/**
 * Digest of the given chunks as if they were one byte stream, lowercase hex.
 */
export function fingerprintOf(chunks: Iterable<Uint8Array | string>): string {
  const hash = crypto.createHash(FINGERPRINT_ALGORITHM);
  for (const chunk of chunks) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

/**
 * Fingerprint of the observed files: their bytes concatenated in declared
 * order, with nothing inserted between files.
 *
 * Every file must be readable; the first failure aborts with an
 * ObservedFileError.
 */
export async function computeFingerprint(
  observed: readonly string[],
  readFile: FileReader = readFromDisk,
): Promise<string> {
  if (observed.length === 0) {
    throw new ConfigError("Cannot fingerprint an empty set of observed files");
  }

  const contents: Uint8Array[] = [];
  for (const filePath of observed) {
    try {
      contents.push(await readFile(filePath));
    } catch (err) {
      throw new ObservedFileError(filePath, err);
    }
  }

  return fingerprintOf(contents);
}
