import { VersionArithmeticError } from "../errors";

/**
 * Grammar of the version line: `"Version:" SP+ digits`, optionally
 * surrounded by whitespace. The document build includes this file verbatim,
 * so the written shape is fixed.
 */
const VERSION_LINE = /^\s*Version:[ \t]+(\d+)\s*$/;

export const INITIAL_VERSION = 0;

export type VersionParseResult =
  | { ok: true; version: number; lineNumber: number }
  | { ok: false; reason: string };

/**
 * Extract the version from the first line that matches the grammar.
 */
export function parseVersion(text: string): VersionParseResult {
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const match = VERSION_LINE.exec(lines[i]);
    if (!match) {
      continue;
    }

    // Digits beyond the safe integer range parse but cannot be incremented
    return { ok: true, version: Number(match[1]), lineNumber: i + 1 };
  }

  return { ok: false, reason: 'no line matches "Version: <number>"' };
}

export function formatVersion(version: number): string {
  return `Version: ${version}`;
}

/**
 * Full VersionStore content for a version.
 */
export function renderVersionFile(version: number): string {
  return `${formatVersion(version)}\n`;
}

export function incrementVersion(current: number): number {
  if (!Number.isSafeInteger(current) || current < 0) {
    throw new VersionArithmeticError(current);
  }

  const next = current + 1;
  if (!Number.isSafeInteger(next)) {
    throw new VersionArithmeticError(current);
  }
  return next;
}
