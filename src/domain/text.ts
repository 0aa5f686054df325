/**
 * First line with non-whitespace content, trimmed; `""` when there is none.
 */
export function firstNonBlankLine(text: string): string {
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.length > 0) {
      return trimmed;
    }
  }
  return "";
}
