export const ELLIPSIS = "…";

/** Collapse every run of whitespace (newlines included) into a single space. */
export function oneLine(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(" ");
}

/**
 * Truncate a string in the middle to ensure its length does not exceed maxLength.
 * If the input is longer than maxLength, replaces the middle with a single-character ellipsis '…'.
 */
export function truncateMiddle(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  if (maxLength <= ELLIPSIS.length) {
    return ELLIPSIS.slice(0, Math.max(0, maxLength));
  }
  const trimLength = maxLength - ELLIPSIS.length;
  const startLength = Math.ceil(trimLength / 2);
  const endLength = Math.floor(trimLength / 2);
  return text.slice(0, startLength) + ELLIPSIS + text.slice(text.length - endLength);
}

/** Truncate the tail of a string, ending it with '…' when anything was cut. */
export function truncateEnd(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  if (maxLength <= ELLIPSIS.length) {
    return ELLIPSIS.slice(0, Math.max(0, maxLength));
  }
  return text.slice(0, maxLength - ELLIPSIS.length).trimEnd() + ELLIPSIS;
}

/**
 * Prefix every non-blank line with `prefix`. A trailing newline does not produce
 * an extra empty line.
 */
export function indentLines(text: string, prefix: string): Array<string> {
  const lines = text.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map((line) => (line.trim() ? prefix + line : line));
}
