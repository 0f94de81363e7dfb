/**
 * Comment Normalization
 *
 * Brings comment bodies into one canonical form so that parsing and
 * sender matching compare like with like:
 * - CRLF and lone CR become LF
 * - trailing whitespace is trimmed on every line
 * - blank lines are dropped
 * - escaped "\n" / "\r" left at the very end (as shells hand them to the CLI) are removed
 *
 * normalizeComment(normalizeComment(x)) === normalizeComment(x).
 */

const ESCAPED_LINE_ENDINGS = ["\\n", "\\r"] as const;

function stripTrailingEscapes(text: string): string {
  let result = text.trimEnd();
  let trimmed = true;
  while (trimmed) {
    trimmed = false;
    for (const suffix of ESCAPED_LINE_ENDINGS) {
      if (result.endsWith(suffix)) {
        result = result.slice(0, -suffix.length).trimEnd();
        trimmed = true;
      }
    }
  }
  return result;
}

/**
 * Normalize a comment body.
 */
export function normalizeComment(body: string): string {
  const unified = body.replace(/\r\n?/g, "\n");
  return stripTrailingEscapes(unified)
    .split("\n")
    .map((line) => line.trimEnd())
    .filter((line) => line.trim().length > 0)
    .join("\n")
    .trimStart();
}

/**
 * Lines of a normalised body that start with a slash, trimmed.
 */
export function extractCommandLines(body: string): string[] {
  return normalizeComment(body)
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith("/"));
}

/**
 * A comment is a multi-command comment when more than one of its
 * lines starts with a slash.
 */
export function isMultiLineCommand(body: string): boolean {
  return extractCommandLines(body).length > 1;
}
