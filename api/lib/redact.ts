/**
 * Token Redaction
 *
 * Strips credentials from any text that leaves the process: git output,
 * error messages, log lines and comments posted back to the PR.
 */

export const TOKEN_PLACEHOLDER = "[TOKEN_REDACTED]";

/**
 * Ordered redaction rules. The oauth2 URL form runs first so the
 * `oauth2:` prefix survives and only the secret part is replaced.
 */
const REDACTION_RULES: ReadonlyArray<{ pattern: RegExp; replacement: string }> = [
  { pattern: /oauth2:[^@\s]+@/g, replacement: `oauth2:${TOKEN_PLACEHOLDER}@` },
  // GitHub tokens: ghp_, gho_, ghu_, ghs_, ghr_
  { pattern: /gh[pousr][_A-Za-z0-9]+/g, replacement: TOKEN_PLACEHOLDER },
  // GitLab personal access tokens
  { pattern: /glpat-[A-Za-z0-9_-]{20,}/g, replacement: TOKEN_PLACEHOLDER },
];

/**
 * Replace every known token shape in `text` with a placeholder.
 */
export function redactTokens(text: string): string {
  let result = text;
  for (const rule of REDACTION_RULES) {
    result = result.replace(rule.pattern, rule.replacement);
  }
  return result;
}

/**
 * Redact a specific secret value as well as the generic token shapes.
 * Used where the token is known but may not match any of the patterns
 * (e.g. fine-grained or installation tokens passed in by the caller).
 */
export function redactSecret(text: string, secret: string | undefined): string {
  const withoutSecret = secret ? text.split(secret).join(TOKEN_PLACEHOLDER) : text;
  return redactTokens(withoutSecret);
}
