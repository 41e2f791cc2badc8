/**
 * Identifier normalization.
 *
 * Maps snake_case tokens from the metrics document onto PascalCase
 * TypeScript identifiers. Casing uses a fixed ASCII rule so output never
 * depends on the runtime locale.
 */

const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

// Reserved words that cannot name a namespace.
const RESERVED_WORDS: ReadonlySet<string> = new Set([
  "break", "case", "catch", "class", "const", "continue", "debugger",
  "default", "delete", "do", "else", "enum", "export", "extends", "false",
  "finally", "for", "function", "if", "import", "in", "instanceof", "new",
  "null", "return", "super", "switch", "this", "throw", "true", "try",
  "typeof", "var", "void", "while", "with", "implements", "interface",
  "let", "package", "private", "protected", "public", "static", "yield",
  "await",
]);

function lowerAscii(text: string): string {
  return text.replace(/[A-Z]/g, (ch) => String.fromCharCode(ch.charCodeAt(0) + 32));
}

// Title-case one segment: A-Z/a-z only, everything else keeps its form.
function titleSegment(segment: string): string {
  const code = segment.charCodeAt(0);
  const head = code >= 97 && code <= 122 ? String.fromCharCode(code - 32) : segment.charAt(0);
  return head + lowerAscii(segment.slice(1));
}

/**
 * Convert a snake_case token into a PascalCase identifier.
 *
 * Examples:
 *   "http_requests_total" -> "HttpRequestsTotal"
 *   "user_id"             -> "UserId"
 *   "userId"              -> "Userid"
 *   "HTTP_method"         -> "HttpMethod"
 *   "status_2xx"          -> "Status2xx"
 *
 * Empty segments (from leading, trailing or doubled underscores) are dropped.
 */
export function toIdentifier(token: string): string {
  return token
    .split("_")
    .filter((segment) => segment.length > 0)
    .map(titleSegment)
    .join("");
}

/**
 * True when `value` can be used as a TypeScript identifier.
 */
export function isIdentifier(value: string): boolean {
  return IDENTIFIER_PATTERN.test(value);
}

/**
 * True when `value` can name the namespace wrapping generated code.
 */
export function isNamespaceName(value: string): boolean {
  return isIdentifier(value) && !RESERVED_WORDS.has(value);
}
