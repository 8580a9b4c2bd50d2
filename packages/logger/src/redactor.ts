/**
 * Secret Redaction
 *
 * Utilities to keep credentials and email addresses out of log output.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values should always be redacted (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "authorization",
  "cookie",
  "accesskeyid",
  "secretaccesskey",
  "cohereapikey",
  "accesstoken",
  "refreshtoken",
]);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Redact a single key/value pair.
 *
 * - If the key matches a known sensitive field name the entire value is replaced
 *   with "[REDACTED]".
 * - If the value is a string that contains email-like patterns, those patterns
 *   are replaced with "[REDACTED]".
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    // Unset optional secrets stay visibly unset
    return value === undefined ? undefined : REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(EMAIL_REGEX, REDACTED);
  }

  return value;
}

/**
 * Deep copy of `value` with every sensitive key redacted. Used to log
 * resolved configuration at startup.
 */
export function redactObject<T>(value: T): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactObject(item));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      const redacted = redactValue(key, inner);
      out[key] = redacted === inner ? redactObject(inner) : redacted;
    }
    return out;
  }
  return value;
}

/**
 * List of JSON-path strings suitable for Pino's `redact` option.
 * These cover the property names that carry secrets in this codebase.
 */
export const REDACT_PATHS: string[] = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "accessKeyId",
  "secretAccessKey",
  "cohereApiKey",
  // One level of nesting (e.g. headers.authorization, llm.apiKey)
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.authorization",
  "*.cookie",
  "*.accessKeyId",
  "*.secretAccessKey",
  "*.cohereApiKey",
];
