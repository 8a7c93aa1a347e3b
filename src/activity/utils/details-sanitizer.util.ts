/**
 * Sanitisation applied to activity details before they are logged or
 * stored.
 *
 * Credential-like keys and signed URLs are redacted, strings are
 * truncated, nesting and array length are capped.
 */

const REDACTED = '[REDACTED]';
const TRUNCATED = '[TRUNCATED]';

export const MAX_DETAIL_STRING_LENGTH = 500;
export const MAX_DETAIL_ARRAY_LENGTH = 50;
export const MAX_DETAIL_DEPTH = 3;

const SENSITIVE_KEY_PATTERN =
  /pass(word)?|secret|token|authorization|api[_-]?key|signature|credential|^url$|signedUrl/i;

export function sanitizeText(value: string, maxLength: number): string {
  return value
    .replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]')
    .replace(/X-Goog-Signature=[^&\s]+/gi, 'X-Goog-Signature=[REDACTED]')
    .substring(0, maxLength);
}

/**
 * Truncates user agent strings to the stored column width
 */
export function sanitizeUserAgent(userAgent: string): string {
  return userAgent.substring(0, 255);
}

function sanitizeValue(value: unknown, depth: number): unknown {
  if (typeof value === 'string') {
    return sanitizeText(value, MAX_DETAIL_STRING_LENGTH);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    if (depth >= MAX_DETAIL_DEPTH) {
      return TRUNCATED;
    }
    return value
      .slice(0, MAX_DETAIL_ARRAY_LENGTH)
      .map((item) => sanitizeValue(item, depth + 1));
  }
  if (value !== null && typeof value === 'object') {
    if (depth >= MAX_DETAIL_DEPTH) {
      return TRUNCATED;
    }
    return sanitizeRecord(value, depth + 1);
  }
  if (typeof value === 'function' || typeof value === 'symbol') {
    return undefined;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
}

function sanitizeRecord(record: object, depth: number): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(record)) {
    if (SENSITIVE_KEY_PATTERN.test(key)) {
      sanitized[key] = REDACTED;
      continue;
    }
    const clean = sanitizeValue(value, depth);
    if (clean !== undefined) {
      sanitized[key] = clean;
    }
  }

  return sanitized;
}

export function sanitizeDetails(
  details: Record<string, unknown> | undefined,
): Record<string, unknown> {
  if (!details) {
    return {};
  }
  return sanitizeRecord(details, 0);
}
