/**
 * PHI Sanitizer Utility
 *
 * Applied to anything an extraction run writes to logs or returns as an
 * error description. Clinical note text and extracted section values are
 * never logged; identifiers, kinds, statuses, counts and durations are.
 */

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const PHONE_PATTERN = /(\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/g;
const SSN_PATTERN = /\d{3}-\d{2}-\d{4}/g;

/**
 * Redact PHI and credentials from an error message (max 500 chars).
 *
 * Removes emails, bearer tokens and API keys, SSNs, phone numbers, long
 * digit runs (MRNs, account numbers) and "Firstname Lastname" pairs.
 */
export function sanitizeErrorMessage(error: string): string {
  if (!error) {
    return '';
  }

  return error
    .replace(EMAIL_PATTERN, '[EMAIL_REDACTED]')
    .replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]')
    .replace(/token[:\s]+[^\s]+/gi, 'token: [REDACTED]')
    .replace(/api[_-]?key[:\s]+[^\s]+/gi, 'api_key: [REDACTED]')
    .replace(SSN_PATTERN, '[SSN_REDACTED]')
    .replace(PHONE_PATTERN, '[PHONE_REDACTED]')
    .replace(/\d{10,}/g, '[NUMBER_REDACTED]')
    .replace(/\b[A-Z][a-z]+\s+[A-Z][a-z]+\b/g, '[NAME_REDACTED]')
    .substring(0, 500);
}

// Keys whose values may carry note text or patient identity
const PHI_METADATA_KEYS = new Set([
  'text',
  'content',
  'payload',
  'value',
  'data',
  'patientName',
  'firstName',
  'lastName',
  'fullName',
  'name',
]);

/**
 * Drop PHI-bearing keys and string values that look like emails or phone
 * numbers. Nested objects and arrays are sanitized recursively.
 */
export function sanitizeMetadata(
  metadata: Record<string, unknown> | undefined,
): Record<string, unknown> {
  if (!metadata) {
    return {};
  }

  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(metadata)) {
    if (PHI_METADATA_KEYS.has(key)) {
      continue;
    }
    sanitized[key] = sanitizeMetadataValue(value);
    if (sanitized[key] === undefined) {
      delete sanitized[key];
    }
  }

  return sanitized;
}

function sanitizeMetadataValue(value: unknown): unknown {
  if (typeof value === 'string') {
    // Patterns are global; test against fresh instances
    if (
      new RegExp(EMAIL_PATTERN.source).test(value) ||
      new RegExp(PHONE_PATTERN.source).test(value)
    ) {
      return undefined;
    }
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitizeMetadataValue(item));
  }

  if (value !== null && typeof value === 'object') {
    return sanitizeMetadata(Object.fromEntries(Object.entries(value)));
  }

  return value;
}
