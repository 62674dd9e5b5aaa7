/**
 * PII redaction for log lines and audit details.
 */

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const CREDIT_CARD_REGEX = /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/g;
const PHONE_REGEX = /(\+?\d[\d\s\-().]{7,}\d)/g;
const POSTAL_LINE_REGEX = /\b\d{1,5}\s+[A-Za-z][A-Za-z\s]{2,40}\s(?:St|Street|Ave|Avenue|Rd|Road|Blvd|Lane|Ln|Dr|Drive)\b\.?/g;

export function redactPII(input: string): string {
  return input
    .replace(EMAIL_REGEX, '[EMAIL_REDACTED]')
    .replace(CREDIT_CARD_REGEX, '[CC_REDACTED]')
    .replace(POSTAL_LINE_REGEX, '[ADDRESS_REDACTED]')
    .replace(PHONE_REGEX, '[PHONE_REDACTED]');
}

/**
 * Redact PII from all string values in an object (recursive, arrays included).
 */
export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(obj)) {
    result[key] = redactValue(val);
  }
  return result;
}

function redactValue(val: unknown): unknown {
  if (typeof val === 'string') return redactPII(val);
  if (Array.isArray(val)) return val.map(redactValue);
  if (isPlainRecord(val)) return redactObject(val);
  return val;
}

function isPlainRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val);
}
