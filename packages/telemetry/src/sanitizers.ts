/**
 * @gantry/telemetry: secret redaction for log properties
 *
 * Nested objects and arrays are walked; a property whose key looks like it
 * carries credential material is replaced with `[REDACTED]`.
 */

const SENSITIVE_KEY_PATTERN =
  /password|passwd|token|secret|authorization|cookie|api[_-]?key|bearer|credential|private[_-]?key/i

export const REDACTED = '[REDACTED]'

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Returns a new object; the input is not mutated.
 */
export function sanitizeProperties(props: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(props)) {
    result[key] = SENSITIVE_KEY_PATTERN.test(key) ? REDACTED : sanitizeValue(value)
  }

  return result
}

function sanitizeValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sanitizeValue)
  }
  if (isRecord(value)) {
    return sanitizeProperties(value)
  }
  return value
}
