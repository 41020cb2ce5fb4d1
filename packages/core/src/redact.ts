/**
 * Secret masking for anything that leaves the process (logs, reports, errors)
 */

const MASK = '***';

/**
 * Replace every occurrence of each secret in `text` with a mask.
 * Secrets shorter than 4 characters are ignored.
 */
export function maskSecrets(text: string, secrets: ReadonlyArray<string | undefined>): string {
  let masked = text;
  for (const secret of secrets) {
    if (!secret || secret.length < 4) {
      continue;
    }
    masked = masked.split(secret).join(MASK);
  }
  return masked;
}

/**
 * Mask secrets in a structured meta object, recursing into arrays and plain objects
 */
export function maskMeta(
  meta: Record<string, unknown>,
  secrets: ReadonlyArray<string | undefined>
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    result[key] = maskValue(value, secrets);
  }
  return result;
}

function maskValue(value: unknown, secrets: ReadonlyArray<string | undefined>): unknown {
  if (typeof value === 'string') {
    return maskSecrets(value, secrets);
  }
  if (Array.isArray(value)) {
    return value.map((item) => maskValue(item, secrets));
  }
  if (isPlainObject(value)) {
    return maskMeta(value, secrets);
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}
