const SECRET_KEY_PATTERN = /(password|passwd|secret|token|credential|api_?key)/i;
const REFERENCE_SUFFIX_PATTERN = /(file|path)$/i;

export const MASKED_VALUE = "******";

// Paths to secret material (e.g. secretsFile) are logged as-is; only inline values are masked.
export function isSecretKey(name: string): boolean {
  return SECRET_KEY_PATTERN.test(name) && !REFERENCE_SUFFIX_PATTERN.test(name);
}

export function maskParameterValue(name: string, value: string | number | boolean): string | number | boolean {
  return isSecretKey(name) ? MASKED_VALUE : value;
}

export function maskText(text: string, secrets: Iterable<string>): string {
  let masked = text;
  for (const secret of secrets) {
    if (secret.length < 4) continue;
    masked = masked.split(secret).join(MASKED_VALUE);
  }
  return masked;
}
