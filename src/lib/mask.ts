const MASK = '***';
const MIN_MASKABLE_LENGTH = 8;

/**
 * Mask a credential for logging: first 4 and last 4 characters around `***`.
 * Values shorter than 8 characters (or absent) become `***`.
 */
export function maskCredential(value: string | null | undefined): string {
  if (!value || value.length < MIN_MASKABLE_LENGTH) {
    return MASK;
  }
  return `${value.slice(0, 4)}${MASK}${value.slice(-4)}`;
}
