/**
 * Normalized content fingerprint of a forwarded message
 */
export class DuplicateCode {
  constructor(
    public readonly code: string,
    public readonly createdAt: Date = new Date(),
  ) {}
}

/**
 * Codes are compared on their trimmed, upper-cased form
 */
export function normalizeCode(code: string): string {
  return code.trim().toUpperCase();
}
