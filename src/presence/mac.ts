const HEX_12 = /^[0-9A-F]{12}$/;

/**
 * Normalize a hardware address to `AA:BB:CC:DD:EE:FF`.
 * Accepts `:`, `-` or `.` separators, or none. Returns null for anything
 * that is not 12 hex digits.
 */
export function normalizeMac(input: string): string | null {
  const hex = input.trim().toUpperCase().replace(/[:.-]/g, '');
  if (!HEX_12.test(hex)) return null;
  return hex.match(/.{2}/g)?.join(':') ?? null;
}
