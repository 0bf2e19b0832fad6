import { InvalidAllyCodeError } from "../errors";

/**
 * Strip dashes and whitespace from an ally code ("123-456-789" -> "123456789").
 * Throws when the result is not exactly nine digits.
 */
export function normalizeAllyCode(allyCode: string): string {
  const normalized = allyCode.replace(/[-\s]/g, "");
  if (!/^\d{9}$/.test(normalized)) {
    throw new InvalidAllyCodeError(allyCode);
  }
  return normalized;
}

/**
 * Format a nine-digit ally code as "123-456-789"
 */
export function formatAllyCode(allyCode: string | number): string {
  const digits = String(allyCode).padStart(9, "0");
  return `${digits.slice(0, 3)}-${digits.slice(3, 6)}-${digits.slice(6, 9)}`;
}
