/**
 * Identifier domain
 *
 * Identifiers are unsigned 32-bit integers. Offset arithmetic never wraps:
 * anything past the top of the domain is clamped to MAX_IDENTIFIER.
 */

export const MAX_IDENTIFIER = 0xffff_ffff;

export function saturatingAdd(a: number, b: number): number {
  return Math.min(a + b, MAX_IDENTIFIER);
}

export function isIdentifier(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_IDENTIFIER;
}
