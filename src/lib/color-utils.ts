/** Returns a valid hex color or fallback. */
export function safeColor(value: unknown, fallback = '#64748b'): string {
  if (typeof value !== 'string') {
    return fallback;
  }
  const normalized = value.trim();
  return isValidHex(normalized) ? normalized : fallback;
}

/** Returns true if the string is a valid 3 or 6-digit hex color with # prefix. */
export function isValidHex(value: string): boolean {
  const normalized = value.trim();
  return /^#[0-9a-fA-F]{6}$/.test(normalized) || /^#[0-9a-fA-F]{3}$/.test(normalized);
}
