import { USER_COLORS } from '../constants';

/**
 * Coerce an inbound event payload to a plain record. Anything that is not an
 * object (including arrays and null) becomes an empty record.
 */
export function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

/** Trim and cut free text to at most `max` characters. */
export function truncate(value: unknown, max: number): string {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return '';
  }
  return Array.from(String(value).trim()).slice(0, max).join('');
}

/** Integer ids arrive as numbers or numeric strings. */
export function readInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return null;
}

/**
 * Pick a stable color for a seed (connection id, user id).
 */
export function generateColor(seed: string): string {
  let hash = 0;
  for (let i = 0; i < seed.length; i++) {
    hash = (hash * 31 + seed.charCodeAt(i)) >>> 0;
  }
  return USER_COLORS[hash % USER_COLORS.length] ?? USER_COLORS[0];
}
