/**
 * History ledger partition keys
 *
 * Per-item ledger: one bucket per month, keyed `MM-YYYY` (e.g. `10-2025`).
 * Global ledger: one bucket per day, keyed `YYYY/MM/DD` (e.g. `2025/10/20`).
 * Keys are computed from the UTC calendar date of the entry's timestamp.
 */

const pad = (value: number): string => value.toString().padStart(2, '0');

export function monthKey(date: Date): string {
  return `${pad(date.getUTCMonth() + 1)}-${date.getUTCFullYear()}`;
}

export function dayKey(date: Date): string {
  return `${date.getUTCFullYear()}/${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCDate())}`;
}

/**
 * Sort position of a `MM-YYYY` key, or null when the key is not one
 */
export function monthKeyOrdinal(key: string): number | null {
  const match = /^(\d{2})-(\d{4})$/.exec(key);
  if (!match) return null;

  const month = Number(match[1]);
  const year = Number(match[2]);
  if (month < 1 || month > 12) return null;

  return year * 12 + (month - 1);
}

/**
 * Month keys overlapping [start, end], oldest first
 */
export function monthKeysInRange(start: Date, end: Date): string[] {
  const keys: string[] = [];
  const cursor = new Date(Date.UTC(start.getUTCFullYear(), start.getUTCMonth(), 1));
  const last = Date.UTC(end.getUTCFullYear(), end.getUTCMonth(), 1);

  while (cursor.getTime() <= last) {
    keys.push(monthKey(cursor));
    cursor.setUTCMonth(cursor.getUTCMonth() + 1);
  }

  return keys;
}

/**
 * Day keys overlapping [start, end], oldest first
 */
export function dayKeysInRange(start: Date, end: Date): string[] {
  const keys: string[] = [];
  const cursor = new Date(Date.UTC(start.getUTCFullYear(), start.getUTCMonth(), start.getUTCDate()));
  const last = Date.UTC(end.getUTCFullYear(), end.getUTCMonth(), end.getUTCDate());

  while (cursor.getTime() <= last) {
    keys.push(dayKey(cursor));
    cursor.setUTCDate(cursor.getUTCDate() + 1);
  }

  return keys;
}
