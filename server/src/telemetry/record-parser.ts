import type { ParseResult } from '../../../shared/types.js';

// Wire grammar: "YYYY-MM-DD HH:MM:SS,<fuel>", timestamps in UTC
const FIELD_DELIMITER = ',';
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const FUEL_PATTERN = /^\+?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function parseTimestamp(field: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(field);
  if (!match) return null;
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  if (hour > 23 || minute > 59 || second > 59) return null;

  // Date.UTC maps years 0-99 to 1900-1999, so set the full year separately
  const date = new Date(Date.UTC(2000, 0, 1, hour, minute, second));
  date.setUTCFullYear(year, month - 1, day);
  // Out-of-range days roll over (Feb 30 -> Mar 1), so compare back
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

function parseFuel(field: string): number | null {
  if (!FUEL_PATTERN.test(field)) return null;
  const fuel = Number(field);
  return Number.isFinite(fuel) ? fuel : null;
}

export function parseTelemetryRecord(record: string): ParseResult {
  const fields = record.split(FIELD_DELIMITER).map(f => f.trim());
  if (fields.length !== 2) {
    return { ok: false, reason: 'field_count', raw: record };
  }

  const timestamp = parseTimestamp(fields[0]);
  if (!timestamp) {
    return { ok: false, reason: 'timestamp', raw: record };
  }

  const fuelRemaining = parseFuel(fields[1]);
  if (fuelRemaining === null) {
    return { ok: false, reason: 'fuel', raw: record };
  }

  return { ok: true, reading: { timestamp, fuelRemaining } };
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** Renders a timestamp in the same layout the wire grammar accepts. */
export function formatTimestamp(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} `
    + `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}
