/**
 * Date helpers for observation dates.
 * Canonical form is the compact `YYYYMMDD` date key used as a table column name.
 * All functions are pure and return '' when the input cannot be read as a date.
 */

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

function isValidYmd(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false;
  if (year < 1900 || year > 9999 || month < 1 || month > 12 || day < 1) return false;
  const candidate = new Date(Date.UTC(year, month - 1, day));
  return candidate.getUTCFullYear() === year && candidate.getUTCMonth() === month - 1 && candidate.getUTCDate() === day;
}

function dateKeyFromYmdParts(year: number, month: number, day: number): string {
  if (!isValidYmd(year, month, day)) return '';
  return `${String(year).padStart(4, '0')}${String(month).padStart(2, '0')}${String(day).padStart(2, '0')}`;
}

function monthFromName(name: string): number {
  const value = String(name || '').trim().toLowerCase().replace(/\.$/, '');
  if (value.length < 3) return 0;
  const index = MONTH_NAMES.findIndex((month) => month === value || (value.length === 3 && month.startsWith(value)));
  return index + 1;
}

/** `MM/DD/YYYY` (single-digit month/day accepted). */
function parseUsDate(value: string): string {
  const match = String(value || '').trim().match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (!match) return '';
  return dateKeyFromYmdParts(Number(match[3]), Number(match[1]), Number(match[2]));
}

/** `YYYY-MM-DD`. */
function parseIsoDate(value: string): string {
  const match = String(value || '').trim().match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return '';
  return dateKeyFromYmdParts(Number(match[1]), Number(match[2]), Number(match[3]));
}

/** `August 20, 2025` or `Aug 20, 2025`. */
function parseLongDate(value: string): string {
  const match = String(value || '').trim().match(/^([A-Za-z]+\.?)\s+(\d{1,2})(?:,\s*|\s+)(\d{4})$/);
  if (!match) return '';
  const month = monthFromName(match[1]);
  if (month === 0) return '';
  return dateKeyFromYmdParts(Number(match[3]), month, Number(match[2]));
}

function parseCompactDate(value: string): string {
  const match = String(value || '').trim().match(/^(\d{4})(\d{2})(\d{2})$/);
  if (!match) return '';
  return dateKeyFromYmdParts(Number(match[1]), Number(match[2]), Number(match[3]));
}

/** Any supported representation to `YYYYMMDD`. */
function normalizeDateKey(value: string): string {
  return parseUsDate(value) || parseIsoDate(value) || parseCompactDate(value) || parseLongDate(value);
}

function isDateKey(value: string): boolean {
  return parseCompactDate(value) !== '';
}

/** `20250820` → `2025-08-20`. */
function formatDateKeyIso(dateKey: string): string {
  if (!isDateKey(dateKey)) return '';
  return `${dateKey.slice(0, 4)}-${dateKey.slice(4, 6)}-${dateKey.slice(6, 8)}`;
}

/** `20250820` → `08/20/2025`. */
function formatDateKeyUs(dateKey: string): string {
  if (!isDateKey(dateKey)) return '';
  return `${dateKey.slice(4, 6)}/${dateKey.slice(6, 8)}/${dateKey.slice(0, 4)}`;
}

/** `20250820` → `August 20, 2025`. */
function formatDateKeyLong(dateKey: string): string {
  if (!isDateKey(dateKey)) return '';
  const month = MONTH_NAMES[Number(dateKey.slice(4, 6)) - 1];
  return `${month.charAt(0).toUpperCase()}${month.slice(1)} ${Number(dateKey.slice(6, 8))}, ${dateKey.slice(0, 4)}`;
}

function currentEtDateKey(nowUtc: Date = new Date()): string {
  const iso = nowUtc.toLocaleDateString('en-CA', {
    timeZone: 'America/New_York',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
  return parseIsoDate(iso);
}

export {
  MONTH_NAMES,
  isValidYmd,
  dateKeyFromYmdParts,
  monthFromName,
  parseUsDate,
  parseIsoDate,
  parseLongDate,
  parseCompactDate,
  normalizeDateKey,
  isDateKey,
  formatDateKeyIso,
  formatDateKeyUs,
  formatDateKeyLong,
  currentEtDateKey,
};
