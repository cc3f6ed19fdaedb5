const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

export function isValidDateString(date: string): boolean {
  if (typeof date !== 'string') return false;
  if (!DATE_REGEX.test(date)) return false;
  const d = new Date(date + 'T00:00:00Z');
  if (isNaN(d.getTime())) return false;
  return d.toISOString().slice(0, 10) === date;
}

export function inRange(val: number | null | undefined, lo: number, hi: number): boolean {
  return typeof val === 'number' && Number.isFinite(val) && val >= lo && val <= hi;
}

export function isPositive(val: number | null | undefined): boolean {
  return typeof val === 'number' && Number.isFinite(val) && val > 0;
}
