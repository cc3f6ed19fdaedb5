const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

export function fmtKg(x: number | null | undefined, decimals: number = 1): string {
  if (x == null || !Number.isFinite(x)) return "N/A";
  return `${x.toFixed(decimals)} kg`;
}

export function toDateString(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** "October 19, 2026", read in UTC so the label matches toDateString. */
export function fmtLongDate(d: Date): string {
  const day = String(d.getUTCDate()).padStart(2, "0");
  return `${MONTHS[d.getUTCMonth()]} ${day}, ${d.getUTCFullYear()}`;
}
