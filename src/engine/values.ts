const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

export function nowIso(d?: Date) {
  return (d ?? new Date()).toISOString();
}

export function round2(n: number) {
  return Math.round(n * 100) / 100;
}

function toIsoDate(y: number, m: number, d: number): string | null {
  const dt = new Date(Date.UTC(y, m - 1, d));
  if (dt.getUTCFullYear() !== y || dt.getUTCMonth() !== m - 1 || dt.getUTCDate() !== d) return null;
  return `${String(y).padStart(4, "0")}-${String(m).padStart(2, "0")}-${String(d).padStart(2, "0")}`;
}

/**
 * Extracted dates arrive as free text. Returns YYYY-MM-DD, or null when the
 * text is not a recognisable calendar date.
 */
export function normalizeInvoiceDate(raw: string | null | undefined): string | null {
  if (raw === null || raw === undefined) return null;
  const s = raw.trim();

  const iso = ISO_DATE.exec(s);
  if (iso) return toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const us = US_DATE.exec(s);
  if (us) return toIsoDate(Number(us[3]), Number(us[1]), Number(us[2]));

  return null;
}

/** Cent-precision equality; two missing amounts are equal. */
export function sameAmount(a: number | null, b: number | null) {
  if (a === null || b === null) return a === b;
  return Math.round(a * 100) === Math.round(b * 100);
}

export function formatAmount(n: number | null, missing = "null") {
  return n === null ? missing : n.toFixed(2);
}
