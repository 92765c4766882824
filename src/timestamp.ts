const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

function normalizeOffset(raw: string | undefined): string {
  if (!raw || raw.toUpperCase() === "Z") return "Z";
  const sign = raw[0];
  const digits = raw.slice(1).replace(":", "");
  const minutes = digits.length === 2 ? "00" : digits.slice(2);
  return `${sign}${digits.slice(0, 2)}:${minutes}`;
}

/**
 * Parses an ISO-8601 timestamp into epoch milliseconds. A timestamp without an
 * offset is read as UTC, never as local time.
 */
export function parseUtcTimestamp(raw: string | null | undefined): number | null {
  if (typeof raw !== "string") return null;
  const match = ISO_PATTERN.exec(raw.trim());
  if (!match) return null;

  const [, year, month, day, hour = "00", minute = "00", second = "00", fraction = "", offset] = match;
  const normalized = `${year}-${month}-${day}T${hour}:${minute}:${second}${fraction}${normalizeOffset(offset)}`;
  const ms = Date.parse(normalized);
  return Number.isFinite(ms) ? ms : null;
}

export function toIso(ms: number): string {
  return new Date(ms).toISOString();
}
