/** Zone for the `today` / `upcoming` list filters, independent of the host zone. */
export const REFERENCE_TIME_ZONE = 'Asia/Colombo';

// Offsets such as "+05:30" are not zone names.
const OFFSET_LIKE = /^[+-]\d/;

let knownZones: Map<string, string> | undefined;

/** Canonical zone spelled like `name` ignoring case, if the runtime lists one. */
function knownZone(name: string): string | undefined {
  knownZones ??= new Map(Intl.supportedValuesOf('timeZone').map((z): [string, string] => [z.toLowerCase(), z]));
  return knownZones.get(name.toLowerCase());
}

export function isValidTimeZone(name: string): boolean {
  if (!name.trim() || OFFSET_LIKE.test(name)) return false;
  let resolved: string;
  try {
    resolved = new Intl.DateTimeFormat('en-US', { timeZone: name }).resolvedOptions().timeZone;
  } catch {
    return false;
  }
  // Intl looks zones up case-insensitively; names must be spelled as listed.
  for (const known of [resolved, knownZone(name)]) {
    if (known && known !== name && known.toLowerCase() === name.toLowerCase()) return false;
  }
  return true;
}

const dayFormatters = new Map<string, Intl.DateTimeFormat>();

function dayFormatter(timeZone: string): Intl.DateTimeFormat {
  let fmt = dayFormatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
    dayFormatters.set(timeZone, fmt);
  }
  return fmt;
}

/** Calendar day (YYYY-MM-DD) of an instant, as seen in `timeZone`. */
export function calendarDay(instant: Date | string, timeZone: string = REFERENCE_TIME_ZONE): string {
  const date = typeof instant === 'string' ? new Date(instant) : instant;
  const parts = dayFormatter(timeZone).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

/** Milliseconds since epoch; ISO strings with different offsets compare correctly. */
export function toEpochMs(iso: string): number {
  return Date.parse(iso);
}
