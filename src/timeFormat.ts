const LOG_TS = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}:\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:\d{2})?$/;

/** Parses a docker log timestamp. A timestamp without a zone is taken as UTC. */
export function parseLogTimestamp(raw: string): Date | null {
  const m = raw.trim().match(LOG_TS);
  if (!m) return null;
  const [, day, time, frac, zone] = m;
  const millis = frac ? `.${(frac + '000').slice(0, 3)}` : '';
  const date = new Date(`${day}T${time}${millis}${zone ?? 'Z'}`);
  return isNaN(date.getTime()) ? null : date;
}

function formatter(timeZone: string): Intl.DateTimeFormat {
  const opts: Intl.DateTimeFormatOptions = {
    month: 'short',
    day: '2-digit',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: true,
    timeZoneName: 'short',
  };
  try {
    return new Intl.DateTimeFormat('en-US', { ...opts, timeZone });
  } catch {
    // unknown zone name
    return new Intl.DateTimeFormat('en-US', { ...opts, timeZone: 'UTC' });
  }
}

/** e.g. "Jan 15, 2025 07:00:00 AM EST" */
export function formatLocalTimestamp(raw: string, timeZone: string): string {
  const date = parseLogTimestamp(raw);
  if (!date) return raw || 'N/A';
  const parts: Record<string, string> = {};
  for (const part of formatter(timeZone).formatToParts(date)) parts[part.type] = part.value;
  return `${parts.month} ${parts.day}, ${parts.year} ${parts.hour}:${parts.minute}:${parts.second} ${parts.dayPeriod} ${parts.timeZoneName}`;
}
