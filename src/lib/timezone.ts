type LocalParts = {
  localDate: string; // YYYY-MM-DD in the provided timeZone
  hhmmss: string;
};

export function getLocalParts(now: Date, timeZone: string): LocalParts {
  // en-CA yields YYYY-MM-DD ordering in formatToParts reliably.
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });

  const parts = formatter.formatToParts(now);
  const pick = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '';

  const localDate = `${pick('year')}-${pick('month')}-${pick('day')}`;
  const hhmmss = `${pick('hour')}:${pick('minute')}:${pick('second')}`;
  return { localDate, hhmmss };
}

/** Human-readable report timestamp, e.g. `2026-03-01 08:30:00 (Europe/Berlin)`. */
export function formatReportTimestamp(now: Date, timeZone: string): string {
  const { localDate, hhmmss } = getLocalParts(now, timeZone);
  return `${localDate} ${hhmmss} (${timeZone})`;
}
