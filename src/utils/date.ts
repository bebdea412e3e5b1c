const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

// Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear takes them literally.
function utcDate(year: number, month: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

export function isIsoDate(value: string): boolean {
  const match = value.match(ISO_DATE);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = utcDate(year, month, day);
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

// Calendar arithmetic only; the input is treated as a UTC date with no time component.
export function shiftIsoDate(isoDate: string, days: number): string {
  const match = isoDate.match(ISO_DATE);
  if (!match) {
    throw new RangeError(`Not an ISO calendar date: ${isoDate}`);
  }
  return formatIsoDate(utcDate(Number(match[1]), Number(match[2]), Number(match[3]) + days));
}
