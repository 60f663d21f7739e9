/** ISO-8601 UTC for seconds since epoch; null when the value is outside the Date range. */
export function isoFromUnixSeconds(seconds: number | null): string | null {
  if (seconds === null) return null;
  const date = new Date(seconds * 1000);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}
