/**
 * UTC timestamps stored as `YYYY-MM-DD HH:MM:SS` so that string comparison
 * in SQL matches chronological order
 */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function parseUtcTimestamp(value: string): Date {
  return new Date(`${value.trim().replace(' ', 'T')}Z`);
}

export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * 24 * 60 * 60 * 1000);
}
