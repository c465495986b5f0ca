// Partition keys are always derived in UTC so two machines in different
// timezones write the same event to the same file.

export function dayKey(timestamp: string | Date): string {
  const date = typeof timestamp === 'string' ? new Date(timestamp) : timestamp;
  return date.toISOString().slice(0, 10);
}

export function monthKey(timestamp: string | Date): string {
  return dayKey(timestamp).slice(0, 7);
}

export function daysBefore(date: Date, days: number): Date {
  return new Date(date.getTime() - days * 24 * 60 * 60 * 1000);
}
