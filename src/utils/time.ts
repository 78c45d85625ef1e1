const FILE_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})-(\d{2})-(\d{2})-(\d{2})$/;

/** UTC timestamp used as a filename prefix, e.g. `2024-05-01-13-45-09`. */
export function formatFileTimestamp(date = new Date()): string {
  return date.toISOString().slice(0, 19).replace(/[T:]/g, "-");
}

export function parseFileTimestamp(value: string): Date | undefined {
  const match = FILE_TIMESTAMP.exec(value);
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hour, minute, second] = match;
  const parsed = Date.parse(`${year}-${month}-${day}T${hour}:${minute}:${second}Z`);
  return Number.isNaN(parsed) ? undefined : new Date(parsed);
}
