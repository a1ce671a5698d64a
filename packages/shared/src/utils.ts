export const dedupeStrings = <T extends string>(values: T[]) => {
  const seen = new Set<string>();
  const output: T[] = [];
  values.forEach((value) => {
    if (!seen.has(value)) {
      seen.add(value);
      output.push(value);
    }
  });
  return output;
};

export const truncateText = (value: string, maxLength: number) =>
  value.length <= maxLength ? value : `${value.slice(0, maxLength)}…`;

/**
 * Shifts a `YYYY-MM-DD` day string by whole UTC days.
 */
export const shiftUtcDay = (day: string, deltaDays: number) => {
  const base = Date.parse(`${day}T00:00:00.000Z`);
  if (Number.isNaN(base)) {
    throw new Error(`invalid day: ${day}`);
  }
  return new Date(base + deltaDays * 86_400_000).toISOString().slice(0, 10);
};

export const toUtcDay = (date: Date) => date.toISOString().slice(0, 10);
