export const nowIso = (): string => new Date().toISOString();

export const toEpochMillis = (iso: string): number => Date.parse(iso);

export const addMinutes = (date: Date, minutes: number): Date =>
  new Date(date.getTime() + minutes * 60_000);
