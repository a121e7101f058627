export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** UTC calendar day, "YYYY-MM-DD" */
export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function minutesBefore(date: Date, minutes: number): Date {
  return new Date(date.getTime() - minutes * 60_000);
}
