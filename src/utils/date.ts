export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function toDateOnly(iso: string): string {
  return iso.slice(0, 10);
}

export function todayDateOnly(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
