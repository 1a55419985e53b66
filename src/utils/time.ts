export function utcDateStamp(date: Date = new Date()): string {
  return date.toISOString().slice(0, 10).replace(/-/g, "");
}

export function elapsedSeconds(startedAtMs: number, endedAtMs: number = Date.now()): number {
  return (endedAtMs - startedAtMs) / 1000;
}
