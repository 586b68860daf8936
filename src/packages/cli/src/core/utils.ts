// "250ms", "2s", "3m", "1h"; a bare number is seconds.
export function durationToMs(value: string | undefined, fallbackMs: number): number {
  if (!value) return fallbackMs;
  const raw = value.trim().toLowerCase();
  if (!raw) return fallbackMs;
  const match = raw.match(/^(\d+)\s*(ms|s|m|h)?$/);
  if (!match) {
    throw new Error(`invalid duration '${value}'`);
  }
  const amount = Number(match[1]);
  const unit = match[2] ?? "s";
  const mult: Record<string, number> = {
    ms: 1,
    s: 1000,
    m: 60_000,
    h: 3_600_000,
  };
  return amount * mult[unit];
}

// 0o640 -> "0640"
export function formatMode(mode: number): string {
  return `0${mode.toString(8)}`;
}
