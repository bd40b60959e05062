const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

const SEGMENT = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;

/** Parses durations such as `24h`, `90m`, `1h30m` or `0` into milliseconds. */
export function parseDuration(raw: string): number {
  const trimmed = raw.trim();
  if (trimmed === "0") {
    return 0;
  }
  if (!/^(\d+(\.\d+)?(ms|s|m|h))+$/.test(trimmed)) {
    throw new Error(`invalid duration: ${raw}`);
  }
  let total = 0;
  for (const match of trimmed.matchAll(SEGMENT)) {
    total += Number.parseFloat(match[1]) * UNIT_MS[match[2]];
  }
  return Math.round(total);
}

/** Formats milliseconds the way durations are written in settings, e.g. `1h30m0s`. */
export function formatDuration(ms: number): string {
  if (ms === 0) {
    return "0s";
  }
  if (ms < UNIT_MS.s) {
    return `${ms}ms`;
  }
  const hours = Math.floor(ms / UNIT_MS.h);
  const minutes = Math.floor((ms % UNIT_MS.h) / UNIT_MS.m);
  const seconds = (ms % UNIT_MS.m) / UNIT_MS.s;
  let formatted = "";
  if (hours > 0) {
    formatted += `${hours}h`;
  }
  if (hours > 0 || minutes > 0) {
    formatted += `${minutes}m`;
  }
  return `${formatted}${seconds}s`;
}
