const TRUE_VALUES = ["true", "1", "yes", "on"];
const FALSE_VALUES = ["false", "0", "no", "off"];

export function parseBoolean(raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) {
    return true;
  }
  if (FALSE_VALUES.includes(normalized)) {
    return false;
  }
  throw new Error(`invalid boolean: ${raw}`);
}

export function parseInteger(raw: string): number {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new Error(`invalid integer: ${raw}`);
  }
  return Number.parseInt(trimmed, 10);
}

/** Parses a decimal integer in `[0, max]`. */
export function parseUnsignedInteger(raw: string, max: number): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`invalid unsigned integer: ${raw}`);
  }
  const value = Number.parseInt(trimmed, 10);
  if (value > max) {
    throw new Error(`value ${value} is over the maximum of ${max}`);
  }
  return value;
}

export function parseCsv(raw: string): string[] {
  return raw
    .split(",")
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

/**
 * Returns the base64 body of a PEM block, or the value itself with line
 * breaks removed when it carries no armor.
 */
export function extractPemBody(raw: string): string {
  return raw
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith("-----"))
    .join("");
}
