export type Output = {
  printLine(...parts: unknown[]): void;
  printErrorLine(...parts: unknown[]): void;
};

type Write = (chunk: string) => unknown;

function coercePart(part: unknown): string {
  if (part === undefined || part === null) {
    return "";
  }
  if (typeof part === "string") {
    return part;
  }
  if (typeof part === "number" || typeof part === "boolean" || typeof part === "bigint") {
    return String(part);
  }
  if (part instanceof Error) {
    return part.message;
  }
  return String(part);
}

export function formatLine(parts: unknown[]): string {
  return parts
    .map(coercePart)
    .filter(segment => segment.length > 0)
    .join(" ");
}

export function createOutput(stdout: Write, stderr: Write): Output {
  return {
    printLine: (...parts) => {
      stdout(`${formatLine(parts)}\n`);
    },
    printErrorLine: (...parts) => {
      stderr(`${formatLine(parts)}\n`);
    },
  };
}

export const processOutput: Output = createOutput(
  chunk => process.stdout.write(chunk),
  chunk => process.stderr.write(chunk),
);
