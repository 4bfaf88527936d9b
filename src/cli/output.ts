/**
 * Prints report lines to stdout.
 */
export function printLines(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

export function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}
