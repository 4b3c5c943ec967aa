/**
 * CLI Output Utilities
 *
 * Rules:
 * - --json mode: stdout = pure JSON data only, everything else to stderr
 * - Colors: only when stdout is a TTY and NO_COLOR is unset
 * - Errors: always to stderr, never mixed with data output
 * - Exit codes: 0 = success, 1 = failure
 */

import pc from "picocolors";

/** Whether stdout is a TTY (interactive terminal) */
export const isTTY = !!process.stdout.isTTY;

/** Whether ANSI colors should be used (respects NO_COLOR env) */
export const useColor = isTTY && !process.env.NO_COLOR;

/** Color helpers; identity functions when colors are disabled */
export const c = pc.createColors(useColor);

export function outputJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Output an error and exit.
 * Error goes to stderr, exit code 1.
 */
export function exitError(message: string): never {
  console.error(`${c.red("Error:")} ${message}`);
  process.exit(1);
}

/**
 * Print a command's result.
 * - json mode: data as JSON
 * - text mode: the formatter
 */
export function outputResult<T>(data: T, json: boolean | undefined, formatText: (data: T) => void): void {
  if (json) {
    outputJson(data);
  } else {
    formatText(data);
  }
}

/** Aligned "label: value" lines */
export function formatPairs(pairs: ReadonlyArray<readonly [string, string]>): string {
  const width = Math.max(0, ...pairs.map(([label]) => label.length));
  return pairs.map(([label, value]) => `${c.dim(`${label}:`.padEnd(width + 1))} ${value}`).join("\n");
}
