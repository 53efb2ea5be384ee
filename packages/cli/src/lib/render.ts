/**
 * Output rendering helpers
 */

import type { CliIo } from "./io.js";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON, pretty unless raw
 */
export function printJson(io: CliIo, data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  io.out(`${json}\n`);
}

/**
 * Print lines (one per line)
 */
export function printLines(io: CliIo, lines: string[]): void {
  for (const line of lines) {
    io.out(`${line}\n`);
  }
}

/**
 * Apply ANSI color only when enabled
 */
export function colorize(text: string, color: Color, enabled: boolean): string {
  if (!enabled) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
