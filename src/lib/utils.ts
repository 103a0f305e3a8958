import { stripAnsi } from "consola/utils";
import { invalidTimeoutError } from "../errors/index.ts";

const UNIT_SECONDS: Record<string, number> = { h: 3600, m: 60, s: 1 };

/**
 * Parse a --timeout value into seconds.
 * A plain number is seconds (fractions allowed); otherwise h/m/s units, e.g. "1m30s".
 */
export function parseTimeoutSeconds(input: string): number {
  const value = input.trim();

  if (/^\d+(\.\d+)?$/.test(value)) {
    return Number(value);
  }

  if (!/^(\d+(\.\d+)?\s*[hms]\s*)+$/i.test(value)) {
    throw invalidTimeoutError(input);
  }

  const regex = /(\d+(?:\.\d+)?)\s*([hms])/gi;
  let total = 0;
  let match;

  while ((match = regex.exec(value)) !== null) {
    total += Number(match[1]) * UNIT_SECONDS[match[2].toLowerCase()];
  }

  return total;
}

export function table<T>(opts: {
  rows: readonly T[];
  columns: Record<string, { value: (row: T) => string | number }>;
}): string {
  const titles = Object.keys(opts.columns);
  const visibleLength = (value: string) => stripAnsi(value).length;
  const maxWidths: number[] = titles.map((title) => visibleLength(title));

  const data = opts.rows.map((row) => {
    return titles.map((title, i) => {
      const value = String(opts.columns[title].value(row));
      const width = visibleLength(value);
      if (width > maxWidths[i]) maxWidths[i] = width;
      return value;
    });
  });

  const padded = (value: string, i: number) => {
    const padding = maxWidths[i] - visibleLength(value);
    return padding > 0 ? `${value}${" ".repeat(padding)}` : value;
  };

  const sep = "   ";
  return [
    `\x1b[1m${titles.map(padded).join(sep)}\x1b[0m`,
    ...data.map((row) => row.map(padded).join(sep)),
  ].join("\n");
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
