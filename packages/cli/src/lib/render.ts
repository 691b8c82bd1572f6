/**
 * Output rendering helpers
 */

type Color = "red" | "green" | "yellow";

/**
 * Where command output goes; process streams in the binary, buffers in tests
 */
export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
  /** Color is applied only when true */
  color: boolean;
}

export const processOutput: CliOutput = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
  color: process.stdout.isTTY ?? false,
};

/**
 * Print JSON to stdout
 */
export function printJson(output: CliOutput, data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  output.out(json + "\n");
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(output: CliOutput, lines: string[]): void {
  for (const line of lines) {
    output.out(line + "\n");
  }
}

/**
 * Apply ANSI color when the output supports it
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
