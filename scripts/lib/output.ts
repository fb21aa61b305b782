// ============================================================================
// Output helpers
// ============================================================================

export interface CommandResult {
  success: boolean;
  data?: unknown;
  error?: string;
}

export function output(result: CommandResult): void {
  console.log(JSON.stringify(result, null, 2));
}

export function fail(error: string): never {
  output({ success: false, error });
  process.exit(1);
}

export function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

/**
 * Print either the text report or, with `--json`, the JSON envelope.
 */
export function report(
  flags: Record<string, string>,
  lines: string[],
  data: unknown
): void {
  if (flags.json) {
    output({ success: true, data });
  } else {
    printLines(lines);
  }
}

/** A one-line outcome that isn't an error, e.g. an empty report. */
export function reportMessage(flags: Record<string, string>, message: string): void {
  report(flags, [message], { message });
}

export function parseArgs(args: string[]): { flags: Record<string, string>; positional: string[] } {
  const flags: Record<string, string> = {};
  const positional: string[] = [];

  for (const arg of args) {
    if (arg.startsWith("--")) {
      const [key, ...valueParts] = arg.slice(2).split("=");
      flags[key] = valueParts.join("=") || "true";
    } else {
      positional.push(arg);
    }
  }

  return { flags, positional };
}

/**
 * Read a positive integer flag, falling back when absent or malformed.
 */
export function intFlag(
  flags: Record<string, string>,
  name: string,
  fallback: number
): number {
  const raw = flags[name];
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

/**
 * Remote-service errors are expected outcomes: report them and let the
 * command finish normally.
 */
export function reportApiError(flags: Record<string, string>, message: string): void {
  if (flags.json) {
    output({ success: false, error: message });
  } else {
    console.log(message);
  }
}
