/**
 * Render a thrown value as ordered trace lines for the exception table
 */

function headerOf(error: Error): string {
  return error.message ? `${error.name}: ${error.message}` : error.name;
}

function frameLinesOf(error: Error): string[] {
  if (!error.stack) return [];
  return error.stack
    .split('\n')
    .filter((line) => /^\s+at\s/.test(line))
    .map((line) => `\t${line.trim()}`);
}

export function throwableToLines(thrown: unknown): string[] {
  if (!(thrown instanceof Error)) {
    return [String(thrown)];
  }

  const lines = [headerOf(thrown), ...frameLinesOf(thrown)];
  const seen = new Set<Error>([thrown]);

  let cause = thrown.cause;
  while (cause !== undefined && cause !== null) {
    if (!(cause instanceof Error)) {
      lines.push(`Caused by: ${String(cause)}`);
      break;
    }
    if (seen.has(cause)) {
      lines.push(`Caused by: [circular reference: ${headerOf(cause)}]`);
      break;
    }
    seen.add(cause);
    lines.push(`Caused by: ${headerOf(cause)}`, ...frameLinesOf(cause));
    cause = cause.cause;
  }

  return lines;
}
