/**
 * User-facing output. Responses and state updates go to stdout, problems to stderr.
 */
export interface Reporter {
  print(text: string): void;
  error(text: string): void;
}

export const consoleReporter: Reporter = {
  print: (text) => {
    process.stdout.write(`${text}\n`);
  },
  error: (text) => {
    process.stderr.write(`${text}\n`);
  },
};

/**
 * Renders a daemon payload for printing. Strings are printed as they are, empty payloads as ''.
 */
export function formatPayload(payload: unknown): string {
  if (payload === undefined || payload === null) return '';
  if (typeof payload === 'string') return payload;
  return JSON.stringify(payload, null, 2);
}

/** Single-line rendering used when following the state feed. */
export function formatUpdate(category: string, data: unknown): string {
  return `${category} ${JSON.stringify(data ?? null)}`;
}
