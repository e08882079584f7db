export interface TerminalMetrics {
  rows(): number;
  columns(): number;
}

const FALLBACK_ROWS = 24;
const FALLBACK_COLUMNS = 80;

/**
 * Reads the size of the attached terminal. Never cached: the window can be
 * resized between any two calls.
 */
export function processTerminal(stream: NodeJS.WriteStream = process.stdout): TerminalMetrics {
  return {
    rows: () => stream.rows ?? FALLBACK_ROWS,
    columns: () => stream.columns ?? FALLBACK_COLUMNS,
  };
}
