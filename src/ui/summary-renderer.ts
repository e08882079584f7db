import type { LogReader } from '../core/log-sink.js';
import type { RunContext } from '../core/run-context.js';
import type { BoardEntry } from '../core/status-board.js';
import { boxText, statusCell } from './format.js';

const LABEL_WIDTH = 27;
const BOX_WIDTH = LABEL_WIDTH + 17;
// Blank line, two borders and a blank line around the task rows, plus two
// spare rows so the log tail never pushes the box off the top.
const SUMMARY_CHROME_ROWS = 6;

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export type RenderFrame =
  | { kind: 'too-small'; rows: number; columns: number; message: string }
  | {
      kind: 'dashboard';
      rows: number;
      columns: number;
      summary: string[];
      /** null when the terminal has too little room for a useful tail. */
      log: string[] | null;
    };

export type RenderSource = Pick<RunContext, 'board' | 'terminal' | 'config'> & { log: LogReader };

export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * Hard-wrap at exactly `width` characters. No word boundaries: a long token
 * is split wherever the column runs out.
 */
export function wrapLine(line: string, width: number): string[] {
  const chars = Array.from(line);
  if (chars.length === 0) return [''];
  const rows: string[] = [];
  for (let i = 0; i < chars.length; i += width) {
    rows.push(chars.slice(i, i + width).join(''));
  }
  return rows;
}

const TAB_STOP = 8;

/**
 * Replace tabs with the spaces a terminal would advance to reach the next
 * tab stop.
 */
export function expandTabs(line: string): string {
  if (!line.includes('\t')) return line;
  let out = '';
  let column = 0;
  for (const char of line) {
    if (char === '\t') {
      const spaces = TAB_STOP - (column % TAB_STOP);
      out += ' '.repeat(spaces);
      column += spaces;
    } else {
      out += char;
      column++;
    }
  }
  return out;
}

/**
 * What a terminal would leave visible of a line containing carriage
 * returns, e.g. progress bars redrawn in place.
 */
export function visibleText(line: string): string {
  const trimmed = line.endsWith('\r') ? line.slice(0, -1) : line;
  const lastReturn = trimmed.lastIndexOf('\r');
  return lastReturn === -1 ? trimmed : trimmed.slice(lastReturn + 1);
}

export function summaryHeight(taskCount: number): number {
  return taskCount + SUMMARY_CHROME_ROWS;
}

export function frameLines(frame: RenderFrame): string[] {
  if (frame.kind === 'too-small') return [frame.message];
  return [...frame.summary, ...(frame.log ?? [])];
}

export class SummaryRenderer {
  constructor(
    private readonly source: RenderSource,
    private readonly output: OutputStream = process.stdout,
  ) {}

  buildFrame(): RenderFrame {
    const { terminal, config } = this.source;
    const { minWidth, minHeight, logMinCharacters } = config.layout;
    const rows = terminal.rows();
    const columns = terminal.columns();

    if (rows < minHeight || columns < minWidth) {
      return {
        kind: 'too-small',
        rows,
        columns,
        message: `Error: The terminal must be at least ${minWidth} columns wide and ${minHeight} lines high to display any output.`,
      };
    }

    const entries = this.source.board.snapshot();
    const summary = this.buildSummary(entries);
    const logRows = rows - summaryHeight(entries.length);
    const log = columns * logRows >= logMinCharacters ? this.tailLog(logRows, columns) : null;

    return { kind: 'dashboard', rows, columns, summary, log };
  }

  /**
   * Clear the screen and draw the current frame.
   */
  render(): RenderFrame {
    const frame = this.buildFrame();
    this.output.write(`${CLEAR_SCREEN}${frameLines(frame).join('\n')}\n`);
    return frame;
  }

  private buildSummary(entries: BoardEntry[]): string[] {
    const border = boxText('='.repeat(BOX_WIDTH));
    const rows = entries.map(({ task, status }) => {
      const label = task.label.padEnd(LABEL_WIDTH, '.');
      return `${boxText(`= ${label}[ `)}${statusCell(status)}${boxText(' ] =')}`;
    });
    return ['', border, ...rows, border, ''];
  }

  private tailLog(logRows: number, columns: number): string[] {
    // Every line wraps to at least one row, so logRows lines always suffice.
    const wrapped = this.source.log
      .tailLines(logRows)
      .flatMap((line) => wrapLine(expandTabs(visibleText(line)), columns));
    return wrapped.slice(-logRows);
  }
}
