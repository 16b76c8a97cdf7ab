/**
 * CLI Output Utilities
 *
 * Terminal rendering for reader results: status lines, headers, aligned
 * tables and bigint-safe JSON. ANSI styling is off when NO_COLOR is set.
 */

const STYLES = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

export type Style = Exclude<keyof typeof STYLES, 'reset'>;

/**
 * Wrap text in an ANSI style. Read per call so NO_COLOR can change at runtime.
 */
export function paint(style: Style, text: string): string {
  if (process.env['NO_COLOR']) return text;
  return `${STYLES[style]}${text}${STYLES.reset}`;
}

// =============================================================================
// Status lines
// =============================================================================

const STATUS = {
  warning: { mark: '⚠', style: 'yellow' },
  info: { mark: 'ℹ', style: 'cyan' },
  error: { mark: '✗', style: 'red' },
} as const satisfies Record<string, { mark: string; style: Style }>;

type StatusKind = keyof typeof STATUS;

function statusLine(kind: StatusKind, message: string): string {
  const { mark, style } = STATUS[kind];
  return paint(style, `${mark} ${message}`);
}

export function warning(message: string): void {
  console.log(statusLine('warning', message));
}

export function info(message: string): void {
  console.log(statusLine('info', message));
}

/**
 * Print an error line to stderr.
 */
export function error(message: string): void {
  console.error(statusLine('error', message));
}

/**
 * Print the error and exit the process.
 */
export function exitWithError(message: string, code = 1): never {
  error(message);
  process.exit(code);
}

// =============================================================================
// Blocks
// =============================================================================

const HEADER_RULE_MAX = 60;

/**
 * Blank line, bold title, dim underline a little wider than the title.
 */
export function header(text: string): void {
  console.log('');
  console.log(paint('bold', text));
  console.log(paint('dim', '─'.repeat(Math.min(text.length + 4, HEADER_RULE_MAX))));
}

export type Cell = string | number | undefined;

interface Column {
  key: string;
  width: number;
  numeric: boolean;
}

function cellText(value: Cell): string {
  return value === undefined ? '' : String(value);
}

/**
 * Describe the columns of `rows`: keys of the first row, each as wide as its
 * widest value or title. A column whose defined cells are all numbers is numeric.
 */
function describeColumns(rows: Array<Record<string, Cell>>): Column[] {
  return Object.keys(rows[0]).map((key) => {
    const cells = rows.map((row) => row[key]);
    return {
      key,
      width: Math.max(key.length, ...cells.map((cell) => cellText(cell).length)),
      numeric: cells.every((cell) => cell === undefined || typeof cell === 'number'),
    };
  });
}

function align(text: string, column: Column): string {
  return column.numeric ? text.padStart(column.width) : text.padEnd(column.width);
}

/**
 * Print rows as a table. Numeric columns are right-aligned.
 */
export function table(rows: Array<Record<string, Cell>>): void {
  if (rows.length === 0) return;

  const columns = describeColumns(rows);

  console.log(paint('bold', columns.map((col) => align(col.key, col)).join('  ')));
  console.log(paint('dim', columns.map((col) => '─'.repeat(col.width)).join('──')));

  for (const row of rows) {
    console.log(columns.map((col) => align(cellText(row[col.key]), col)).join('  '));
  }
}

/**
 * Print JSON. Bigints (span and trace id halves) are written as decimal strings.
 */
export function json(data: unknown, pretty = true): void {
  const replacer = (_key: string, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value;
  console.log(JSON.stringify(data, replacer, pretty ? 2 : undefined));
}

// =============================================================================
// Formatting
// =============================================================================

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 1)}…`;
}

/**
 * Span duration in microseconds, in the largest unit that keeps it readable.
 */
export function formatMicros(us: number): string {
  if (us < 1000) return `${us}µs`;
  if (us < 1_000_000) return `${(us / 1000).toFixed(2)}ms`;
  if (us < 60_000_000) return `${(us / 1_000_000).toFixed(2)}s`;
  return `${Math.floor(us / 60_000_000)}m ${Math.round((us % 60_000_000) / 1_000_000)}s`;
}

/**
 * ISO-8601, dropping `.000` when the milliseconds are zero.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('.000Z', 'Z');
}
