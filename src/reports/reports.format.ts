import type { DateTime } from 'luxon';
import { type IsoDate, parseIsoDate, toIsoDate } from '../utils/date.js';

export type Cell = string | number;

const COLUMN_GAP = '  ';

function renderLine(cells: readonly Cell[], widths: readonly number[]): string {
  return cells
    .map((cell, i) => String(cell).padEnd(widths[i] ?? 0))
    .join(COLUMN_GAP)
    .trimEnd();
}

/**
 * Plain-text table with left-aligned columns two spaces apart. With headers, a dashed
 * rule goes under the header row. Returns '' for no rows.
 */
export function buildAlignedTable(rows: readonly (readonly Cell[])[], headers?: readonly string[]): string {
  if (rows.length === 0) {
    return '';
  }

  const columnCount = headers ? headers.length : Math.max(...rows.map((row) => row.length));
  const widths = Array.from({ length: columnCount }, (_, i) =>
    Math.max(headers ? headers[i].length : 0, ...rows.map((row) => String(row[i] ?? '').length)),
  );

  const lines: string[] = [];
  if (headers) {
    lines.push(renderLine(headers, widths));
    lines.push(
      widths
        .map((w) => '-'.repeat(w))
        .join(COLUMN_GAP)
        .trimEnd(),
    );
  }
  for (const row of rows) {
    lines.push(renderLine(row, widths));
  }
  return `${lines.join('\n')}\n`;
}

export interface TableOptions {
  headers?: readonly string[];
  /** Shown above the table, or next to "None" when there are no rows. */
  label?: string;
  /** Column to sort by (stable). Column 0 means keep the given order. */
  sortBy?: number;
}

export function sortAndRenderTable(rows: readonly (readonly Cell[])[], options: TableOptions = {}): string {
  const { headers, label, sortBy = 0 } = options;

  if (rows.length === 0) {
    return label ? `  None (${label})\n` : '  None\n';
  }

  const sorted = sortBy ? [...rows].sort((a, b) => compareCells(a[sortBy], b[sortBy])) : rows;
  return `${label ? `${label}\n` : ''}${buildAlignedTable(sorted, headers)}`;
}

export function compareCells(a: Cell | undefined, b: Cell | undefined): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = String(a ?? '');
  const right = String(b ?? '');
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

/**
 * Collapses dates into comma-separated runs of consecutive days,
 * e.g. `2025-01-01 - 2025-01-03, 2025-01-06`.
 */
export function formatDateRanges(dates: Iterable<IsoDate>): string {
  const sorted = [...new Set(dates)].sort();
  const ranges: string[] = [];
  let runStart: IsoDate | null = null;
  let runEnd: IsoDate | null = null;

  const closeRun = () => {
    if (runStart !== null && runEnd !== null) {
      ranges.push(runStart === runEnd ? runStart : `${runStart} - ${runEnd}`);
    }
  };

  for (const date of sorted) {
    const previous = runEnd === null ? null : parseIsoDate(runEnd);
    if (previous && toIsoDate(previous.plus({ days: 1 })) === date) {
      runEnd = date;
      continue;
    }
    closeRun();
    runStart = date;
    runEnd = date;
  }
  closeRun();

  return ranges.join(', ');
}

/** `start - end`, or the single date when both are the same day. */
export function formatAbsenceRange(interval: { start: DateTime; end: DateTime }): string {
  const start = toIsoDate(interval.start);
  const end = toIsoDate(interval.end);
  return start === end ? start : `${start} - ${end}`;
}

/** Fixed one decimal place. */
export function formatDecimal(value: number): string {
  return value.toFixed(1);
}

/** Signed percentage with one decimal, e.g. `+12.5%` or `-3.0%`. */
export function formatSignedPercent(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(1)}%`;
}
