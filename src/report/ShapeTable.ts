/**
 * Tabular report of parsed shapes.
 */

import type { AttributeValue, ReportOptions, ShapeRecord } from '../types/index.js';
import { DEFAULT_REPORT_OPTIONS } from '../types/index.js';

/**
 * One report row. `content` is the label when there is one, otherwise the value.
 */
export interface ShapeRow {
  id: string;
  content: AttributeValue;
  style: AttributeValue;
}

/**
 * Report columns, in print order.
 */
export const SHAPE_TABLE_COLUMNS = ['id', 'content', 'style'] as const satisfies readonly (keyof ShapeRow)[];

const COLUMN_GAP = '  ';

/**
 * Derives the report rows from parsed shapes, keeping their order.
 */
export function buildShapeRows(records: readonly ShapeRecord[]): ShapeRow[] {
  return records.map((record) => ({
    id: record.id,
    content: record.label ?? record.value,
    style: record.style,
  }));
}

function cellText(value: AttributeValue, absentPlaceholder: string): string {
  if (value === null) {
    return absentPlaceholder;
  }
  return value.replace(/\r?\n/g, ' ');
}

function formatText(rows: readonly ShapeRow[], absentPlaceholder: string): string {
  const cells = rows.map((row) => SHAPE_TABLE_COLUMNS.map((column) => cellText(row[column], absentPlaceholder)));
  const indexWidth = String(Math.max(rows.length - 1, 0)).length;
  const widths = SHAPE_TABLE_COLUMNS.map((column, i) =>
    Math.max(column.length, ...cells.map((rowCells) => rowCells[i].length))
  );

  const header = [' '.repeat(indexWidth), ...SHAPE_TABLE_COLUMNS.map((column, i) => column.padEnd(widths[i]))];
  const lines = [header.join(COLUMN_GAP).trimEnd()];

  cells.forEach((rowCells, rowIndex) => {
    const line = [String(rowIndex).padStart(indexWidth), ...rowCells.map((cell, i) => cell.padEnd(widths[i]))];
    lines.push(line.join(COLUMN_GAP).trimEnd());
  });

  return lines.join('\n');
}

function formatMarkdown(rows: readonly ShapeRow[], absentPlaceholder: string): string {
  const toLine = (cells: readonly string[]): string => `| ${cells.join(' | ')} |`;
  const escape = (value: AttributeValue): string => cellText(value, absentPlaceholder).replace(/\|/g, '\\|');

  const lines = [toLine(SHAPE_TABLE_COLUMNS), toLine(SHAPE_TABLE_COLUMNS.map(() => '---'))];
  for (const row of rows) {
    lines.push(toLine(SHAPE_TABLE_COLUMNS.map((column) => escape(row[column]))));
  }
  return lines.join('\n');
}

/**
 * Formats report rows. Absent values print as the placeholder in the text and
 * markdown formats and as null in JSON.
 */
export function formatShapeTable(rows: readonly ShapeRow[], options: ReportOptions = {}): string {
  const { format, absentPlaceholder } = { ...DEFAULT_REPORT_OPTIONS, ...options };

  switch (format) {
    case 'text':
      return formatText(rows, absentPlaceholder);
    case 'markdown':
      return formatMarkdown(rows, absentPlaceholder);
    case 'json':
      return JSON.stringify(rows, null, 2);
  }
}

/**
 * Builds and formats the report for parsed shapes.
 */
export function renderShapeTable(records: readonly ShapeRecord[], options?: ReportOptions): string {
  return formatShapeTable(buildShapeRows(records), options);
}
