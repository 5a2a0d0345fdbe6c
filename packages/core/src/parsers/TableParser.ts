import type { ColumnAlign, ColumnFormat, ColumnRule, TableOptions, TableSpec } from '../types/index.js';
import { ManError } from '../utils/errors.js';

/**
 * Pulls the next raw input line; null at end of input.
 */
export type LineSupplier = () => string | null;

/**
 * Turns cell text (with font escapes already prepended) into markup.
 */
export type CellRenderer = (text: string) => string;

const COLUMN_KEYS: Record<string, ColumnAlign> = {
  l: 'left',
  a: 'left',
  '^': 'left',
  r: 'right',
  c: 'center',
  n: 'numeric',
  s: 'span',
};

const DEFAULT_FORMAT: ColumnFormat = { align: 'left', bold: false, italic: false, rule: 'none' };

export function isTableEnd(line: string): boolean {
  return /^\.\s*TE\b/.test(line);
}

function countOf(text: string, marker: string): number {
  return text.split(marker).length - 1;
}

/**
 * Parse the options line (without its trailing `;`), e.g. `center box tab(;)`.
 */
export function parseTableOptions(text: string): TableOptions {
  const options: TableOptions = { box: false, separator: '\t' };
  const tokens = text.match(/[A-Za-z]+(?:\([^)]*\))?/g) ?? [];

  for (const token of tokens) {
    const lower = token.toLowerCase();
    if (lower === 'center' || lower === 'centre') {
      options.alignment = 'center';
    } else if (lower === 'expand') {
      options.alignment = 'expand';
    } else if (['box', 'allbox', 'doublebox', 'frame', 'doubleframe'].includes(lower)) {
      options.box = true;
    } else if (lower.startsWith('tab(')) {
      const separator = token.slice(4, -1);
      if (separator.length > 0) {
        options.separator = separator[0];
      }
    }
  }

  return options;
}

/**
 * Parse one format line (without its trailing `.`), e.g. `lb | r n`.
 */
export function parseFormatLine(text: string): ColumnFormat[] {
  const columns: ColumnFormat[] = [];
  let pendingRule: ColumnRule = 'none';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    const lower = ch.toLowerCase();
    const last = columns[columns.length - 1];

    if (ch === '|') {
      pendingRule = pendingRule === 'none' ? 'single' : 'double';
      i++;
    } else if (lower in COLUMN_KEYS) {
      columns.push({ align: COLUMN_KEYS[lower], bold: false, italic: false, rule: pendingRule });
      pendingRule = 'none';
      i++;
    } else if (lower === 'b' && last) {
      last.bold = true;
      i++;
    } else if (lower === 'i' && last) {
      last.italic = true;
      i++;
    } else if (lower === 'f' && last) {
      // fB, fI, fR, f(BI
      const font = text[i + 1] === '(' ? text.slice(i + 2, i + 4) : (text[i + 1] ?? '');
      last.bold = font.includes('B');
      last.italic = font.includes('I');
      i += text[i + 1] === '(' ? 4 : 2;
    } else if (lower === 'w' && text[i + 1] === '(') {
      const close = text.indexOf(')', i);
      i = close === -1 ? text.length : close + 1;
    } else {
      i++;
    }
  }

  return columns;
}

/**
 * Format of cell `column` on a row using `formatLine`; columns past the end
 * reuse the last entry.
 */
export function formatForColumn(formatLine: ColumnFormat[], column: number): ColumnFormat {
  if (formatLine.length === 0) {
    return DEFAULT_FORMAT;
  }
  return formatLine[Math.min(column, formatLine.length - 1)];
}

/**
 * Format line used by data row `row`; rows past the end reuse the last line.
 */
export function formatLineForRow(spec: TableSpec, row: number): ColumnFormat[] {
  if (spec.formats.length === 0) {
    return [];
  }
  return spec.formats[Math.min(row, spec.formats.length - 1)];
}

/**
 * Number of leading rows rendered as header cells: one per format line
 * after the first, when more than one was given.
 */
export function headerRowCount(spec: TableSpec): number {
  return spec.formats.length > 1 ? spec.formats.length - 1 : 0;
}

function splitCells(row: string, separator: string): string[] {
  return row.split(separator).map(cell => cell
    .trim()
    .replace(/^T\{\s*/, '')
    .replace(/\s*T\}$/, ''));
}

const RULE_STYLES: Readonly<Record<ColumnRule, string | null>> = {
  none: null,
  single: 'border-left: 1px solid',
  double: 'border-left: 3px double',
};

function cellAttributes(format: ColumnFormat, colspan: number): string {
  const attributes: string[] = [];
  if (colspan > 1) {
    attributes.push(`colspan="${colspan}"`);
  }

  const styles: string[] = [];
  if (format.align === 'right' || format.align === 'numeric') {
    styles.push('text-align: right');
  } else if (format.align === 'center') {
    styles.push('text-align: center');
  }
  const rule = RULE_STYLES[format.rule];
  if (rule) {
    styles.push(rule);
  }
  if (styles.length > 0) {
    attributes.push(`style="${styles.join('; ')}"`);
  }
  return attributes.length > 0 ? ' ' + attributes.join(' ') : '';
}

/**
 * TableParser reads a `.TS` ... `.TE` block and renders it as an HTML table.
 *
 * Format phase: an optional options line ending in `;`, then format lines
 * up to the one ending in `.`. Body phase: data rows up to `.TE`, where a
 * `T{` ... `T}` cell may span several input lines.
 */
export class TableParser {
  constructor(private readonly renderCell: CellRenderer) {}

  /**
   * Consume the table from `nextLine`, the `.TS` line already read.
   */
  parse(nextLine: LineSupplier): TableSpec {
    let options: TableOptions = { box: false, separator: '\t' };
    const formats: ColumnFormat[][] = [];

    for (;;) {
      const line = nextLine();
      if (line === null || isTableEnd(line)) {
        return { options, formats, rows: [] };
      }
      const trimmed = line.trim();
      if (trimmed === '') {
        continue;
      }
      if (trimmed.endsWith(';')) {
        options = parseTableOptions(trimmed.slice(0, -1));
        continue;
      }
      const isLast = trimmed.endsWith('.');
      const body = isLast ? trimmed.slice(0, -1) : trimmed;
      for (const part of body.split(',')) {
        formats.push(parseFormatLine(part));
      }
      if (isLast) {
        break;
      }
    }

    return { options, formats, rows: this.readRows(nextLine) };
  }

  render(spec: TableSpec): string[] {
    const classes: string[] = [];
    if (spec.options.alignment) {
      classes.push(spec.options.alignment);
    }
    if (spec.options.box) {
      classes.push('box');
    }

    const lines = [classes.length > 0 ? `<table class="${classes.join(' ')}">` : '<table>'];
    const headerRows = headerRowCount(spec);

    spec.rows.forEach((row, rowIndex) => {
      const tag = rowIndex < headerRows ? 'th' : 'td';
      const formatLine = formatLineForRow(spec, rowIndex);
      const cells: Array<{ format: ColumnFormat; html: string; colspan: number }> = [];

      const texts = splitCells(row, spec.options.separator);
      // Spanned columns usually have no data of their own.
      const width = Math.max(texts.length, formatLine.length);
      for (let column = 0; column < width; column++) {
        const format = formatForColumn(formatLine, column);
        const previous = cells[cells.length - 1];
        if (format.align === 'span' && previous) {
          previous.colspan++;
          continue;
        }
        if (column >= texts.length) {
          break;
        }
        const font = format.bold ? '\\fB' : format.italic ? '\\fI' : '';
        cells.push({ format, html: this.renderCell(font + texts[column]), colspan: 1 });
      }

      const markup = cells
        .map(cell => `<${tag}${cellAttributes(cell.format, cell.colspan)}>${cell.html}</${tag}>`)
        .join('');
      lines.push(`<tr>${markup}</tr>`);
    });

    lines.push('</table>');
    return lines;
  }

  private readRows(nextLine: LineSupplier): string[] {
    const rows: string[] = [];

    for (;;) {
      const line = nextLine();
      if (line === null || isTableEnd(line)) {
        return rows;
      }
      const trimmed = line.trim();
      if (trimmed === '_' || trimmed === '=' || trimmed.startsWith('.')) {
        continue;
      }

      let logical = line;
      while (countOf(logical, 'T{') > countOf(logical, 'T}')) {
        const continuation = nextLine();
        if (continuation === null || isTableEnd(continuation)) {
          throw new ManError('TABLE_ERROR', 'unmatched T{ in table cell', { row: rows.length + 1 });
        }
        logical += ' ' + continuation;
      }
      rows.push(logical);
    }
  }
}
