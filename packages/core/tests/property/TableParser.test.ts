/**
 * Property-based tests for TableParser
 *
 * - Cell k of a row gets the format of column k, or the last column's format
 *   past the end of the format line
 * - Only the rows covered by extra format lines are header rows
 */

import { describe, it, expect } from '@jest/globals';
import * as fc from 'fast-check';
import { TableParser } from '../../src/parsers/TableParser.js';
import { lineSupplier } from '../helpers.js';

describe('TableParser - Property-Based Tests', () => {
  const parser = new TableParser(text => text);

  const keyArbitrary = fc.constantFrom('l', 'r', 'c');
  const formatLineArbitrary = fc.array(keyArbitrary, { minLength: 1, maxLength: 4 });
  const rowArbitrary = fc.array(fc.stringMatching(/^[a-z]{1,5}$/), { minLength: 1, maxLength: 6 });

  const ALIGN_STYLE: Record<string, string> = {
    l: '',
    r: ' style="text-align: right"',
    c: ' style="text-align: center"',
  };

  it('should align each cell by its column format', () => {
    fc.assert(
      fc.property(
        fc.array(formatLineArbitrary, { minLength: 1, maxLength: 3 }),
        fc.array(rowArbitrary, { minLength: 1, maxLength: 5 }),
        (formatLines, rows) => {
          const input = [
            ...formatLines.map((keys, index) => keys.join(' ') + (index === formatLines.length - 1 ? '.' : '')),
            ...rows.map(cells => cells.join('\t')),
            '.TE',
          ];
          const html = parser.render(parser.parse(lineSupplier(input)));
          const headerRows = formatLines.length > 1 ? formatLines.length - 1 : 0;

          expect(html).toHaveLength(rows.length + 2);
          rows.forEach((cells, rowIndex) => {
            const keys = formatLines[Math.min(rowIndex, formatLines.length - 1)];
            const tag = rowIndex < headerRows ? 'th' : 'td';
            const expected = cells
              .map((cell, column) => {
                const key = keys[Math.min(column, keys.length - 1)];
                return `<${tag}${ALIGN_STYLE[key]}>${cell}</${tag}>`;
              })
              .join('');
            expect(html[rowIndex + 1]).toBe(`<tr>${expected}</tr>`);
          });
        }
      )
    );
  });
});
