/**
 * Property-based tests for BlockStateManager
 *
 * Every list element opened is closed exactly once, whatever order the
 * block requests arrive in, including unbalanced margin exits.
 */

import { describe, it, expect } from '@jest/globals';
import * as fc from 'fast-check';
import { BlockStateManager } from '../../src/managers/BlockStateManager.js';
import { countLines } from '../helpers.js';

type BlockOperation = 'paragraph' | 'indented' | 'bullet' | 'term' | 'enter' | 'exit' | 'heading';

function applyOperation(blocks: BlockStateManager, operation: BlockOperation): string[] {
  switch (operation) {
    case 'paragraph':
      return blocks.paragraph();
    case 'indented':
      return blocks.indentedParagraph();
    case 'bullet':
      return blocks.bulletItem('item');
    case 'term':
      return blocks.definitionTerm('term');
    case 'enter':
      blocks.enterMargin();
      return [];
    case 'exit':
      return blocks.exitMargin().closing;
    case 'heading':
      return blocks.heading(1, 'H', 'H');
  }
}

describe('BlockStateManager - Property-Based Tests', () => {
  const operationArbitrary = fc.constantFrom<BlockOperation>(
    'paragraph', 'indented', 'bullet', 'term', 'enter', 'exit', 'heading'
  );

  it('should close every element it opens', () => {
    fc.assert(
      fc.property(fc.array(operationArbitrary, { maxLength: 40 }), operations => {
        const blocks = new BlockStateManager();
        const output = operations.flatMap(operation => applyOperation(blocks, operation));
        output.push(...blocks.closeAll());

        expect(countLines(output, '<ul>')).toBe(countLines(output, '</ul>'));
        expect(countLines(output, '<dl>')).toBe(countLines(output, '</dl>'));
        expect(countLines(output, '<dd>')).toBe(countLines(output, '</dd>'));
        expect(countLines(output, '<li>item')).toBe(countLines(output, '</li>'));
        expect(blocks.getModes()).toEqual(['paragraph']);
      })
    );
  });

  it('should never drop below the base level', () => {
    fc.assert(
      fc.property(fc.array(operationArbitrary, { maxLength: 40 }), operations => {
        const blocks = new BlockStateManager();
        for (const operation of operations) {
          applyOperation(blocks, operation);
          expect(blocks.depth()).toBeGreaterThanOrEqual(1);
        }
      })
    );
  });
});
