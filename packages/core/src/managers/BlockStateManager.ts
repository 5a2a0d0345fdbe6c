import type { BlockMode } from '../types/index.js';

/**
 * Markup owed when a block of each mode is closed.
 */
const CLOSING_MARKUP: Record<BlockMode, readonly string[]> = {
  'paragraph': [],
  'bullet-list': ['</li>', '</ul>'],
  'definition-list': ['</dd>', '</dl>'],
};

export interface MarginExit {
  closing: string[];
  underflow: boolean;            // `.RE` without a matching `.RS`
}

/**
 * BlockStateManager tracks which block (paragraph, bullet list, definition
 * list) is open at each margin level and produces the markup to open, continue
 * or close it.
 *
 * One mode slot per margin level: `.RS` pushes a fresh paragraph level and
 * `.RE` pops it, closing whatever list was opened inside. The base level is
 * never popped.
 */
export class BlockStateManager {
  private modes: BlockMode[] = ['paragraph'];

  current(): BlockMode {
    return this.modes[this.modes.length - 1];
  }

  depth(): number {
    return this.modes.length;
  }

  /**
   * Snapshot of the mode stack, base first.
   */
  getModes(): BlockMode[] {
    return [...this.modes];
  }

  enterMargin(): void {
    this.modes.push('paragraph');
  }

  /**
   * Pop one margin level and return what it owes. Popping the base level
   * closes it, resets the stack and reports an underflow.
   */
  exitMargin(): MarginExit {
    if (this.modes.length === 1) {
      const closing = this.closeCurrent();
      this.modes = ['paragraph'];
      return { closing, underflow: true };
    }

    const mode = this.modes.pop() ?? 'paragraph';
    return { closing: [...CLOSING_MARKUP[mode]], underflow: false };
  }

  /**
   * Close the open list at the current level, if any, and fall back to
   * paragraph mode.
   */
  closeCurrent(): string[] {
    const closing = [...CLOSING_MARKUP[this.current()]];
    this.setCurrent('paragraph');
    return closing;
  }

  /**
   * Plain paragraph break.
   */
  paragraph(): string[] {
    return [...this.closeCurrent(), '<p>'];
  }

  /**
   * Paragraph inside the current block (`.IP` without a tag): lists stay open.
   */
  indentedParagraph(): string[] {
    return ['<p>'];
  }

  heading(level: 1 | 2, id: string, label: string): string[] {
    return [
      ...this.closeCurrent(),
      `<h${level} id="${id}"><a href="#${id}">${label}</a></h${level}>`,
    ];
  }

  bulletItem(body: string): string[] {
    const lines: string[] = [];
    if (this.current() === 'bullet-list') {
      lines.push('</li>');
    } else {
      lines.push(...this.closeCurrent(), '<ul>');
      this.setCurrent('bullet-list');
    }
    lines.push(`<li>${body}`);
    return lines;
  }

  definitionTerm(term: string): string[] {
    const lines: string[] = [];
    if (this.current() === 'definition-list') {
      lines.push('</dd>');
    } else {
      lines.push(...this.closeCurrent(), '<dl>');
      this.setCurrent('definition-list');
    }
    lines.push(`<dt>${term}</dt>`, '<dd>');
    return lines;
  }

  /**
   * Close every level, innermost first, leaving a single paragraph level.
   */
  closeAll(): string[] {
    const closing: string[] = [];
    for (let i = this.modes.length - 1; i >= 0; i--) {
      closing.push(...CLOSING_MARKUP[this.modes[i]]);
    }
    this.modes = ['paragraph'];
    return closing;
  }

  private setCurrent(mode: BlockMode): void {
    this.modes[this.modes.length - 1] = mode;
  }
}
