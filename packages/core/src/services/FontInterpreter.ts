import type { Font, FontState } from '../types/index.js';

type FontTarget = Font | 'P';

const FONT_ESCAPE = /\\f(?:\[([^\]]*)\]|\((..)|(.))/g;

const OPEN_TAGS: Record<Font, string> = { B: '<b>', I: '<i>', R: '' };
const CLOSE_TAGS: Record<Font, string> = { B: '</b>', I: '</i>', R: '' };

/**
 * Fonts applied by the single-font macros.
 */
export const SINGLE_FONT_MACROS: ReadonlyMap<string, Font> = new Map<string, Font>([
  ['B', 'B'],
  ['I', 'I'],
  ['SB', 'B'],
  ['SM', 'R'],
]);

/**
 * Alternating-font macros; each letter is the font of every other argument.
 */
export const ALTERNATING_FONT_MACROS: ReadonlySet<string> = new Set(['BI', 'IB', 'BR', 'RB', 'IR', 'RI']);

function resolveFont(name: string): FontTarget | null {
  switch (name) {
    case 'B':
    case '3':
      return 'B';
    case 'I':
    case '2':
      return 'I';
    case 'R':
    case '1':
      return 'R';
    case 'P':
    case '':
      return 'P';
    default:
      return null;
  }
}

/**
 * Interprets inline font escapes (`\fB`, `\fI`, `\fR`, `\fP` and friends)
 * into `<b>`/`<i>` elements.
 *
 * Only the current and previous font are remembered, so `\fP` swaps the two
 * and never reaches further back. Between calls the state persists, which is
 * how a bold run started on one line of running text continues on the next.
 */
export class FontInterpreter {
  private state: FontState = { current: 'R', previous: 'R' };

  /**
   * Replace every font escape in `text` with markup.
   *
   * @param addClose close the open element at the end and reset to roman
   */
  apply(text: string, addClose: boolean = false): string {
    let output = text.replace(FONT_ESCAPE,
      (_match: string, bracketed: string | undefined, twoChar: string | undefined, single: string | undefined) => {
        const target = resolveFont(bracketed ?? twoChar ?? single ?? '');
        return target === null ? '' : this.switchTo(target);
      });

    if (addClose) {
      output += this.close();
    }
    return output;
  }

  /**
   * Close the open element, if any, and reset to roman/roman.
   */
  close(): string {
    const markup = CLOSE_TAGS[this.state.current];
    this.state = { current: 'R', previous: 'R' };
    return markup;
  }

  getState(): FontState {
    return { ...this.state };
  }

  private switchTo(target: FontTarget): string {
    const closing = CLOSE_TAGS[this.state.current];
    if (target === 'P') {
      this.state = { current: this.state.previous, previous: this.state.current };
    } else {
      this.state = { current: target, previous: this.state.current };
    }
    return closing + OPEN_TAGS[this.state.current];
  }
}

/**
 * Rewrite a font macro (`.B`, `.BR`, ...) as text with inline font escapes.
 *
 * Single-font macros join their arguments with spaces; alternating macros
 * concatenate them, cycling through the letters of the macro name.
 */
export function fontMacroToEscapes(macro: string, args: string[]): string {
  const single = SINGLE_FONT_MACROS.get(macro);
  if (single !== undefined) {
    return `\\f${single}${args.join(' ')}`;
  }

  if (ALTERNATING_FONT_MACROS.has(macro)) {
    return args.map((arg, index) => `\\f${macro[index % macro.length]}${arg}`).join('');
  }

  return args.join(' ');
}

export function isFontMacro(name: string): boolean {
  return SINGLE_FONT_MACROS.has(name) || ALTERNATING_FONT_MACROS.has(name);
}
