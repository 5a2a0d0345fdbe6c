/**
 * Splits request lines into a command name and its arguments.
 */

// Stand-in for `\ ` while splitting; never appears in real input.
const PROTECTED_SPACE = '\u0001';

/**
 * Split a request line (without its leading `.` or `'`) into words.
 *
 * - Words are separated by runs of spaces or tabs.
 * - A word starting with `"` runs to the next unpaired `"`; `""` inside it
 *   is a literal quote.
 * - `\ ` keeps a space inside a word.
 *
 * @returns The command name followed by its arguments; empty for a blank line.
 */
export function splitRequest(line: string): string[] {
  const text = line.replace(/(?<!\\)\\ /g, PROTECTED_SPACE);
  const words: string[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (ch === ' ' || ch === '\t') {
      i++;
      continue;
    }

    let word = '';
    if (ch === '"') {
      i++;
      while (i < text.length) {
        if (text[i] === '"') {
          if (text[i + 1] === '"') {
            word += '"';
            i += 2;
            continue;
          }
          i++;
          break;
        }
        word += text[i];
        i++;
      }
    } else {
      while (i < text.length && text[i] !== ' ' && text[i] !== '\t') {
        word += text[i];
        i++;
      }
    }

    words.push(word.split(PROTECTED_SPACE).join(' '));
  }

  return words;
}

/**
 * True for lines that introduce a request (`.XX` or `'XX`).
 */
export function isRequestLine(line: string): boolean {
  return line.startsWith('.') || line.startsWith("'");
}
