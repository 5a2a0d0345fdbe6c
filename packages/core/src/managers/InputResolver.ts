import * as path from 'path';
import type { SourceLocation } from '../types/index.js';
import type { LineSource, SourceReader } from '../utils/sources.js';
import { STDIN_NAME } from '../utils/sources.js';
import { ManError } from '../utils/errors.js';

/**
 * Deepest `.so` nesting accepted before the include chain is rejected.
 */
export const MAX_INCLUDE_DEPTH = 32;

/**
 * One open source on the include stack.
 */
interface InputFrame {
  name: string;
  source: LineSource;
  lines: string[];
  lineNumber: number;          // Lines consumed so far
}

/**
 * InputResolver flattens nested `.so` inclusion into one stream of lines.
 *
 * The top frame is the active source. When it runs out it is closed and
 * popped and reading resumes in the frame below, at that frame's own line.
 */
export class InputResolver {
  private readonly frames: InputFrame[] = [];

  constructor(private readonly reader: SourceReader) {}

  /**
   * Open a source on top of the stack. Relative names are resolved against
   * the directory of the including source, when it has one.
   */
  open(name: string): void {
    const resolved = this.resolveName(name);
    this.checkInclude(resolved);
    const source = this.reader.open(resolved);
    let lines: string[];
    try {
      lines = source.readLines();
    } catch (error) {
      source.close();
      throw error;
    }
    this.frames.push({ name: resolved, source, lines, lineNumber: 0 });
  }

  /**
   * Next raw line, or null once every source is exhausted.
   */
  nextLine(): string | null {
    while (this.frames.length > 0) {
      const top = this.frames[this.frames.length - 1];
      if (top.lineNumber < top.lines.length) {
        const line = top.lines[top.lineNumber];
        top.lineNumber++;
        return line;
      }
      top.source.close();
      this.frames.pop();
    }
    return null;
  }

  /**
   * Name and line number of the line most recently read from the top frame.
   */
  location(): SourceLocation | null {
    const top = this.frames[this.frames.length - 1];
    return top ? { name: top.name, lineNumber: top.lineNumber } : null;
  }

  depth(): number {
    return this.frames.length;
  }

  /**
   * Close every open source, innermost first.
   */
  closeAll(): void {
    while (this.frames.length > 0) {
      const frame = this.frames.pop();
      frame?.source.close();
    }
  }

  /**
   * Names of the open sources, outermost first.
   */
  chain(): string[] {
    return this.frames.map(frame => frame.name);
  }

  private checkInclude(resolved: string): void {
    const chain = [...this.chain(), resolved];
    const key = path.normalize(resolved);
    if (this.frames.some(frame => path.normalize(frame.name) === key)) {
      throw new ManError('INCLUDE_ERROR', `.so cycle: ${chain.join(' -> ')}`, { source: resolved, chain });
    }
    if (this.frames.length >= MAX_INCLUDE_DEPTH) {
      throw new ManError('INCLUDE_ERROR', `.so nesting deeper than ${MAX_INCLUDE_DEPTH} levels at ${resolved}`, {
        source: resolved,
        chain,
      });
    }
  }

  private resolveName(name: string): string {
    if (name === STDIN_NAME || path.isAbsolute(name)) {
      return name;
    }
    const including = this.frames[this.frames.length - 1];
    if (!including || !including.name.includes('/')) {
      return name;
    }
    return path.join(path.dirname(including.name), name);
  }
}
