import * as fs from 'fs';
import * as path from 'path';
import { ManError } from './errors.js';

/**
 * An opened input source. `close()` releases whatever `open()` acquired.
 */
export interface LineSource {
  readonly name: string;
  readLines(): string[];
  close(): void;
}

/**
 * Opens named sources for the input resolver.
 */
export interface SourceReader {
  open(name: string): LineSource;
}

/**
 * Name that stands for standard input.
 */
export const STDIN_NAME = '-';

/**
 * Split source text into lines, dropping the empty line after a final newline
 * and any carriage return before a newline.
 */
export function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split('\n').map(line => line.endsWith('\r') ? line.slice(0, -1) : line);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

class FileLineSource implements LineSource {
  private closed = false;

  constructor(readonly name: string, private readonly fd: number, private readonly ownsFd: boolean) {}

  readLines(): string[] {
    return splitLines(fs.readFileSync(this.fd, 'utf-8'));
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.ownsFd) {
      fs.closeSync(this.fd);
    }
  }
}

/**
 * Reads sources from the filesystem; `-` is standard input.
 */
export class FileSourceReader implements SourceReader {
  open(name: string): LineSource {
    if (name === STDIN_NAME) {
      return new FileLineSource(name, 0, false);
    }

    let fd: number;
    try {
      fd = fs.openSync(name, 'r');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ManError('SOURCE_NOT_FOUND', `cannot open ${name}: ${reason}`, { source: name });
    }
    return new FileLineSource(name, fd, true);
  }
}

/**
 * Serves documents from memory. Records open/close order so callers can
 * check that every source was released.
 */
export class MemorySourceReader implements SourceReader {
  private readonly documents = new Map<string, string>();
  readonly opened: string[] = [];
  readonly closed: string[] = [];

  constructor(documents: Record<string, string> = {}) {
    for (const [name, text] of Object.entries(documents)) {
      this.set(name, text);
    }
  }

  set(name: string, text: string): void {
    this.documents.set(path.posix.normalize(name), text);
  }

  open(name: string): LineSource {
    const key = path.posix.normalize(name);
    const text = this.documents.get(key);
    if (text === undefined) {
      throw new ManError('SOURCE_NOT_FOUND', `cannot open ${name}: no such document`, { source: name });
    }
    this.opened.push(key);

    let isClosed = false;
    return {
      name: key,
      readLines: () => splitLines(text),
      close: () => {
        if (!isClosed) {
          isClosed = true;
          this.closed.push(key);
        }
      },
    };
  }
}

/**
 * Tries each reader in turn; the first that can open a name wins.
 */
export class ChainedSourceReader implements SourceReader {
  constructor(private readonly readers: SourceReader[]) {}

  open(name: string): LineSource {
    let lastError: unknown = new ManError('SOURCE_NOT_FOUND', `cannot open ${name}`, { source: name });
    for (const reader of this.readers) {
      try {
        return reader.open(name);
      } catch (error) {
        lastError = error;
      }
    }
    throw lastError;
  }
}
