import * as fs from 'fs';
import { ManError } from '@manforge/core';
import type { LogStream } from '@manforge/core';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Write the converted document to a file. The file is closed once the
 * whole document is written; a failed write or close is fatal.
 */
export function writeFile(file: string, text: string): void {
  let fd: number;
  try {
    fd = fs.openSync(file, 'w');
  } catch (error) {
    throw new ManError('OUTPUT_ERROR', `cannot open ${file}: ${describe(error)}`, { file });
  }

  let failure: unknown = null;
  try {
    fs.writeSync(fd, text);
  } catch (error) {
    failure = error;
  }
  try {
    fs.closeSync(fd);
  } catch (error) {
    failure = failure ?? error;
  }

  if (failure !== null) {
    throw new ManError('OUTPUT_ERROR', `cannot write ${file}: ${describe(failure)}`, { file });
  }
}

/**
 * Send the document to `file`, or to `stdout` when no file is named.
 */
export function writeOutput(lines: string[], file: string | undefined, stdout: LogStream): void {
  const text = lines.map(line => `${line}\n`).join('');
  if (file === undefined || file === '-') {
    stdout.write(text);
    return;
  }
  writeFile(file, text);
}
