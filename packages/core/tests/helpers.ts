import { jest } from '@jest/globals';
import type { LineSupplier } from '../src/parsers/TableParser.js';

/**
 * Logger whose methods are jest mocks.
 */
export function createMockLogger() {
  return {
    debug: jest.fn<(message: string, ...args: unknown[]) => void>(),
    info: jest.fn<(message: string, ...args: unknown[]) => void>(),
    warn: jest.fn<(message: string, ...args: unknown[]) => void>(),
    error: jest.fn<(message: string, error?: Error, ...args: unknown[]) => void>(),
  };
}

/**
 * Feed a fixed list of lines, then null.
 */
export function lineSupplier(lines: string[]): LineSupplier {
  let index = 0;
  return () => (index < lines.length ? lines[index++] : null);
}

/**
 * Number of entries exactly equal to `line`.
 */
export function countLines(lines: string[], line: string): number {
  return lines.filter(candidate => candidate === line).length;
}
