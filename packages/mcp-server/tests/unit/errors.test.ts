/**
 * Unit tests for error response formatter
 * Tests error creation functions for various error scenarios
 */

import { describe, it, expect } from '@jest/globals';
import { ManError } from '@manforge/core';
import type { ErrorResponse } from '@manforge/core';
import {
  createConfigurationError,
  createFileNotFoundError,
  createProcessingError,
  formatErrorResponse,
  isErrorResponse,
  safeErrorHandler,
} from '../../src/utils/errors.js';

describe('Error Utilities', () => {
  describe('createFileNotFoundError', () => {
    it('should create error for a man page', () => {
      const error = createFileNotFoundError('/work/man/ls.1', 'cannot open /work/man/ls.1: ENOENT');

      expect(error.error).toBe('FILE_NOT_FOUND');
      expect(error.message).toBe('man page not found: ls.1');
      expect(error.context).toEqual({
        path: '/work/man/ls.1',
        reason: 'cannot open /work/man/ls.1: ENOENT',
      });
      expect(error.suggestions?.some(s => s.includes('.so'))).toBe(true);
    });

    it('should leave out an absent reason', () => {
      const error = createFileNotFoundError('/work/man/cp.1');
      expect(error.context).toEqual({ path: '/work/man/cp.1' });
    });
  });

  describe('createProcessingError', () => {
    it('should suggest table fixes for text block errors', () => {
      const error = createProcessingError('convert page', new Error('unmatched T{ in table cell'), { row: 3 });

      expect(error.error).toBe('PROCESSING_ERROR');
      expect(error.message).toBe('Failed to convert page: unmatched T{ in table cell');
      expect(error.context).toEqual({
        operation: 'convert page',
        errorDetails: 'unmatched T{ in table cell',
        row: 3,
      });
      expect(error.suggestions?.[0]).toContain('T}');
    });

    it('should accept non-Error values', () => {
      const error = createProcessingError('load', 'plain failure');
      expect(error.message).toBe('Failed to load: plain failure');
      expect(error.suggestions).toHaveLength(2);
    });

    it('should suggest include fixes for .so failures', () => {
      const error = createProcessingError('convert page', new Error('.so cycle: a.man -> a.man'));
      expect(error.suggestions?.[0]).toBe('Remove the .so request that includes a page already being read');
    });
  });

  describe('createConfigurationError', () => {
    it('should name the key and the issue', () => {
      const error = createConfigurationError('format', 'unknown output format "pdf"');

      expect(error.error).toBe('VALIDATION_ERROR');
      expect(error.message).toBe('Configuration error: format - unknown output format "pdf"');
    });
  });

  describe('isErrorResponse', () => {
    it('should recognise error responses only', () => {
      expect(isErrorResponse({ error: 'PROCESSING_ERROR', message: 'x' })).toBe(true);
      expect(isErrorResponse({ output: '', warnings: [] })).toBe(false);
      expect(isErrorResponse(null)).toBe(false);
      expect(isErrorResponse('error')).toBe(false);
    });
  });

  describe('formatErrorResponse', () => {
    it('should format as indented JSON', () => {
      const error: ErrorResponse = { error: 'VALIDATION_ERROR', message: 'x' };
      expect(formatErrorResponse(error)).toBe('{\n  "error": "VALIDATION_ERROR",\n  "message": "x"\n}');
    });
  });

  describe('safeErrorHandler', () => {
    it('should pass error responses through', () => {
      const error: ErrorResponse = { error: 'VALIDATION_ERROR', message: 'x' };
      expect(safeErrorHandler(error, 'op')).toBe(error);
    });

    it('should map missing sources to file errors', () => {
      const response = safeErrorHandler(
        new ManError('SOURCE_NOT_FOUND', 'cannot open a.man: no such document', { source: 'a.man' }),
        'op'
      );

      expect(response.error).toBe('FILE_NOT_FOUND');
      expect(response.message).toBe('man page not found: a.man');
    });

    it('should cope with a missing source name', () => {
      const response = safeErrorHandler(new ManError('SOURCE_NOT_FOUND', 'cannot open'), 'op');
      expect(response.context?.path).toBe('unknown');
    });

    it('should map include failures to processing errors', () => {
      const response = safeErrorHandler(
        new ManError('INCLUDE_ERROR', '.so cycle: a.man -> a.man', { source: 'a.man', chain: ['a.man'] }),
        'convert page'
      );

      expect(response.error).toBe('PROCESSING_ERROR');
      expect(response.message).toBe('Failed to convert page: .so cycle: a.man -> a.man');
      expect(response.context).toMatchObject({ source: 'a.man', chain: ['a.man'] });
    });

    it('should map output failures to processing errors', () => {
      const response = safeErrorHandler(
        new ManError('OUTPUT_ERROR', 'cannot write out.html: EACCES', { file: 'out.html' }),
        'write output',
        { tool: 'x' }
      );

      expect(response.error).toBe('PROCESSING_ERROR');
      expect(response.message).toBe('Failed to write output: cannot write out.html: EACCES');
      expect(response.context).toMatchObject({ file: 'out.html', tool: 'x' });
    });

    it('should wrap unknown errors', () => {
      const response = safeErrorHandler(new Error('boom'), 'convert text');
      expect(response.message).toBe('Failed to convert text: boom');
    });
  });
});
