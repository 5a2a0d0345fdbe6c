import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { MemorySourceReader } from '@manforge/core';
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE, USAGE, run } from '../../src/cli.js';
import type { CliEnvironment } from '../../src/cli.js';

const PAGE = '.TH LS 1\n.SH NAME\nls \\- list';

describe('manforge CLI', () => {
  let tempDir: string;
  let stdout: string[];
  let stderr: string[];
  let reader: MemorySourceReader;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'manforge-cli-test-'));
    stdout = [];
    stderr = [];
    reader = new MemorySourceReader({ 'page.man': PAGE });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function environment(env: NodeJS.ProcessEnv = {}): CliEnvironment {
    return {
      stdout: { write: chunk => stdout.push(chunk) },
      stderr: { write: chunk => stderr.push(chunk) },
      env: { MANFORGE_WORKSPACE_ROOT: tempDir, ...env },
      reader,
    };
  }

  describe('conversion', () => {
    it('should write the converted page to standard output', () => {
      expect(run(['-f', 'raw', 'page.man'], environment())).toBe(EXIT_SUCCESS);
      expect(stdout.join('')).toBe('<h1 id="NAME"><a href="#NAME">NAME</a></h1>\nls &ndash; list\n');
      expect(stderr).toEqual([]);
    });

    it('should produce a complete document by default', () => {
      expect(run(['page.man'], environment())).toBe(EXIT_SUCCESS);
      const output = stdout.join('');
      expect(output.startsWith('<!DOCTYPE html>\n')).toBe(true);
      expect(output.endsWith('</body>\n</html>\n')).toBe(true);
    });

    it('should read standard input without an input argument', () => {
      reader.set('-', 'from stdin');
      expect(run(['--format', 'raw'], environment())).toBe(EXIT_SUCCESS);
      expect(stdout.join('')).toBe('from stdin\n');
    });

    it('should take the format and permalink from flags', () => {
      expect(run(['-f', 'frontmatter', '-p', '/man/ls.html', 'page.man'], environment())).toBe(EXIT_SUCCESS);
      const lines = stdout.join('').split('\n');
      expect(lines[0]).toBe('---');
      expect(lines[1]).toBe('permalink: /man/ls.html');
    });

    it('should fall back to the configured format', () => {
      expect(run(['page.man'], environment({ MANFORGE_FORMAT: 'raw' }))).toBe(EXIT_SUCCESS);
      expect(stdout.join('').startsWith('<h1 id="NAME">')).toBe(true);
    });

    it('should write to an output file', async () => {
      const output = path.join(tempDir, 'ls.html');

      expect(run(['-f', 'raw', '-o', output, 'page.man'], environment())).toBe(EXIT_SUCCESS);
      expect(await fs.readFile(output, 'utf-8')).toBe('<h1 id="NAME"><a href="#NAME">NAME</a></h1>\nls &ndash; list\n');
      expect(stdout).toEqual([]);
    });
  });

  describe('diagnostics', () => {
    it('should log warnings to standard error', () => {
      reader.set('odd.man', '.XY\ntext');

      expect(run(['-f', 'raw', 'odd.man'], environment())).toBe(EXIT_SUCCESS);
      expect(stderr).toHaveLength(1);
      expect(stderr[0]).toMatch(/\[WARN\] odd\.man:1: unsupported request \.XY\n$/);
    });

    it('should keep quiet when asked', () => {
      reader.set('odd.man', '.XY\ntext');

      expect(run(['-q', '-f', 'raw', 'odd.man'], environment())).toBe(EXIT_SUCCESS);
      expect(stderr).toEqual([]);
    });

    it('should warn about invalid configuration', () => {
      expect(run(['-f', 'raw', 'page.man'], environment({ MANFORGE_LOG_LEVEL: 'loud' }))).toBe(EXIT_SUCCESS);
      expect(stderr.join('')).toContain(
        '[WARN] Configuration: MANFORGE_LOG_LEVEL must be one of: debug, info, warn, error'
      );
    });
  });

  describe('failures', () => {
    it('should exit with 1 when the input is missing', () => {
      expect(run(['missing.man'], environment())).toBe(EXIT_FAILURE);
      expect(stderr.join('')).toBe('manforge: cannot open missing.man: no such document\n');
      expect(stdout).toEqual([]);
    });

    it('should exit with 1 on a malformed table', () => {
      reader.set('table.man', '.TS\nl.\nx\tT{\n.TE');
      expect(run(['table.man'], environment())).toBe(EXIT_FAILURE);
      expect(stderr.join('')).toBe('manforge: unmatched T{ in table cell\n');
    });

    it('should exit with 1 when the output cannot be written', () => {
      const output = path.join(tempDir, 'no', 'such', 'dir', 'ls.html');

      expect(run(['-o', output, 'page.man'], environment())).toBe(EXIT_FAILURE);
      expect(stderr.join('').startsWith(`manforge: cannot open ${output}: `)).toBe(true);
    });
  });

  describe('usage', () => {
    it('should print help', () => {
      expect(run(['--help'], environment())).toBe(EXIT_SUCCESS);
      expect(stdout.join('')).toBe(USAGE);
    });

    it('should reject an unknown format', () => {
      expect(run(['-f', 'pdf', 'page.man'], environment())).toBe(EXIT_USAGE);
      expect(stderr.join('')).toBe('manforge: unknown output format "pdf" (expected one of: html, frontmatter, raw)\n');
    });

    it('should reject unknown options', () => {
      expect(run(['--bogus', 'page.man'], environment())).toBe(EXIT_USAGE);
      expect(stderr.join('').startsWith('manforge: ')).toBe(true);
    });

    it('should reject more than one input', () => {
      expect(run(['a.man', 'b.man'], environment())).toBe(EXIT_USAGE);
      expect(stderr.join('')).toBe("manforge: expected one input, got 2\nTry 'manforge --help' for more information.\n");
    });
  });
});
