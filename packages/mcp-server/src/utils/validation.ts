/**
 * Argument checks for the conversion tools.
 * Each check returns the problem it found, or null.
 */

import * as path from 'path';
import { OUTPUT_STRATEGY_NAMES } from '@manforge/core';
import type { ErrorResponse } from '@manforge/core';

export interface ArgumentProblem {
  argument: string;
  message: string;
  value?: unknown;
}

type Arguments = Record<string, unknown>;

/**
 * A string argument. Required ones must also be non-blank.
 */
export function checkText(args: Arguments, argument: string, required: boolean = true): ArgumentProblem | null {
  const value = args[argument];
  if (value === undefined || value === null) {
    return required ? { argument, message: `${argument} is required` } : null;
  }
  if (typeof value !== 'string') {
    return { argument, message: `${argument} must be a string`, value };
  }
  if (required && value.trim() === '') {
    return { argument, message: `${argument} cannot be empty`, value };
  }
  return null;
}

/**
 * The optional output format selector.
 */
export function checkFormat(args: Arguments): ArgumentProblem | null {
  const value = args.format;
  if (value === undefined || value === null) {
    return null;
  }
  const names: readonly string[] = OUTPUT_STRATEGY_NAMES;
  if (typeof value !== 'string' || !names.includes(value)) {
    return { argument: 'format', message: `format must be one of: ${names.join(', ')}`, value };
  }
  return null;
}

/**
 * Absolute location of a page named relative to the workspace root (or
 * absolutely), or null when it lies outside the root.
 */
export function resolvePagePath(workspaceRoot: string, pagePath: string): string | null {
  const root = path.resolve(workspaceRoot);
  const resolved = path.resolve(root, pagePath);
  const relative = path.relative(root, resolved);
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }
  return resolved;
}

/**
 * The page path of convert_man_page: a non-blank string inside the workspace.
 */
export function checkPagePath(args: Arguments, workspaceRoot: string): ArgumentProblem | null {
  const problem = checkText(args, 'path');
  if (problem) {
    return problem;
  }
  const value = args.path;
  if (typeof value === 'string' && resolvePagePath(workspaceRoot, value) === null) {
    return { argument: 'path', message: `path must be inside the workspace root ${workspaceRoot}`, value };
  }
  return null;
}

/**
 * Every problem with the arguments of a conversion tool, in argument order.
 * `subject` is the argument carrying the input: a page path or roff text.
 */
export function conversionArgumentProblems(
  args: Arguments,
  subject: 'path' | 'text',
  workspaceRoot: string
): ArgumentProblem[] {
  const checks = [
    subject === 'path' ? checkPagePath(args, workspaceRoot) : checkText(args, 'text'),
    checkFormat(args),
    checkText(args, 'permalink', false),
  ];
  return checks.filter((problem): problem is ArgumentProblem => problem !== null);
}

export function createArgumentErrorResponse(problems: ArgumentProblem[]): ErrorResponse {
  return {
    error: 'VALIDATION_ERROR',
    message: problems.length === 1
      ? problems[0].message
      : `${problems.length} validation errors found`,
    context: {
      problems: problems.map(problem => ({
        argument: problem.argument,
        message: problem.message,
        value: problem.value,
      })),
    },
    suggestions: [
      'Pass path as a man page under the workspace root, or text as roff source',
      'Call list_supported_requests to see the accepted output formats',
    ],
  };
}
