/**
 * Tool request handlers for the MCP server.
 * Each handler validates its arguments and delegates to the core converter.
 */

import * as path from 'path';
import {
  ManConverter,
  OUTPUT_STRATEGY_NAMES,
  createOutputStrategy,
  supportedRequests,
} from '@manforge/core';
import type { Config, ConversionResult, Logger, SourceReader } from '@manforge/core';
import { formatErrorResponse, isErrorResponse, safeErrorHandler } from './utils/errors.js';
import {
  conversionArgumentProblems,
  createArgumentErrorResponse,
  resolvePagePath,
} from './utils/validation.js';

export interface Services {
  config: Config;
  reader: SourceReader;
  logger: Logger;
}

export type ToolArguments = Record<string, unknown>;

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

type ToolHandler = (args: ToolArguments, services: Services) => Promise<unknown>;

/**
 * Name given to text converted without a file; `.so` names in it resolve
 * against the workspace root.
 */
export const TEXT_SOURCE_NAME = 'stdin.man';

function stringArgument(args: ToolArguments, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' ? value : undefined;
}

function createConverter(args: ToolArguments, services: Services): ManConverter {
  const strategy = createOutputStrategy(stringArgument(args, 'format') ?? services.config.format, {
    permalink: stringArgument(args, 'permalink') ?? services.config.permalink,
  });
  return new ManConverter({ strategy, reader: services.reader, logger: services.logger });
}

function conversionResponse(result: ConversionResult) {
  return { output: result.output, warnings: result.warnings };
}

/**
 * Tool handler mapping - maps tool names to converter calls
 */
export const toolHandlers: Record<string, ToolHandler> = {
  convert_man_page: async (args, s) => {
    const problems = conversionArgumentProblems(args, 'path', s.config.workspaceRoot);
    const source = resolvePagePath(s.config.workspaceRoot, stringArgument(args, 'path') ?? '');
    if (problems.length > 0 || source === null) {
      return createArgumentErrorResponse(problems);
    }

    return conversionResponse(createConverter(args, s).convert(source));
  },

  convert_roff_text: async (args, s) => {
    const problems = conversionArgumentProblems(args, 'text', s.config.workspaceRoot);
    if (problems.length > 0) {
      return createArgumentErrorResponse(problems);
    }

    const name = path.join(s.config.workspaceRoot, TEXT_SOURCE_NAME);
    return conversionResponse(createConverter(args, s).convertText(stringArgument(args, 'text') ?? '', name));
  },

  list_supported_requests: async () => ({
    requests: supportedRequests(),
    formats: [...OUTPUT_STRATEGY_NAMES],
  }),
};

function textResult(text: string, isError: boolean = false): ToolResult {
  return isError
    ? { content: [{ type: 'text', text }], isError: true }
    : { content: [{ type: 'text', text }] };
}

/**
 * Run one tool call and wrap the outcome as MCP content. Failures come back
 * as an ErrorResponse with `isError` set; nothing is thrown.
 */
export async function handleToolCall(
  name: string,
  args: ToolArguments,
  services: Services
): Promise<ToolResult> {
  const handler = Object.prototype.hasOwnProperty.call(toolHandlers, name) ? toolHandlers[name] : undefined;
  if (!handler) {
    return textResult(formatErrorResponse({
      error: 'VALIDATION_ERROR',
      message: `Unknown tool: ${name}`,
      context: { tool: name },
      suggestions: [`Available tools: ${Object.keys(toolHandlers).join(', ')}`],
    }), true);
  }

  try {
    const result = await handler(args, services);
    if (isErrorResponse(result)) {
      return textResult(formatErrorResponse(result), true);
    }
    return textResult(JSON.stringify(result, null, 2));
  } catch (error) {
    services.logger.warn(`Tool ${name} failed: ${error instanceof Error ? error.message : String(error)}`);
    return textResult(formatErrorResponse(safeErrorHandler(error, `convert with ${name}`, { tool: name })), true);
  }
}
