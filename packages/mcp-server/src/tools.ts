import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { OUTPUT_STRATEGY_NAMES } from '@manforge/core';

/**
 * Shared schema definitions
 */
const formatSchema = {
  type: 'string',
  enum: [...OUTPUT_STRATEGY_NAMES],
  description: 'Optional: Output format. "html" is a complete document, "frontmatter" a fragment with a YAML header, "raw" a bare fragment. Defaults to MANFORGE_FORMAT or html',
};

const permalinkSchema = {
  type: 'string',
  description: 'Optional: Permalink written to the front-matter block (frontmatter format only)',
};

/**
 * Tool definitions for the MCP server.
 *
 * Each tool defines:
 * - name: Unique tool identifier
 * - description: User-friendly description
 * - inputSchema: JSON Schema for input validation
 */
export const tools: Tool[] = [
  {
    name: 'convert_man_page',
    description: 'Convert a man page file written with the roff man macros into HTML. Relative paths are resolved against the workspace root. Returns the converted output and any warnings about unsupported requests.',
    inputSchema: {
      type: 'object',
      properties: {
        path: {
          type: 'string',
          description: 'Path to the man page source, e.g. "man/ls.1"',
        },
        format: formatSchema,
        permalink: permalinkSchema,
      },
      required: ['path'],
    },
  },
  {
    name: 'convert_roff_text',
    description: 'Convert roff man-macro text into HTML. Use this for snippets that are not saved in a file. .so requests are resolved against the workspace root.',
    inputSchema: {
      type: 'object',
      properties: {
        text: {
          type: 'string',
          description: 'roff source text, e.g. ".SH NAME\\nls \\\\- list directory contents"',
        },
        format: formatSchema,
        permalink: permalinkSchema,
      },
      required: ['text'],
    },
  },
  {
    name: 'list_supported_requests',
    description: 'List the roff requests and macros the converter understands, and the available output formats.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
];
