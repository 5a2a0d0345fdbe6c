import { parseArgs } from 'util';
import {
  FileSourceReader,
  LoggingService,
  LogLevel,
  ManConverter,
  STDIN_NAME,
  configuredLogLevel,
  createOutputStrategy,
  isManError,
  loadConfig,
  validateConfig,
} from '@manforge/core';
import type { LogStream, SourceReader } from '@manforge/core';
import { writeOutput } from './output.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: manforge [options] [input]

Convert a man page to HTML. Reads standard input when input is omitted or "-".

Options:
  -o, --output FILE       write to FILE instead of standard output
  -f, --format FORMAT     html, frontmatter or raw (default: html)
  -p, --permalink URL     permalink for the front-matter block
  -q, --quiet             report errors only
  -v, --verbose           log debug information
  -h, --help              show this help
`;

/**
 * Streams and environment the CLI runs against.
 */
export interface CliEnvironment {
  stdout: LogStream;
  stderr: LogStream;
  env: NodeJS.ProcessEnv;
  reader?: SourceReader;         // Defaults to the filesystem
}

interface CliOptions {
  input: string;
  output?: string;
  format?: string;
  permalink?: string;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
}

function parseOptions(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      output: { type: 'string', short: 'o' },
      format: { type: 'string', short: 'f' },
      permalink: { type: 'string', short: 'p' },
      quiet: { type: 'boolean', short: 'q' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
    strict: true,
  });

  if (positionals.length > 1) {
    throw new TypeError(`expected one input, got ${positionals.length}`);
  }

  return {
    input: positionals[0] ?? STDIN_NAME,
    output: values.output,
    format: values.format,
    permalink: values.permalink,
    quiet: values.quiet ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

/**
 * Run the command line. Returns the exit status instead of exiting.
 */
export function run(argv: string[], environment: CliEnvironment): number {
  const { stdout, stderr } = environment;

  let options: CliOptions;
  try {
    options = parseOptions(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    stderr.write(`manforge: ${message}\nTry 'manforge --help' for more information.\n`);
    return EXIT_USAGE;
  }

  if (options.help) {
    stdout.write(USAGE);
    return EXIT_SUCCESS;
  }

  const config = loadConfig(environment.env);
  const level = options.verbose ? LogLevel.DEBUG : options.quiet ? LogLevel.ERROR : configuredLogLevel(config);
  const logger = new LoggingService(level, stderr);
  for (const problem of validateConfig(config)) {
    logger.warn(`Configuration: ${problem}`);
  }

  let converter: ManConverter;
  try {
    const strategy = createOutputStrategy(options.format ?? config.format, {
      permalink: options.permalink ?? config.permalink,
    });
    converter = new ManConverter({
      strategy,
      reader: environment.reader ?? new FileSourceReader(),
      logger,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    stderr.write(`manforge: ${message}\n`);
    return EXIT_USAGE;
  }

  try {
    const result = converter.convert(options.input);
    writeOutput(result.lines, options.output, stdout);
    return EXIT_SUCCESS;
  } catch (error) {
    if (isManError(error)) {
      logger.debug(`${error.type}: ${JSON.stringify(error.context)}`);
      stderr.write(`manforge: ${error.message}\n`);
    } else {
      logger.error('Unexpected failure', error instanceof Error ? error : undefined);
      stderr.write(`manforge: ${error instanceof Error ? error.message : String(error)}\n`);
    }
    return EXIT_FAILURE;
  }
}
