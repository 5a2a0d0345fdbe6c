import type { ConversionResult, Logger, OutputStrategy } from '../types/index.js';
import { InputResolver } from '../managers/InputResolver.js';
import { HtmlStrategy } from '../services/OutputStrategies.js';
import { SpecialCharacterTranslator } from '../services/SpecialCharacterTranslator.js';
import { silentLogger } from '../utils/LoggingService.js';
import { ChainedSourceReader, FileSourceReader, MemorySourceReader } from '../utils/sources.js';
import type { SourceReader } from '../utils/sources.js';
import { MacroDispatcher } from './MacroDispatcher.js';

export interface ManConverterOptions {
  strategy?: OutputStrategy;     // Defaults to a complete HTML document
  reader?: SourceReader;         // Defaults to the filesystem
  logger?: Logger;               // Defaults to discarding messages
}

/**
 * ManConverter converts man pages into HTML.
 *
 * Each call to `convert` or `convertText` runs a fresh interpreter, so one
 * converter can be reused for many documents.
 *
 * @example
 * const converter = new ManConverter({ strategy: createOutputStrategy('raw') });
 * const { output } = converter.convertText('.SH NAME\nls \\- list files');
 */
export class ManConverter {
  private readonly strategy: OutputStrategy;
  private readonly reader: SourceReader;
  private readonly logger: Logger;
  private readonly specials = new SpecialCharacterTranslator();

  constructor(options: ManConverterOptions = {}) {
    this.strategy = options.strategy ?? new HtmlStrategy();
    this.reader = options.reader ?? new FileSourceReader();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Convert a named source (`-` for standard input).
   *
   * @throws ManError on fatal problems: missing sources, malformed tables
   */
  convert(sourceName: string): ConversionResult {
    return this.run(sourceName, this.reader);
  }

  /**
   * Convert an in-memory document. `.so` requests inside it are read through
   * the configured reader, relative to `name`'s directory.
   */
  convertText(text: string, name: string = 'stdin.man'): ConversionResult {
    const memory = new MemorySourceReader({ [name]: text });
    return this.run(name, new ChainedSourceReader([memory, this.reader]));
  }

  getStrategy(): OutputStrategy {
    return this.strategy;
  }

  private run(sourceName: string, reader: SourceReader): ConversionResult {
    const input = new InputResolver(reader);
    input.open(sourceName);

    this.logger.debug(`Converting ${sourceName} (${this.strategy.name})`);
    const dispatcher = new MacroDispatcher(input, this.strategy, this.specials, this.logger);
    dispatcher.run();

    const lines = dispatcher.getOutput();
    const warnings = dispatcher.getWarnings();
    this.logger.info(`Converted ${sourceName}: ${lines.length} lines, ${warnings.length} warnings`);

    return { output: lines.join('\n'), lines, warnings };
  }
}
