/**
 * @manforge/core
 *
 * Converts man pages written in the roff `man` macro language into HTML.
 * Shared by the command-line tool and the MCP server.
 *
 * @packageDocumentation
 */

// ============================================================================
// Type Exports
// ============================================================================

/**
 * Interpreter Models
 *
 * Font, block and table state.
 */
export type {
  Font,
  FontState,
  BlockMode,
  ColumnAlign,
  ColumnRule,
  ColumnFormat,
  TableOptions,
  TableSpec,
} from './types/index.js';

/**
 * Output Models
 *
 * Output strategies and title metadata.
 */
export type {
  OutputStrategy,
  OutputStrategyName,
  OutputStrategyOptions,
  TitleInfo,
  TitleMarkup,
} from './types/index.js';

/**
 * Diagnostics and Results
 */
export type {
  Logger,
  Diagnostic,
  SourceLocation,
  ConversionResult,
  ManErrorType,
  ErrorType,
  ErrorResponse,
} from './types/index.js';

// ============================================================================
// Converter
// ============================================================================

export { ManConverter } from './converter/ManConverter.js';
export type { ManConverterOptions } from './converter/ManConverter.js';
export { MacroDispatcher, stripComment } from './converter/MacroDispatcher.js';
export { REQUESTS, BULLET_TAGS, supportedRequests } from './converter/requests.js';
export type { RequestKind } from './converter/requests.js';

// ============================================================================
// Managers
// ============================================================================

export { InputResolver, MAX_INCLUDE_DEPTH } from './managers/InputResolver.js';
export { BlockStateManager } from './managers/BlockStateManager.js';
export type { MarginExit } from './managers/BlockStateManager.js';

// ============================================================================
// Parsers
// ============================================================================

export { splitRequest, isRequestLine } from './parsers/RequestLexer.js';
export {
  TableParser,
  parseTableOptions,
  parseFormatLine,
  formatForColumn,
  formatLineForRow,
  headerRowCount,
  isTableEnd,
} from './parsers/TableParser.js';
export type { LineSupplier, CellRenderer } from './parsers/TableParser.js';

// ============================================================================
// Services
// ============================================================================

export { SpecialCharacterTranslator } from './services/SpecialCharacterTranslator.js';
export type { CharacterTables, TextTransform } from './services/SpecialCharacterTranslator.js';
export {
  FontInterpreter,
  fontMacroToEscapes,
  isFontMacro,
  SINGLE_FONT_MACROS,
  ALTERNATING_FONT_MACROS,
} from './services/FontInterpreter.js';
export { FragmentAllocator } from './services/FragmentAllocator.js';
export { linkUrls, UNLINKED_URL_PARTS } from './services/UrlLinker.js';
export {
  HtmlStrategy,
  FrontMatterStrategy,
  RawStrategy,
  createOutputStrategy,
  isOutputStrategyName,
  describeSection,
  OUTPUT_STRATEGY_NAMES,
  SECTION_DESCRIPTIONS,
} from './services/OutputStrategies.js';

// ============================================================================
// Configuration
// ============================================================================

export { loadConfig, validateConfig, configuredLogLevel } from './config.js';
export type { Config } from './config.js';

// ============================================================================
// Utilities
// ============================================================================

export { ManError, isManError } from './utils/errors.js';
export { LoggingService, LogLevel, parseLogLevel, silentLogger } from './utils/LoggingService.js';
export type { LogStream } from './utils/LoggingService.js';
export {
  FileSourceReader,
  MemorySourceReader,
  ChainedSourceReader,
  splitLines,
  STDIN_NAME,
} from './utils/sources.js';
export type { LineSource, SourceReader } from './utils/sources.js';
