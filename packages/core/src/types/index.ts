/**
 * Core type definitions for the manforge converter.
 */

// ============================================================================
// Font Models
// ============================================================================

/**
 * A concrete font: bold, italic or roman (no markup).
 */
export type Font = 'B' | 'I' | 'R';

/**
 * Current and previous font. A pop escape swaps the two.
 */
export interface FontState {
  current: Font;
  previous: Font;
}

// ============================================================================
// Block Models
// ============================================================================

/**
 * Structural context of one margin level.
 */
export type BlockMode = 'paragraph' | 'bullet-list' | 'definition-list';

// ============================================================================
// Table Models
// ============================================================================

export type ColumnAlign = 'left' | 'right' | 'center' | 'numeric' | 'span';

export type ColumnRule = 'none' | 'single' | 'double';

/**
 * One column entry of a table format line (e.g. `lb`, `r`, `|c`).
 */
export interface ColumnFormat {
  align: ColumnAlign;
  bold: boolean;
  italic: boolean;
  rule: ColumnRule;              // Vertical rule drawn before the column
}

/**
 * Table-wide options from the `...;` line.
 */
export interface TableOptions {
  alignment?: 'center' | 'expand';
  box: boolean;
  separator: string;             // Cell separator, tab unless tab(x) is given
}

/**
 * A parsed table block, before rendering.
 */
export interface TableSpec {
  options: TableOptions;
  formats: ColumnFormat[][];     // One entry per format line
  rows: string[];                // Logical data rows, multi-line cells joined
}

// ============================================================================
// Output Models
// ============================================================================

export type OutputStrategyName = 'html' | 'frontmatter' | 'raw';

/**
 * Arguments of the `.TH` request.
 */
export interface TitleInfo {
  name: string;
  section: string;
  date?: string;
  source?: string;
  manual?: string;
}

/**
 * Lines emitted for a title request, plus the trailer owed at end of input.
 */
export interface TitleMarkup {
  header: string[];
  trailer: string[];
}

export interface OutputStrategy {
  readonly name: OutputStrategyName;
  renderTitle(title: TitleInfo): TitleMarkup;
}

export interface OutputStrategyOptions {
  permalink?: string;
}

// ============================================================================
// Diagnostics Models
// ============================================================================

/**
 * Minimal logging surface the converter depends on.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, error?: Error, ...args: unknown[]): void;
}

/**
 * A recoverable problem found while converting.
 */
export interface Diagnostic {
  source: string;                // Source name
  line: number;                  // 1-based line number
  message: string;
}

/**
 * Position of the line currently being read.
 */
export interface SourceLocation {
  name: string;
  lineNumber: number;
}

// ============================================================================
// Conversion Models
// ============================================================================

export interface ConversionResult {
  output: string;                // Emitted lines joined with newlines
  lines: string[];
  warnings: Diagnostic[];
}

// ============================================================================
// Error Models
// ============================================================================

/**
 * Categories of fatal conversion errors.
 */
export type ManErrorType =
  | 'SOURCE_NOT_FOUND'
  | 'CONFIGURATION_ERROR'
  | 'TABLE_ERROR'
  | 'INCLUDE_ERROR'
  | 'OUTPUT_ERROR';

/**
 * Error types reported by tool surfaces
 */
export type ErrorType =
  | 'FILE_NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'PROCESSING_ERROR';

/**
 * Error response
 */
export interface ErrorResponse {
  error: ErrorType;              // Error type
  message: string;               // Error message
  context?: Record<string, unknown>;  // Error context
  suggestions?: string[];        // Suggested fixes
}
