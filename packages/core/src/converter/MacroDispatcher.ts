import type { Diagnostic, Logger, OutputStrategy, TitleInfo } from '../types/index.js';
import { InputResolver } from '../managers/InputResolver.js';
import { BlockStateManager } from '../managers/BlockStateManager.js';
import { isRequestLine, splitRequest } from '../parsers/RequestLexer.js';
import { TableParser } from '../parsers/TableParser.js';
import { FontInterpreter, fontMacroToEscapes, isFontMacro } from '../services/FontInterpreter.js';
import { FragmentAllocator } from '../services/FragmentAllocator.js';
import { SpecialCharacterTranslator } from '../services/SpecialCharacterTranslator.js';
import { linkUrls } from '../services/UrlLinker.js';
import { BULLET_TAGS, REQUESTS } from './requests.js';
import type { RequestKind } from './requests.js';

/**
 * Remove a `\"` comment and everything after it.
 */
export function stripComment(line: string): string {
  return line.replace(/(?<!\\)\\".*$/, '');
}

/**
 * Text read for a `.TP`/`.IP` request, and a request line found in its place
 * that still has to be handled.
 */
interface Lookahead {
  text: string;
  deferred: string | null;
}

function assertNever(kind: never): never {
  throw new Error(`Unhandled request kind: ${String(kind)}`);
}

/**
 * MacroDispatcher drives one conversion: it pulls lines from the input
 * resolver, routes requests to their handlers and collects the output.
 *
 * All interpreter state (fonts, block modes, anchors, trailer) lives on the
 * instance, so a dispatcher converts exactly one document.
 */
export class MacroDispatcher {
  private readonly fonts = new FontInterpreter();
  private readonly blocks = new BlockStateManager();
  private readonly fragments = new FragmentAllocator();
  private readonly tables: TableParser;
  private readonly output: string[] = [];
  private readonly warnings: Diagnostic[] = [];
  private trailer: string[] = [];
  private titled = false;
  private noFill = false;

  constructor(
    private readonly input: InputResolver,
    private readonly strategy: OutputStrategy,
    private readonly specials: SpecialCharacterTranslator,
    private readonly logger: Logger
  ) {
    this.tables = new TableParser(text => this.expandInline(text));
  }

  /**
   * Convert every line the resolver yields. On a fatal error all open
   * sources are closed before the error propagates.
   */
  run(): void {
    try {
      for (let line = this.input.nextLine(); line !== null; line = this.input.nextLine()) {
        this.processLine(line);
      }
      this.finish();
    } catch (error) {
      this.input.closeAll();
      throw error;
    }
  }

  getOutput(): string[] {
    return [...this.output];
  }

  getWarnings(): Diagnostic[] {
    return [...this.warnings];
  }

  /**
   * Handle one independent input line.
   */
  processLine(raw: string): void {
    const line = stripComment(raw);
    if (line !== raw && line.trim() === '') {
      return;
    }

    if (isRequestLine(line)) {
      this.dispatch(line.slice(1));
      return;
    }

    if (line.trim() === '') {
      this.emptyLine();
      return;
    }

    this.emit(this.expandText(line));
  }

  /**
   * Running text: special characters, then fonts (left open across lines),
   * then URLs.
   */
  expandText(text: string): string {
    return linkUrls(this.fonts.apply(this.specials.translate(text)));
  }

  /**
   * Self-contained text (headings, cells, macro arguments): fonts are closed
   * at the end.
   */
  expandInline(text: string): string {
    return this.fonts.apply(this.specials.translate(text), true);
  }

  private dispatch(requestText: string): void {
    const words = splitRequest(requestText);
    if (words.length === 0) {
      return;
    }

    const [command, ...args] = words;
    const kind = REQUESTS.get(command);
    if (kind === undefined) {
      this.warn(`unsupported request .${command}`);
      return;
    }

    this.logger.debug(`${this.where()}: .${command} (${kind})`);
    this.handle(kind, command, args);
  }

  private handle(kind: RequestKind, command: string, args: string[]): void {
    switch (kind) {
      case 'title':
        this.title(args);
        return;
      case 'heading':
        this.heading(1, args);
        return;
      case 'subheading':
        this.heading(2, args);
        return;
      case 'paragraph':
        this.emit(...this.blocks.paragraph());
        return;
      case 'indented-paragraph':
        this.indentedParagraph(args);
        return;
      case 'tagged-paragraph': {
        const term = this.readLookahead(command);
        this.emit(...this.blocks.definitionTerm(term.text));
        this.replay(term);
        return;
      }
      case 'enter-margin':
        this.blocks.enterMargin();
        return;
      case 'exit-margin':
        this.exitMargin();
        return;
      case 'font':
        if (args.length > 0) {
          this.emit(this.expandInline(fontMacroToEscapes(command, args)));
        }
        return;
      case 'table-start':
        this.table();
        return;
      case 'include':
        this.include(args);
        return;
      case 'no-fill':
        if (!this.noFill) {
          this.emit('<pre>');
          this.noFill = true;
        }
        return;
      case 'fill':
        if (this.noFill) {
          this.emit('</pre>');
          this.noFill = false;
        }
        return;
      case 'line-break':
        if (!this.noFill) {
          this.emit('<br>');
        }
        return;
      case 'vertical-space':
        this.emit(this.noFill ? '' : '<br>');
        return;
      case 'table-end':
      case 'ignored':
        return;
      default:
        assertNever(kind);
    }
  }

  private title(args: string[]): void {
    if (this.titled) {
      this.warn('repeated .TH ignored');
      return;
    }
    this.titled = true;
    const [name = '', section = '', date, source, manual] = args;
    const title: TitleInfo = {
      name: this.specials.translate(name),
      section: this.specials.translate(section),
      date,
      source,
      manual,
    };
    const markup = this.strategy.renderTitle(title);
    this.emit(...markup.header);
    this.trailer = markup.trailer;
  }

  private heading(level: 1 | 2, args: string[]): void {
    const text = args.join(' ');
    if (text.trim() === '') {
      this.warn(`empty heading`);
      return;
    }
    this.closeRunningFont();
    const label = this.expandInline(text);
    const id = this.fragments.allocate(label);
    this.emit(...this.blocks.heading(level, id, label));
  }

  private indentedParagraph(args: string[]): void {
    const tag = args[0];
    if (tag === undefined || tag === '') {
      this.emit(...this.blocks.indentedParagraph());
    } else if (BULLET_TAGS.has(tag)) {
      const body = this.readLookahead('IP');
      this.emit(...this.blocks.bulletItem(body.text));
      this.replay(body);
    } else {
      this.emit(...this.blocks.definitionTerm(this.expandInline(tag)));
    }
  }

  private exitMargin(): void {
    const { closing, underflow } = this.blocks.exitMargin();
    if (underflow) {
      this.warn('.RE without matching .RS');
    }
    this.emit(...closing);
  }

  private table(): void {
    const spec = this.tables.parse(() => this.input.nextLine());
    this.emit(...this.tables.render(spec));
  }

  private include(args: string[]): void {
    const name = args[0];
    if (!name) {
      this.warn('.so without a file name');
      return;
    }
    this.logger.debug(`${this.where()}: including ${name}`);
    this.input.open(name);
  }

  private emptyLine(): void {
    if (this.noFill) {
      this.emit('');
    } else {
      this.emit(...this.blocks.paragraph());
    }
  }

  /**
   * Read the line that belongs to the current `.TP`/`.IP` request. A font
   * macro line is rendered as that macro. Any other request leaves the text
   * empty and is handed back to be dispatched after the item is opened.
   */
  private readLookahead(command: string): Lookahead {
    const raw = this.input.nextLine();
    if (raw === null) {
      this.warn(`.${command} at end of input`);
      return { text: '', deferred: null };
    }

    const line = stripComment(raw);
    if (isRequestLine(line)) {
      const [macro, ...args] = splitRequest(line.slice(1));
      if (macro !== undefined && isFontMacro(macro)) {
        return { text: this.expandInline(fontMacroToEscapes(macro, args)), deferred: null };
      }
      this.warn(`request .${macro ?? ''} cannot follow .${command}`);
      return { text: '', deferred: raw };
    }

    return { text: linkUrls(this.expandInline(line)), deferred: null };
  }

  private replay(lookahead: Lookahead): void {
    if (lookahead.deferred !== null) {
      this.processLine(lookahead.deferred);
    }
  }

  /**
   * Close a font left open by running text.
   */
  private closeRunningFont(): void {
    const openFont = this.fonts.close();
    if (openFont) {
      this.emit(openFont);
    }
  }

  private finish(): void {
    this.closeRunningFont();
    if (this.noFill) {
      this.emit('</pre>');
      this.noFill = false;
    }
    this.emit(...this.blocks.closeAll());
    this.emit(...this.trailer);
    this.trailer = [];
  }

  private emit(...lines: string[]): void {
    this.output.push(...lines);
  }

  private where(): string {
    const location = this.input.location();
    return location ? `${location.name}:${location.lineNumber}` : '<end of input>';
  }

  private warn(message: string): void {
    const location = this.input.location();
    this.warnings.push({
      source: location?.name ?? '',
      line: location?.lineNumber ?? 0,
      message,
    });
    this.logger.warn(`${this.where()}: ${message}`);
  }
}
