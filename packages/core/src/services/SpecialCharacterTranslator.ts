import specialCharacters from '../data/special-characters.json';

/**
 * Lookup tables for named characters (`\(xx`, `\[name]`) and predefined
 * strings (`\*(xx`, `\*x`, `\*[name]`).
 */
export interface CharacterTables {
  characters: Record<string, string>;
  strings: Record<string, string>;
}

/**
 * A named, pure text-to-text pass.
 */
export interface TextTransform {
  name: string;
  apply(text: string): string;
}

// Stands in for a literal backslash (`\\`, `\e`, `\(rs`) until the restore pass.
const BACKSLASH_PLACEHOLDER = '\u0002';

// Entities the passes themselves produce besides those in the tables.
const BUILTIN_ENTITIES = ['amp', 'lt', 'gt', 'nbsp', 'quot'];

/**
 * Matches an `&` that does not start a numeric reference or one of `names`.
 */
function entityAmpersand(names: Iterable<string>): RegExp {
  const alternatives = [...new Set(names)].join('|');
  return new RegExp(`&(?!(?:${alternatives}|#[0-9]+|#[xX][0-9A-Fa-f]+);)`, 'g');
}

function entityNames(values: Iterable<string>): string[] {
  const names: string[] = [];
  for (const value of values) {
    for (const match of value.matchAll(/&([A-Za-z][A-Za-z0-9]*);/g)) {
      names.push(match[1]);
    }
  }
  return names;
}

/**
 * Translates roff special-character escapes into HTML entities.
 *
 * The passes run in a fixed order and each one assumes the previous ones
 * have run: a literal `\\` is set aside before anything can read it as the
 * start of an escape, ampersands are escaped before any entity is produced,
 * and `<`/`>` are escaped last so that no pass sees its own output as markup.
 * Only entities the tables produce survive the ampersand pass. Table values
 * never contain `<`, `>` or a bare `&`, which makes translation a no-op on
 * already translated text.
 */
export class SpecialCharacterTranslator {
  private readonly characters: Map<string, string>;
  private readonly strings: Map<string, string>;
  private readonly passes: TextTransform[];

  constructor(tables: CharacterTables = specialCharacters) {
    this.characters = new Map(Object.entries(tables.characters));
    this.strings = new Map(Object.entries(tables.strings));
    const ampersand = entityAmpersand([
      ...BUILTIN_ENTITIES,
      ...entityNames(this.characters.values()),
      ...entityNames(this.strings.values()),
    ]);
    this.passes = [
      { name: 'protect-backslash', apply: text => text.replace(/\\[\\e]/g, BACKSLASH_PLACEHOLDER) },
      { name: 'strip-zero-width', apply: text => text.replace(/\\&/g, '') },
      { name: 'normalize-hyphen', apply: text => text.replace(/\\-/g, '\\(en') },
      { name: 'escape-ampersand', apply: text => text.replace(ampersand, '&amp;') },
      { name: 'named-characters', apply: text => this.translateNamed(text) },
      { name: 'bracketed-characters', apply: text => this.translateBracketed(text) },
      { name: 'spacing-escapes', apply: text => translateSpacing(text) },
      { name: 'restore-backslash', apply: text => text.split(BACKSLASH_PLACEHOLDER).join('\\') },
      { name: 'predefined-strings', apply: text => this.expandStrings(text) },
      { name: 'escape-angle-brackets', apply: text => text.replace(/</g, '&lt;').replace(/>/g, '&gt;') },
    ];
  }

  /**
   * Run every pass over the text, in order.
   */
  translate(text: string): string {
    return this.passes.reduce((current, pass) => pass.apply(current), text);
  }

  /**
   * Names of the passes in the order they run.
   */
  passNames(): string[] {
    return this.passes.map(pass => pass.name);
  }

  /**
   * Look up a character name, e.g. `bu` or `lq`.
   */
  lookup(name: string): string | undefined {
    return this.characters.get(name);
  }

  characterNames(): string[] {
    return [...this.characters.keys()];
  }

  private protect(value: string): string {
    return value === '\\' ? BACKSLASH_PLACEHOLDER : value;
  }

  private translateNamed(text: string): string {
    return text.replace(/\\\((.{2})/g, (match: string, name: string) => {
      const value = this.characters.get(name);
      return value === undefined ? match : this.protect(value);
    });
  }

  private translateBracketed(text: string): string {
    return text.replace(/\\\[([^\]\s]+)\]/g, (match: string, name: string) => {
      const value = this.characters.get(name);
      if (value !== undefined) {
        return this.protect(value);
      }
      const codePoint = /^u([0-9A-Fa-f]{4,6})$/.exec(name);
      if (codePoint) {
        return `&#x${codePoint[1].toUpperCase()};`;
      }
      return match;
    });
  }

  private expandStrings(text: string): string {
    return text.replace(/\\\*(?:\((.{2})|\[([^\]]+)\]|([^([]))/g,
      (match: string, twoLetter: string | undefined, bracketed: string | undefined, single: string | undefined) => {
        const name = twoLetter ?? bracketed ?? single ?? '';
        const value = this.strings.get(name);
        return value === undefined ? match : value;
      });
  }
}

/**
 * Unpaddable spaces become `&nbsp;`; zero-width and thin-space escapes vanish.
 */
function translateSpacing(text: string): string {
  return text
    .replace(/\\[ ~]/g, '&nbsp;')
    .replace(/\\0/g, ' ')
    .replace(/\\[|^c:,/]/g, '');
}
