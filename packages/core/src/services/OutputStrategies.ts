import { stringify } from 'yaml';
import type {
  OutputStrategy,
  OutputStrategyName,
  OutputStrategyOptions,
  TitleInfo,
  TitleMarkup,
} from '../types/index.js';
import { ManError } from '../utils/errors.js';

export const OUTPUT_STRATEGY_NAMES: readonly OutputStrategyName[] = ['html', 'frontmatter', 'raw'];

/**
 * Conventional manual section titles.
 */
export const SECTION_DESCRIPTIONS: Readonly<Record<string, string>> = {
  '1': 'User Commands',
  '2': 'System Calls',
  '3': 'Library Functions',
  '4': 'Devices',
  '5': 'File Formats',
  '6': 'Games',
  '7': 'Miscellaneous',
  '8': 'System Administration',
  '9': 'Kernel Routines',
};

export function isOutputStrategyName(value: string): value is OutputStrategyName {
  const names: readonly string[] = OUTPUT_STRATEGY_NAMES;
  return names.includes(value);
}

export function describeSection(section: string): string {
  const description = Object.prototype.hasOwnProperty.call(SECTION_DESCRIPTIONS, section)
    ? SECTION_DESCRIPTIONS[section]
    : undefined;
  return description ? `${section} (${description})` : section;
}

function pageTitle(title: TitleInfo): string {
  return title.section ? `${title.name}(${title.section})` : title.name;
}

/**
 * Complete HTML document: preamble at `.TH`, closing tags at end of input.
 */
export class HtmlStrategy implements OutputStrategy {
  readonly name = 'html' as const;

  renderTitle(title: TitleInfo): TitleMarkup {
    return {
      header: [
        '<!DOCTYPE html>',
        '<html>',
        '<head>',
        '<meta http-equiv="Content-Type" content="text/html; charset=UTF-8">',
        `<title>${pageTitle(title)}</title>`,
        '</head>',
        '<body>',
      ],
      trailer: ['</body>', '</html>'],
    };
  }
}

/**
 * HTML fragment preceded by a YAML front-matter block, for static site
 * generators. Only fields that were supplied are written.
 */
export class FrontMatterStrategy implements OutputStrategy {
  readonly name = 'frontmatter' as const;

  constructor(private readonly options: OutputStrategyOptions = {}) {}

  renderTitle(title: TitleInfo): TitleMarkup {
    const fields: Record<string, string> = {};
    if (this.options.permalink) {
      fields.permalink = this.options.permalink;
    }
    fields.layout = 'manpage';
    fields.title = pageTitle(title);
    if (title.source) {
      fields.package = title.source;
    }
    if (title.date) {
      fields.date = title.date;
    }
    if (title.section) {
      fields.section = describeSection(title.section);
    }

    const body = stringify(fields).trimEnd().split('\n');
    return { header: ['---', ...body, '---'], trailer: [] };
  }
}

/**
 * Bare fragment: nothing around the converted body.
 */
export class RawStrategy implements OutputStrategy {
  readonly name = 'raw' as const;

  renderTitle(_title: TitleInfo): TitleMarkup {
    return { header: [], trailer: [] };
  }
}

/**
 * Build the strategy for a selector such as "html".
 *
 * @throws ManError (CONFIGURATION_ERROR) for an unknown selector
 */
export function createOutputStrategy(name: string, options: OutputStrategyOptions = {}): OutputStrategy {
  switch (name) {
    case 'html':
      return new HtmlStrategy();
    case 'frontmatter':
      return new FrontMatterStrategy(options);
    case 'raw':
      return new RawStrategy();
    default:
      throw new ManError(
        'CONFIGURATION_ERROR',
        `unknown output format "${name}" (expected one of: ${OUTPUT_STRATEGY_NAMES.join(', ')})`,
        { format: name }
      );
  }
}
