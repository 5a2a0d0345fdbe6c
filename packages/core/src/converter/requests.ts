/**
 * The fixed set of requests the converter understands.
 */
export type RequestKind =
  | 'title'
  | 'heading'
  | 'subheading'
  | 'paragraph'
  | 'indented-paragraph'
  | 'tagged-paragraph'
  | 'enter-margin'
  | 'exit-margin'
  | 'font'
  | 'table-start'
  | 'table-end'
  | 'include'
  | 'no-fill'
  | 'fill'
  | 'line-break'
  | 'vertical-space'
  | 'ignored';

export const REQUESTS: ReadonlyMap<string, RequestKind> = new Map<string, RequestKind>([
  ['TH', 'title'],
  ['SH', 'heading'],
  ['SS', 'subheading'],
  ['PP', 'paragraph'],
  ['P', 'paragraph'],
  ['LP', 'paragraph'],
  ['HP', 'paragraph'],
  ['IP', 'indented-paragraph'],
  ['TP', 'tagged-paragraph'],
  ['RS', 'enter-margin'],
  ['RE', 'exit-margin'],
  ['B', 'font'],
  ['I', 'font'],
  ['SB', 'font'],
  ['SM', 'font'],
  ['BI', 'font'],
  ['IB', 'font'],
  ['BR', 'font'],
  ['RB', 'font'],
  ['IR', 'font'],
  ['RI', 'font'],
  ['TS', 'table-start'],
  ['TE', 'table-end'],
  ['so', 'include'],
  ['nf', 'no-fill'],
  ['EX', 'no-fill'],
  ['fi', 'fill'],
  ['EE', 'fill'],
  ['br', 'line-break'],
  ['sp', 'vertical-space'],
  // Layout requests with no HTML counterpart.
  ['ad', 'ignored'],
  ['na', 'ignored'],
  ['hy', 'ignored'],
  ['nh', 'ignored'],
  ['ne', 'ignored'],
  ['in', 'ignored'],
  ['ti', 'ignored'],
  ['ll', 'ignored'],
  ['ps', 'ignored'],
  ['vs', 'ignored'],
  ['PD', 'ignored'],
  ['IX', 'ignored'],
  ['fl', 'ignored'],
  ['ft', 'ignored'],
]);

/**
 * `.IP` tags that mark a bulleted item rather than a definition term.
 */
export const BULLET_TAGS: ReadonlySet<string> = new Set([
  '\\(bu',
  '\\[bu]',
  '\\(em',
  '\\[em]',
  '\\(ci',
  '\\-',
  '•',
  '*',
  '-',
  '+',
  'o',
]);

export function supportedRequests(): string[] {
  return [...REQUESTS.keys()];
}
