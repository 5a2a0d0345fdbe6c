/**
 * Bare URLs in running text: scheme, dotted host, slash-separated path
 * segments, an optional extension on the last one and an optional final slash.
 */
const URL_PATTERN = /\bhttps?:\/\/[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*(?:\/[A-Za-z0-9_~%+-]+)*(?:\.[A-Za-z0-9]+)?\/?/g;

/**
 * Placeholder hosts that are never linked.
 */
export const UNLINKED_URL_PARTS: readonly string[] = ['example.com', 'localhost'];

/**
 * Wrap bare http(s) URLs in anchors.
 */
export function linkUrls(text: string): string {
  return text.replace(URL_PATTERN, url => {
    if (UNLINKED_URL_PARTS.some(part => url.includes(part))) {
      return url;
    }
    return `<a href="${url}">${url}</a>`;
  });
}
