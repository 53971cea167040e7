/**
 * Text normalization for display snippets and vector query text
 */

/** Maximum snippet length in characters */
export const SNIPPET_MAX_LENGTH = 200;

/** How far back from the limit a word boundary may be used */
export const SNIPPET_MAX_BACKTRACK = 50;

/** Ellipsis appended to truncated snippets */
export const ELLIPSIS = '…';

/** Embedding input limit for vector query text, in characters */
export const MAX_SOURCE_TEXT_LENGTH = 2000;

/**
 * Remove markup tags (and the bodies of script/style elements)
 */
export function stripMarkup(text: string): string {
  return text
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<[^>]*>/g, '');
}

/**
 * Collapse runs of whitespace into single spaces and trim
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Join a possibly multi-valued field into one string
 */
export function flattenField(value: string | readonly string[]): string {
  return typeof value === 'string' ? value : value.join(' ');
}

/**
 * Plain text from a markup field: tags stripped, whitespace collapsed
 */
export function toPlainText(value: string | readonly string[]): string {
  return collapseWhitespace(stripMarkup(flattenField(value)));
}

/**
 * Truncate to `maxLength` characters, preferring the last space when it lies
 * within `maxBacktrack` characters of the limit, and append an ellipsis
 */
export function truncateAtWordBoundary(
  text: string,
  maxLength: number = SNIPPET_MAX_LENGTH,
  maxBacktrack: number = SNIPPET_MAX_BACKTRACK
): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) {
    return text;
  }

  let cut = maxLength;
  const lastSpace = chars.lastIndexOf(' ', maxLength - 1);
  if (lastSpace > maxLength - maxBacktrack) {
    cut = lastSpace;
  }

  return chars.slice(0, cut).join('') + ELLIPSIS;
}

/**
 * Display snippet for a document's content field
 */
export function buildSnippet(content: string | readonly string[]): string {
  return truncateAtWordBoundary(toPlainText(content));
}

/**
 * Query text for text-to-vector search: title and body as plain text,
 * cut to the embedding input limit
 */
export function buildSourceText(
  title: string | readonly string[],
  content: string | readonly string[],
  maxLength: number = MAX_SOURCE_TEXT_LENGTH
): string {
  const text = collapseWhitespace(`${toPlainText(title)} ${toPlainText(content)}`);
  const chars = Array.from(text);
  return chars.length > maxLength ? chars.slice(0, maxLength).join('') : text;
}

/**
 * Human-readable label for a document type token
 *
 * `tx_news_domain_model_news` → `News news`, `pages` → `Pages`
 */
export function buildTypeLabel(type: string): string {
  const label = type.replaceAll('tx_', '').replaceAll('_domain_model_', ' ').trim();
  return label.charAt(0).toUpperCase() + label.slice(1);
}
