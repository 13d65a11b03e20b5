/**
 * @exsync/eas-sync - Response Extractor
 *
 * Tag-based value extraction. Server responses are not always well-formed
 * across Exchange versions, so nothing here parses a document tree; each
 * lookup is a regular expression over the raw text. Absence is `null`,
 * never an exception.
 */

// =============================================================================
// Pattern Cache
// =============================================================================

const patternCache = new Map<string, RegExp>();

function cached(key: string, build: () => RegExp): RegExp {
  let pattern = patternCache.get(key);
  if (!pattern) {
    pattern = build();
    patternCache.set(key, pattern);
  }
  return pattern;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * `<tag>` with optional attributes and, when `anyPrefix` is set, any
 * namespace prefix (`<airsync:tag>`).
 */
function elementPattern(tag: string, anyPrefix: boolean, flags: string): RegExp {
  return cached(`${flags}|${anyPrefix ? '*' : ''}|${tag}`, () => {
    const name = escapeRegExp(tag);
    const prefix = anyPrefix ? '(?:[\\w-]+:)?' : '';
    return new RegExp(`<${prefix}${name}(?:\\s[^>]*)?>([\\s\\S]*?)</${prefix}${name}>`, flags);
  });
}

// =============================================================================
// Scalar Extraction
// =============================================================================

/**
 * Trimmed content of the first `tag` element. A bare tag name also matches
 * prefixed forms; a prefixed name (`notes:Subject`) matches only itself.
 */
export function extractValue(xml: string, tag: string): string | null {
  if (!xml) {
    return null;
  }
  const anyPrefix = !tag.includes(':');
  const value = elementPattern(tag, anyPrefix, '').exec(xml)?.[1];
  return value === undefined ? null : value.trim();
}

/**
 * Try each namespace prefix in order, then the bare tag
 */
export function extractWithNamespaces(
  xml: string,
  tag: string,
  prefixes: readonly string[]
): string | null {
  for (const prefix of prefixes) {
    const value = extractValue(xml, `${prefix}:${tag}`);
    if (value !== null) {
      return value;
    }
  }
  return extractValue(xml, tag);
}

export const extractNote = (xml: string, tag: string): string | null =>
  extractWithNamespaces(xml, tag, ['notes']);

export const extractTask = (xml: string, tag: string): string | null =>
  extractWithNamespaces(xml, tag, ['tasks']);

export const extractEmail = (xml: string, tag: string): string | null =>
  extractWithNamespaces(xml, tag, ['email']);

export const extractContact = (xml: string, tag: string): string | null =>
  extractWithNamespaces(xml, tag, ['contacts', 'contacts2']);

export const extractGal = (xml: string, tag: string): string | null =>
  extractWithNamespaces(xml, tag, ['gal']);

export const extractEws = (xml: string, tag: string): string | null =>
  extractWithNamespaces(xml, tag, ['t', 'm']);

/**
 * Attribute value of the first `element`, trying the `t:` prefix first
 */
export function extractAttribute(xml: string, element: string, attribute: string): string | null {
  for (const name of [`t:${element}`, element]) {
    const pattern = cached(`attr|${name}|${attribute}`, () => {
      return new RegExp(
        `<${escapeRegExp(name)}\\s[^>]*?\\b${escapeRegExp(attribute)}="([^"]*)"`
      );
    });
    const value = pattern.exec(xml)?.[1];
    if (value !== undefined) {
      return value;
    }
  }
  return null;
}

/**
 * True for `<tag>`, `<tag/>` or `<tag attr="...">`, with any prefix
 */
export function hasElement(xml: string, tag: string): boolean {
  const pattern = cached(`has|${tag}`, () => {
    return new RegExp(`<(?:[\\w-]+:)?${escapeRegExp(tag)}(?:\\s[^>]*)?/?>`);
  });
  return pattern.test(xml);
}

// =============================================================================
// Block Extraction
// =============================================================================

/**
 * Inner content of every `tag` element, in document order
 */
export function extractBlocks(xml: string, tag: string): string[] {
  if (!xml) {
    return [];
  }
  const anyPrefix = !tag.includes(':');
  return Array.from(xml.matchAll(elementPattern(tag, anyPrefix, 'g')), (match) => match[1] ?? '');
}

/**
 * Inner content of the first `tag` element
 */
export function extractBlock(xml: string, tag: string): string | null {
  return extractBlocks(xml, tag)[0] ?? null;
}

export function extractInt(xml: string, tag: string): number | null {
  const value = extractValue(xml, tag);
  if (value === null) {
    return null;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? null : parsed;
}
