/**
 * @exsync/eas-sync - XML escaping
 */

const ESCAPES: Array<[RegExp, string]> = [
  [/&/g, '&amp;'],
  [/</g, '&lt;'],
  [/>/g, '&gt;'],
  [/"/g, '&quot;'],
  [/'/g, '&apos;'],
];

const UNESCAPES: Array<[RegExp, string]> = [
  [/&lt;/g, '<'],
  [/&gt;/g, '>'],
  [/&quot;/g, '"'],
  [/&apos;/g, "'"],
  // Last, so "&amp;lt;" decodes to "&lt;" and not "<"
  [/&amp;/g, '&'],
];

/**
 * Escape text for element content or attribute values
 */
export function escapeXml(text: string): string {
  return ESCAPES.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), text);
}

export function unescapeXml(text: string): string {
  return UNESCAPES.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), text);
}
