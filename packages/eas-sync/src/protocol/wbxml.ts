/**
 * @exsync/eas-sync - WBXML Codec
 *
 * ActiveSync carries every command body as WBXML 1.3: each element is a
 * one-byte token on a numbered code page, text travels inline, and
 * attributes are never used. The builders and parsers work on XML; this
 * module translates at the transport boundary.
 *
 * Decoded documents put the root element's page in the default namespace
 * and every other page under its canonical prefix (`email:Subject`,
 * `airsyncbase:Body`), declared on the root.
 */

import { EasError } from '../interfaces/errors';
import { escapeXml, unescapeXml } from './xml-escape';
import codePageTable from './wbxml-code-pages.json';

// =============================================================================
// Constants
// =============================================================================

export const WBXML_CONTENT_TYPE = 'application/vnd.ms-sync.wbxml';

const WBXML_VERSION = 0x03;
const PUBLIC_ID_UNKNOWN = 0x01;
const CHARSET_UTF8 = 0x6a;

const Token = {
  SWITCH_PAGE: 0x00,
  END: 0x01,
  ENTITY: 0x02,
  STR_I: 0x03,
  STR_T: 0x83,
  OPAQUE: 0xc3,
} as const;

const TAG_ID_MASK = 0x3f;
const TAG_HAS_CONTENT = 0x40;
const TAG_HAS_ATTRIBUTES = 0x80;

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

// =============================================================================
// Code Pages
// =============================================================================

interface CodePageEntry {
  page: number;
  namespace: string;
  prefix: string;
  tags: Record<string, string>;
}

export interface CodePage {
  page: number;
  namespace: string;
  prefix: string;
  nameById: ReadonlyMap<number, string>;
  idByName: ReadonlyMap<string, number>;
}

function toCodePage(entry: CodePageEntry): CodePage {
  const nameById = new Map<number, string>();
  const idByName = new Map<string, number>();
  for (const [hex, name] of Object.entries(entry.tags)) {
    const id = parseInt(hex, 16);
    nameById.set(id, name);
    idByName.set(name, id);
  }
  return { page: entry.page, namespace: entry.namespace, prefix: entry.prefix, nameById, idByName };
}

const entries: readonly CodePageEntry[] = codePageTable;
const CODE_PAGES = entries.map(toCodePage);
const PAGE_BY_NUMBER = new Map(CODE_PAGES.map((page) => [page.page, page]));
// Exchange documents mix "GAL" and "Gal"
const PAGE_BY_NAMESPACE = new Map(CODE_PAGES.map((page) => [page.namespace.toLowerCase(), page]));

export function codePageFor(namespace: string): CodePage | null {
  return PAGE_BY_NAMESPACE.get(namespace.toLowerCase()) ?? null;
}

export function isWbxml(contentType: string | null, body: Uint8Array): boolean {
  if (contentType?.toLowerCase().includes(WBXML_CONTENT_TYPE)) {
    return true;
  }
  return body.length > 0 && body[0] === WBXML_VERSION;
}

// =============================================================================
// Encoding
// =============================================================================

// Declaration or comment | tag with slash, name, attributes, self-close | text
const XML_TOKEN = new RegExp(
  [
    '<\\?[\\s\\S]*?\\?>',
    '<!--[\\s\\S]*?-->',
    '<(\\/?)([\\w.:-]+)((?:\\s+[\\w.:-]+\\s*=\\s*"[^"]*")*)\\s*(\\/?)>',
    '([^<]+)',
  ].join('|'),
  'g'
);
const ATTRIBUTE = /([\w.:-]+)\s*=\s*"([^"]*)"/g;

interface OpenElement {
  name: string;
  tokenIndex: number;
  hasContent: boolean;
  namespaces: Map<string, string>;
}

function encodingError(message: string): EasError {
  return new EasError(`WBXML encoding failed: ${message}`, 'MALFORMED_REQUEST');
}

function lookupNamespace(stack: readonly OpenElement[], prefix: string): string | null {
  for (let index = stack.length - 1; index >= 0; index--) {
    const namespace = stack[index]?.namespaces.get(prefix);
    if (namespace !== undefined) {
      return namespace;
    }
  }
  return null;
}

function declaredNamespaces(attributes: string): Map<string, string> {
  const namespaces = new Map<string, string>();
  for (const [, name = '', value = ''] of attributes.matchAll(ATTRIBUTE)) {
    if (name === 'xmlns') {
      namespaces.set('', value);
    } else if (name.startsWith('xmlns:')) {
      namespaces.set(name.slice('xmlns:'.length), value);
    }
  }
  return namespaces;
}

/**
 * XML document to WBXML. Namespaces resolve through `xmlns` and
 * `xmlns:prefix` declarations; other attributes are dropped.
 */
export function encodeWbxml(xml: string): Buffer {
  const bytes: number[] = [WBXML_VERSION, PUBLIC_ID_UNKNOWN, CHARSET_UTF8, 0x00];
  const stack: OpenElement[] = [];
  let currentPage = 0;

  const markParentContent = (): void => {
    const parent = stack[stack.length - 1];
    if (parent && !parent.hasContent) {
      parent.hasContent = true;
      bytes[parent.tokenIndex] = (bytes[parent.tokenIndex] ?? 0) | TAG_HAS_CONTENT;
    }
  };

  const close = (name: string): void => {
    const open = stack.pop();
    if (!open || open.name !== name) {
      throw encodingError(`unexpected </${name}>`);
    }
    if (open.hasContent) {
      bytes.push(Token.END);
    }
  };

  for (const match of xml.matchAll(XML_TOKEN)) {
    const [, slash, name, attributes = '', selfClosing, text] = match;

    if (text !== undefined) {
      if (text.trim() === '') {
        continue;
      }
      if (stack.length === 0) {
        throw encodingError('text outside the root element');
      }
      markParentContent();
      bytes.push(Token.STR_I);
      for (const byte of Buffer.from(unescapeXml(text), 'utf8')) {
        bytes.push(byte);
      }
      bytes.push(0x00);
      continue;
    }
    if (name === undefined) {
      // Declaration or comment
      continue;
    }
    if (slash) {
      close(name);
      continue;
    }

    const separator = name.indexOf(':');
    const prefix = separator === -1 ? '' : name.slice(0, separator);
    const localName = separator === -1 ? name : name.slice(separator + 1);
    const namespaces = declaredNamespaces(attributes);
    const namespace = namespaces.get(prefix) ?? lookupNamespace(stack, prefix);
    if (namespace === null) {
      throw encodingError(`<${name}> has no namespace`);
    }
    const page = codePageFor(namespace);
    if (!page) {
      throw encodingError(`unknown namespace ${namespace}`);
    }
    const id = page.idByName.get(localName);
    if (id === undefined) {
      throw encodingError(`<${localName}> is not on code page ${page.namespace}`);
    }

    markParentContent();
    if (page.page !== currentPage) {
      bytes.push(Token.SWITCH_PAGE, page.page);
      currentPage = page.page;
    }
    stack.push({ name, tokenIndex: bytes.length, hasContent: false, namespaces });
    bytes.push(id);

    if (selfClosing) {
      close(name);
    }
  }

  if (stack.length > 0) {
    throw encodingError(`<${stack[stack.length - 1]?.name ?? ''}> is not closed`);
  }
  return Buffer.from(bytes);
}

// =============================================================================
// Decoding
// =============================================================================

function decodingError(message: string): EasError {
  return new EasError(`WBXML decoding failed: ${message}`, 'MALFORMED_RESPONSE');
}

class ByteReader {
  private position = 0;

  constructor(private readonly data: Buffer) {}

  get done(): boolean {
    return this.position >= this.data.length;
  }

  byte(): number {
    const value = this.data[this.position];
    if (value === undefined) {
      throw decodingError('unexpected end of data');
    }
    this.position++;
    return value;
  }

  /** mb_u_int32: seven bits per byte, high bit set on all but the last */
  multiByteInt(): number {
    let value = 0;
    for (let count = 0; count < 5; count++) {
      const next = this.byte();
      value = value * 128 + (next & 0x7f);
      if ((next & 0x80) === 0) {
        return value;
      }
    }
    throw decodingError('integer longer than five bytes');
  }

  bytes(length: number): Buffer {
    if (this.position + length > this.data.length) {
      throw decodingError('unexpected end of data');
    }
    const slice = this.data.subarray(this.position, this.position + length);
    this.position += length;
    return slice;
  }

  /** Null-terminated UTF-8 */
  string(): string {
    const end = this.data.indexOf(0x00, this.position);
    if (end === -1) {
      throw decodingError('unterminated inline string');
    }
    const value = this.data.toString('utf8', this.position, end);
    this.position = end + 1;
    return value;
  }
}

function tableString(table: Buffer, offset: number): string {
  if (offset >= table.length) {
    throw decodingError(`string table offset ${offset} out of range`);
  }
  const end = table.indexOf(0x00, offset);
  return table.toString('utf8', offset, end === -1 ? table.length : end);
}

/**
 * WBXML to an XML document the response parsers read
 */
export function decodeWbxml(data: Uint8Array): string {
  const reader = new ByteReader(Buffer.from(data.buffer, data.byteOffset, data.byteLength));

  reader.byte(); // version
  if (reader.multiByteInt() === 0) {
    // Public identifier carried in the string table
    reader.multiByteInt();
  }
  reader.multiByteInt(); // charset, always UTF-8 from Exchange
  const stringTable = reader.bytes(reader.multiByteInt());

  const parts: string[] = [];
  const open: string[] = [];
  const usedPages = new Set<CodePage>();
  let rootPage: CodePage | null = null;
  let rootIndex = -1;
  let page = 0;

  while (!reader.done) {
    const token = reader.byte();
    switch (token) {
      case Token.SWITCH_PAGE:
        page = reader.byte();
        break;
      case Token.END: {
        const name = open.pop();
        if (name === undefined) {
          throw decodingError('END without an open element');
        }
        parts.push(`</${name}>`);
        break;
      }
      case Token.STR_I:
        parts.push(escapeXml(reader.string()));
        break;
      case Token.STR_T:
        parts.push(escapeXml(tableString(stringTable, reader.multiByteInt())));
        break;
      case Token.ENTITY:
        parts.push(escapeXml(String.fromCodePoint(reader.multiByteInt())));
        break;
      case Token.OPAQUE:
        parts.push(escapeXml(reader.bytes(reader.multiByteInt()).toString('utf8')));
        break;
      default: {
        const codePage = PAGE_BY_NUMBER.get(page);
        const id = token & TAG_ID_MASK;
        const localName = codePage?.nameById.get(id);
        if (!codePage || localName === undefined) {
          throw decodingError(`unknown tag 0x${id.toString(16)} on page ${page}`);
        }

        if (rootPage === null) {
          rootPage = codePage;
          rootIndex = parts.length;
        }
        let name = localName;
        if (codePage !== rootPage) {
          usedPages.add(codePage);
          name = `${codePage.prefix}:${localName}`;
        }

        if ((token & TAG_HAS_ATTRIBUTES) !== 0) {
          // ActiveSync defines no attributes; skip to the attribute END
          let attribute = reader.byte();
          while (attribute !== Token.END) {
            attribute = reader.byte();
          }
        }
        if ((token & TAG_HAS_CONTENT) !== 0) {
          parts.push(`<${name}>`);
          open.push(name);
        } else {
          parts.push(`<${name}/>`);
        }
      }
    }
  }

  if (open.length > 0) {
    throw decodingError(`<${open[open.length - 1] ?? ''}> is not closed`);
  }
  if (rootPage !== null) {
    const declarations = [` xmlns="${rootPage.namespace}"`];
    for (const used of usedPages) {
      declarations.push(` xmlns:${used.prefix}="${used.namespace}"`);
    }
    const root = parts[rootIndex] ?? '';
    const nameEnd = root.endsWith('/>') ? root.length - 2 : root.length - 1;
    parts[rootIndex] = root.slice(0, nameEnd) + declarations.join('') + root.slice(nameEnd);
  }
  return XML_DECLARATION + parts.join('');
}
