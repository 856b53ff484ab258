import { XMLParser } from 'fast-xml-parser';
import { SaxesParser } from 'saxes';
import { PackageError } from '../errors.js';

export const ATTRIBUTE_PREFIX = '@_';
export const TEXT_KEY = '#text';

/** Parsed XML content: text, an element's children and attributes, or repeated siblings. */
export type XmlValue = string | XmlElement | XmlValue[];

export interface XmlElement {
  [name: string]: XmlValue;
}

export interface XmlDocument {
  /** Name of the document element as written, including any prefix. */
  rootName: string;
  root: XmlValue;
}

export type XmlParseOptions = {
  /** Drop namespace prefixes from element and attribute names. */
  removeNamespacePrefixes?: boolean;
  /** Part the text was read from, reported on errors. */
  partUri?: string;
};

/**
 * Parses a complete XML document. Input that is not well-formed, including
 * undefined entities and unbound namespace prefixes, is rejected with
 * `PACKAGE_XML_INVALID`; nothing is recovered from it.
 */
export function parseXmlDocument(text: string, options?: XmlParseOptions): XmlDocument {
  const partUri = options?.partUri;
  assertWellFormed(text, partUri);

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_KEY,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    removeNSPrefix: options?.removeNamespacePrefixes ?? false
  });
  const tree = toXmlValue(parser.parse(text));
  const [rootName, ...rest] = isXmlElement(tree) ? Object.keys(tree) : [];
  if (!isXmlElement(tree) || rootName === undefined || rest.length > 0) {
    throw new PackageError('PACKAGE_XML_INVALID', 'XML document must have exactly one document element', {
      partUri
    });
  }
  return { rootName, root: tree[rootName] ?? '' };
}

/** Runs a conforming non-validating parser over the text and discards the events. */
function assertWellFormed(text: string, partUri: string | undefined): void {
  const checker = new SaxesParser({ xmlns: true, position: true });
  try {
    checker.write(text).close();
  } catch (err) {
    const reason = err instanceof Error ? err.message.replace(/^\d+:\d+: /, '') : String(err);
    throw new PackageError(
      'PACKAGE_XML_INVALID',
      `Malformed XML at line ${checker.line}, column ${checker.column}: ${reason}`,
      { partUri, context: { line: String(checker.line), column: String(checker.column) }, cause: err }
    );
  }
}

/**
 * Decodes XML bytes, honouring a UTF-16 byte order mark and otherwise
 * requiring valid UTF-8. Byte order marks are dropped.
 */
export function decodeXmlBytes(bytes: Uint8Array, partUri?: string): string {
  const encoding = bytes[0] === 0xff && bytes[1] === 0xfe ? 'utf-16le' : bytes[0] === 0xfe && bytes[1] === 0xff ? 'utf-16be' : 'utf-8';
  try {
    return new TextDecoder(encoding, { fatal: true }).decode(bytes);
  } catch (err) {
    throw new PackageError('PACKAGE_XML_INVALID', `XML content is not valid ${encoding}`, { partUri, cause: err });
  }
}

export function isXmlElement(value: XmlValue | undefined): value is XmlElement {
  return typeof value === 'object' && !Array.isArray(value);
}

/** Child elements named `name`, in document order, whether there is one or many. */
export function childElements(parent: XmlValue | undefined, name: string): XmlElement[] {
  if (!isXmlElement(parent)) return [];
  const value = parent[name];
  if (value === undefined) return [];
  const values = Array.isArray(value) ? value : [value];
  return values.map((item) => (isXmlElement(item) ? item : {}));
}

export function attribute(element: XmlElement, name: string): string | undefined {
  const value = element[`${ATTRIBUTE_PREFIX}${name}`];
  return typeof value === 'string' ? value : undefined;
}

function toXmlValue(value: unknown): XmlValue {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  if (Array.isArray(value)) return value.map((item: unknown) => toXmlValue(item));
  if (typeof value === 'object' && value !== null) {
    const element: XmlElement = {};
    for (const [key, child] of Object.entries(value)) {
      element[key] = toXmlValue(child);
    }
    return element;
  }
  return '';
}
