import { PackageError } from '../errors.js';
import { attribute, childElements, parseXmlDocument } from '../xml/parse.js';
import { normalizePartUri, partExtension } from './partUri.js';

export const CONTENT_TYPES_ITEM_NAME = '[Content_Types].xml';

/** Content types declared by a package's `[Content_Types].xml`. */
export class ContentTypeMap {
  private constructor(
    private readonly defaults: ReadonlyMap<string, string>,
    private readonly overrides: ReadonlyMap<string, string>
  ) {}

  /** Parses `[Content_Types].xml`. Malformed or incomplete declarations make the container invalid. */
  static parse(xml: string): ContentTypeMap {
    const document = parseXmlDocument(xml, {
      removeNamespacePrefixes: true,
      partUri: `/${CONTENT_TYPES_ITEM_NAME}`
    });
    if (document.rootName !== 'Types') {
      throw new PackageError('PACKAGE_INVALID_CONTAINER', `Unexpected content types root element ${document.rootName}`);
    }

    const defaults = new Map<string, string>();
    for (const element of childElements(document.root, 'Default')) {
      const extension = attribute(element, 'Extension');
      const contentType = attribute(element, 'ContentType');
      if (extension === undefined || contentType === undefined) {
        throw new PackageError('PACKAGE_INVALID_CONTAINER', 'Default content type is missing Extension or ContentType');
      }
      defaults.set(extension.toLowerCase(), contentType);
    }

    const overrides = new Map<string, string>();
    for (const element of childElements(document.root, 'Override')) {
      const partName = attribute(element, 'PartName');
      const contentType = attribute(element, 'ContentType');
      if (partName === undefined || contentType === undefined) {
        throw new PackageError('PACKAGE_INVALID_CONTAINER', 'Override content type is missing PartName or ContentType');
      }
      overrides.set(normalizePartUri(partName), contentType);
    }
    return new ContentTypeMap(defaults, overrides);
  }

  /** Override for the part if declared, otherwise the default for its extension. */
  resolve(partUri: string): string | undefined {
    return this.overrides.get(normalizePartUri(partUri)) ?? this.defaults.get(partExtension(partUri));
  }
}
