import { FragmentNode, FragmentReader } from './Fragment';
import { ExtensionTypeName, SubstitutionRegistry } from './ExtensionTypes';

export interface DetectedType {
  typeName: ExtensionTypeName | null;
  elementName: string | null;
}

const XSI_NAMESPACE = 'http://www.w3.org/2001/XMLSchema-instance';

const registry = new SubstitutionRegistry();

/**
 * Find the xsi:type value on a node, whatever prefix the document binds to the instance namespace
 */
function findXsiType(fragment: FragmentNode): string | undefined {
  const prefixes = Object.entries(fragment.attributes)
    .filter(([name, value]) => name.startsWith('xmlns:') && value === XSI_NAMESPACE)
    .map(([name]) => name.slice('xmlns:'.length));
  if (prefixes.length === 0) {
    prefixes.push('xsi');
  }
  for (const prefix of prefixes) {
    const value = fragment.attributes[`${prefix}:type`];
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/**
 * Utility class for working out which extension type an XML document claims
 */
export class ExtensionTypeDetector {
  /**
   * Detect the extension type of a parsed fragment: xsi:type first, then the root element name
   */
  public static detectTypeFromFragment(fragment: FragmentNode): DetectedType {
    const xsiType = findXsiType(fragment);
    if (xsiType !== undefined) {
      const typeName = registry.typeForSchemaType(xsiType);
      if (typeName) {
        return { typeName, elementName: fragment.name };
      }
    }

    return { typeName: registry.typeForElement(fragment.name), elementName: fragment.name };
  }

  /**
   * Detect the extension type from an XML file's root element
   */
  public static detectTypeFromXml(xmlFilePath: string): DetectedType {
    try {
      return this.detectTypeFromFragment(FragmentReader.fromFile(xmlFilePath));
    } catch (error) {
      console.error(`Error detecting extension type for ${xmlFilePath}:`, error);
      return { typeName: null, elementName: null };
    }
  }

  /**
   * Convenience function to get just the type name
   */
  public static getTypeName(xmlFilePath: string): ExtensionTypeName | null {
    return this.detectTypeFromXml(xmlFilePath).typeName;
  }
}
