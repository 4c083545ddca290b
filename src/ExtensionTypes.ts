export const GML_NAMESPACE = 'http://www.opengis.net/gml/3.2';

/**
 * The only CRS a PointType_WGS84E_3D may reference (WGS84 ellipsoidal height)
 */
export const WGS84E_3D_SRS_NAME = 'http://metadata.ces.mil/mdr/ns/GSIP/crs/WGS84E_3D';

export const EXTENSION_TYPE_NAMES = ['Point_WGS84E_3D', 'GEOLOCInstance'] as const;

export type ExtensionTypeName = typeof EXTENSION_TYPE_NAMES[number];

export interface FixedAttributeRule {
  name: string;
  values: readonly string[];
}

export interface ExclusiveChoiceRule {
  members: readonly string[];
}

export interface CardinalityRule {
  element: string;
  maxOccurs: number;
}

export interface ExtensionTypeRules {
  typeName: ExtensionTypeName;
  elementName: string;
  schemaType: string;
  substitutionGroup: string;
  fixedAttributes: readonly FixedAttributeRule[];
  choices: readonly ExclusiveChoiceRule[];
  cardinalities: readonly CardinalityRule[];
  // Child names the restriction re-permits; null means open content
  declaredContent: readonly string[] | null;
}

const COORDINATE_CHOICE = ['pos', 'coordinates'] as const;
const INHERITED_GML_PROPERTIES = ['identifier', 'name', 'description'] as const;
const RESOLUTION_GROUP = ['coordinateResolution', 'horizontalAccuracy', 'verticalAccuracy'] as const;
const PRESENTATION_GROUP = ['sexagesimal', 'gridMetre', 'zoneMetre', 'quadrangle', 'numericBit'] as const;

export const GEOLOC_TEXT_PROPERTY = 'remarks';

export const EXTENSION_TYPES: Readonly<Record<ExtensionTypeName, ExtensionTypeRules>> = {
  Point_WGS84E_3D: {
    typeName: 'Point_WGS84E_3D',
    elementName: 'Point_WGS84E_3D',
    schemaType: 'PointType_WGS84E_3D',
    substitutionGroup: 'gml:AbstractGeometricPrimitive',
    fixedAttributes: [{ name: 'srsName', values: [WGS84E_3D_SRS_NAME] }],
    choices: [{ members: COORDINATE_CHOICE }],
    cardinalities: [...RESOLUTION_GROUP, ...PRESENTATION_GROUP].map(element => ({ element, maxOccurs: 1 })),
    declaredContent: [...INHERITED_GML_PROPERTIES, ...COORDINATE_CHOICE, ...RESOLUTION_GROUP, ...PRESENTATION_GROUP]
  },
  GEOLOCInstance: {
    typeName: 'GEOLOCInstance',
    elementName: 'GEOLOCInstance',
    schemaType: 'GEOLOCInstanceType',
    substitutionGroup: 'AbstractLocationInstance',
    fixedAttributes: [],
    choices: [],
    cardinalities: [{ element: GEOLOC_TEXT_PROPERTY, maxOccurs: 1 }],
    declaredContent: null
  }
};

export function isExtensionTypeName(value: unknown): value is ExtensionTypeName {
  return EXTENSION_TYPE_NAMES.some(name => name === value);
}

/**
 * Resolves abstract substitution heads to the concrete extension types allowed to fill them
 */
export class SubstitutionRegistry {
  private substitutes: Map<string, ExtensionTypeName[]> = new Map();
  private byElement: Map<string, ExtensionTypeName> = new Map();
  private bySchemaType: Map<string, ExtensionTypeName> = new Map();

  constructor(rules: readonly ExtensionTypeRules[] = Object.values(EXTENSION_TYPES)) {
    for (const rule of rules) {
      this.register(rule.substitutionGroup, rule.typeName);
      this.byElement.set(rule.elementName, rule.typeName);
      this.bySchemaType.set(rule.schemaType, rule.typeName);
    }
    // gml:AbstractGeometricPrimitive is itself substitutable for gml:AbstractGeometry
    for (const typeName of this.resolve('gml:AbstractGeometricPrimitive')) {
      this.register('gml:AbstractGeometry', typeName);
    }
  }

  private register(base: string, typeName: ExtensionTypeName): void {
    const list = this.substitutes.get(base) ?? [];
    if (!list.includes(typeName)) {
      list.push(typeName);
    }
    this.substitutes.set(base, list);
  }

  /**
   * Concrete types permitted to stand in for the given base; empty for an unknown base
   */
  public resolve(base: string): readonly ExtensionTypeName[] {
    return [...(this.substitutes.get(base) ?? [])];
  }

  public canSubstitute(base: string, typeName: string): boolean {
    return isExtensionTypeName(typeName) && this.resolve(base).includes(typeName);
  }

  public typeForElement(localName: string): ExtensionTypeName | null {
    return this.byElement.get(localName) ?? null;
  }

  /**
   * Map an xsi:type style name (prefix ignored) to its extension type
   */
  public typeForSchemaType(qualifiedName: string): ExtensionTypeName | null {
    const localName = qualifiedName.includes(':') ? qualifiedName.slice(qualifiedName.indexOf(':') + 1) : qualifiedName;
    return this.bySchemaType.get(localName) ?? null;
  }

  public bases(): string[] {
    return Array.from(this.substitutes.keys());
  }
}
