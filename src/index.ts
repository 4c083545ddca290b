export { ExtensionConformanceChecker } from './ConformanceChecker';
export type { CheckOptions, Verdict, Violation, ViolationKind } from './ConformanceChecker';
export { ConformanceReference } from './ConformanceReference';
export type { ConformanceOptions } from './ConformanceReference';
export { ExtensionTypeDetector } from './ExtensionTypeDetector';
export type { DetectedType } from './ExtensionTypeDetector';
export {
  EXTENSION_TYPES,
  EXTENSION_TYPE_NAMES,
  GEOLOC_TEXT_PROPERTY,
  GML_NAMESPACE,
  WGS84E_3D_SRS_NAME,
  SubstitutionRegistry,
  isExtensionTypeName
} from './ExtensionTypes';
export type {
  CardinalityRule,
  ExclusiveChoiceRule,
  ExtensionTypeName,
  ExtensionTypeRules,
  FixedAttributeRule
} from './ExtensionTypes';
export { FragmentReader } from './Fragment';
export type { ElementLocation, FragmentNode } from './Fragment';
export { ConformanceError, MalformedInputError, UnknownTypeError } from './errors';
