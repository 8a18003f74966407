export { CodeQLDatabase } from "./databases/codeql-database";
export {
  ImmutablePropertyError,
  InvalidDatabaseError,
  KeyNotFoundError,
} from "./databases/database-errors";
export {
  InvalidKeyPathError,
  keyPathToPointer,
  parseKeyPath,
  resolveKeyPath,
} from "./databases/key-path";
export type { KeyPath, KeyPathSegment } from "./databases/key-path";
export { KeyPathSegmentKind } from "./databases/key-path";
export { DatabaseLayout } from "./databases/property-store";
export type { PropertyStore } from "./databases/property-store";
export type { PropertyMap, PropertyValue } from "./databases/property-value";
export { InvalidSarifError, SarifDocument } from "./sarif/sarif-document";
export type { VersionControlProvenance } from "./common/version-control-provenance";
