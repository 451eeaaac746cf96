export { isRecord } from './descriptor.js';
export type { Descriptor, Path, PathSegment } from './descriptor.js';
export { indexSchemaLocations, pointerToPath } from './pointer.js';
export {
  STANDARD_VERSIONS,
  DEFAULT_STANDARD_VERSION,
  isStandardVersion,
  schemaFileName,
} from './standard.js';
export type { StandardVersion, SchemaProfile } from './standard.js';
export {
  StandardSchemaError,
  getSchemaPath,
  getStandardValidator,
  validateAgainstStandard,
} from './validate.js';
export type { RawViolation } from './validate.js';
