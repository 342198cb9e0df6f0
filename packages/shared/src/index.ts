/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  createContext,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Errors
export {
  NAS_ERROR_CODES,
  NasExtractError,
  MalformedInputError,
  SchemaMismatchError,
  GeometryParseError,
  type NasErrorCode,
  type SchemaMismatchDetails,
} from './errors';

// Metrics
export {
  register,
  documentsProcessedCounter,
  extractionDurationHistogram,
  featuresExtractedCounter,
  geometryFailuresCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateTable,
  validateExtractResult,
  getTableSchema,
  type ValidationResult,
} from './schemas';

// XML
export {
  parseNasDocument,
  decodeInput,
  detectEncoding,
  type NasDocument,
} from './xml/document';
export { ID_PREFIX, CRS_PREFIX, ADV_NAMESPACE_PREFIX } from './xml/namespaces';
export { removeIdPrefix } from './xml/elements';

// Geometry
export {
  readGmlSurface,
  findSurfaceElement,
  parsePosList,
  parsePos,
  chainCurves,
  type GmlReadOptions,
  type GmlSurface,
} from './geometry/gml';
export {
  removeCrsPrefix,
  horizontalCrsCode,
  formatCrsName,
  toEpsgCode,
  describeCrs,
  readDocumentCrs,
} from './geometry/crs';

// Feature type definitions
export {
  FEATURE_TYPE_DEFINITIONS,
  getColumnNames,
  FLURSTUECK_DEFINITION,
  PERSON_DEFINITION,
  BUCHUNGSBLATTBEZIRK_DEFINITION,
  BUCHUNGSBLATT_DEFINITION,
  ANSCHRIFT_DEFINITION,
  NAMENSNUMMER_DEFINITION,
  BUCHUNGSSTELLE_DEFINITION,
  type FeatureTypeDefinition,
  type ColumnDefinition,
  type ColumnKind,
  type DerivedColumnDefinition,
  type GeometryDefinition,
} from './definitions';

// Extraction
export {
  type ExtractOptions,
  type TableExtractionContext,
  type NasInput,
  extract,
  TableExtractor,
  readColumnValue,
  parseIsoDateTime,
  parseNumber,
  type ValueReadOptions,
  registerFeatureType,
  getFeatureType,
  getFeatureTypeOrThrow,
  hasFeatureType,
  getRegisteredTables,
  getAllFeatureTypes,
  clearRegistry,
  registerAllFeatureTypes,
} from './extractors';

// Export
export {
  tableToCsv,
  escapeField,
  tableToFeatureCollection,
  type CsvOptions,
  type ParcelFeatureCollection,
} from './export';
