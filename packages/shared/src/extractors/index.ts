/**
 * Extractors Module
 *
 * One table extractor per NAS feature type, driven by the declarative
 * definitions in ../definitions. `extract()` runs all registered types.
 */

// Core types
export type { ExtractOptions, TableExtractionContext, NasInput } from './types';

// Entry point
export { extract } from './extract';

// Table extraction
export { TableExtractor } from './table-extractor';
export { readColumnValue, parseIsoDateTime, parseNumber, type ValueReadOptions } from './values';

// Registry
export {
  registerFeatureType,
  getFeatureType,
  getFeatureTypeOrThrow,
  hasFeatureType,
  getRegisteredTables,
  getAllFeatureTypes,
  clearRegistry,
  registerAllFeatureTypes,
} from './registry';
