/**
 * Extractor Types
 */

import type { FeatureTypeDefinition } from '../definitions/types';
import type { NasInput } from '../xml/document';

export type { NasInput };

/**
 * Options of one extraction call
 */
export interface ExtractOptions {
  /** Strip urn:adv:oid: from feature ids and references */
  stripIdPrefix: boolean;
  /** Dimension assumed for coordinate lists that declare none */
  defaultSrsDimension: number;
  /** Name of the input (file name, URL) for log lines */
  sourceName?: string;
  /** Feature types to extract; defaults to the registered ones */
  featureTypes?: readonly FeatureTypeDefinition[];
}

/**
 * Settings a table extractor needs while walking one document
 */
export interface TableExtractionContext {
  stripIdPrefix: boolean;
  defaultSrsDimension: number;
  /** Reference system code used for geometries without srsName */
  documentCrs: string | null;
}
