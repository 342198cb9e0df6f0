/**
 * NAS Extraction Entry Point
 *
 * `extract()` parses one NAS document and returns an immutable result holding
 * one table per registered feature type. The call is synchronous and has no
 * side effects besides logs and metrics.
 */

import type { ExtractResult, Table, TableName } from '../types';
import type { ExtractOptions, NasInput, TableExtractionContext } from './types';
import { parseNasDocument } from '../xml/document';
import { readDocumentCrs } from '../geometry/crs';
import { TableExtractor } from './table-extractor';
import { getAllFeatureTypes } from './registry';
import { config } from '../config';
import { createContext, getContext, runWithContext } from '../context';
import { documentsProcessedCounter, extractionDurationHistogram } from '../metrics';
import { logger } from '../logger';

const DEFAULT_OPTIONS: ExtractOptions = {
  stripIdPrefix: config.stripIdPrefix,
  defaultSrsDimension: config.defaultSrsDimension,
};

/**
 * Extract the tables of a NAS document.
 *
 * @param input - XML text, or bytes in the encoding declared by the prolog
 * @param options - Extraction options (defaults from config)
 * @returns One table per feature type
 * @throws MalformedInputError if the input is not well-formed XML
 * @throws SchemaMismatchError if an element lacks its feature id or a required field
 */
export function extract(input: NasInput, options: Partial<ExtractOptions> = {}): ExtractResult {
  const resolved: ExtractOptions = { ...DEFAULT_OPTIONS, ...options };

  // Keep the caller's context; start one per document otherwise
  if (getContext()) {
    return extractInContext(input, resolved);
  }
  return runWithContext(createContext(resolved.sourceName), () => extractInContext(input, resolved));
}

function extractInContext(input: NasInput, options: ExtractOptions): ExtractResult {
  const startTime = Date.now();
  const featureTypes = options.featureTypes ?? getAllFeatureTypes();

  logger.info('Starting extraction', {
    feature_types: featureTypes.map((definition) => definition.tag),
    input_size: input.length,
  });

  try {
    const nasDocument = parseNasDocument(input);
    const crs = readDocumentCrs(nasDocument);

    const ctx: TableExtractionContext = {
      stripIdPrefix: options.stripIdPrefix,
      defaultSrsDimension: options.defaultSrsDimension,
      documentCrs: crs?.code ?? null,
    };

    const tables = new Map<TableName, Table>();
    for (const definition of featureTypes) {
      tables.set(definition.tableName, new TableExtractor(definition).extract(nasDocument, ctx));
    }

    const durationMs = Date.now() - startTime;
    extractionDurationHistogram.observe({ status: 'success' }, durationMs / 1000);
    documentsProcessedCounter.inc({ status: 'success' });

    logger.info('Extraction complete', {
      crs: crs?.code ?? null,
      row_counts: Object.fromEntries(
        Array.from(tables.values()).map((table) => [table.name, table.rows.length])
      ),
      duration_ms: durationMs,
    });

    return createExtractResult(crs, tables);
  } catch (error) {
    extractionDurationHistogram.observe({ status: 'error' }, (Date.now() - startTime) / 1000);
    documentsProcessedCounter.inc({ status: 'error' });
    logger.error('Extraction failed', error);
    throw error;
  }
}

function createExtractResult(
  crs: ExtractResult['crs'],
  tables: Map<TableName, Table>
): ExtractResult {
  const view: ReadonlyMap<TableName, Table> = new Map(tables);
  return Object.freeze({
    crs: crs ? Object.freeze(crs) : null,
    tables: view,
    getTable(name: TableName): Table {
      const table = tables.get(name);
      if (!table) {
        throw new Error(`Table not extracted: ${name}`);
      }
      return table;
    },
  });
}
