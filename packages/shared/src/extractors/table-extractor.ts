/**
 * Table Extractor
 *
 * Walks every element of one feature type and turns it into a row, following
 * the type's declarative definition. Stateless apart from the element being
 * converted.
 */

import type { Element } from '@xmldom/xmldom';
import type { Position } from 'geojson';
import type { FeatureTypeDefinition, GeometryDefinition } from '../definitions/types';
import { getColumnNames } from '../definitions';
import type { CellValue, ParcelGeometry, Row, ScalarValue, Table } from '../types';
import type { TableExtractionContext } from './types';
import type { NasDocument } from '../xml/document';
import { findFeatureElements, findPath, getGmlId, removeIdPrefix } from '../xml/elements';
import { findSurfaceElement, readGmlSurface } from '../geometry/gml';
import { horizontalCrsCode } from '../geometry/crs';
import { SchemaMismatchError } from '../errors';
import { featuresExtractedCounter, geometryFailuresCounter } from '../metrics';
import { logger } from '../logger';
import { readColumnValue } from './values';

interface GeometryValue {
  geometry: ParcelGeometry | null;
  crs: string | null;
}

export class TableExtractor {
  readonly definition: FeatureTypeDefinition;
  readonly columns: readonly string[];

  constructor(definition: FeatureTypeDefinition) {
    this.definition = definition;
    this.columns = Object.freeze(getColumnNames(definition));
  }

  /**
   * Extract the table of this feature type.
   *
   * @throws SchemaMismatchError if an element lacks its id or a required field
   */
  extract(nasDocument: NasDocument, ctx: TableExtractionContext): Table {
    const { tableName, tag } = this.definition;
    const elements = findFeatureElements(nasDocument.document, tag);

    const rows = elements.map((element, index) => this.extractRow(element, index, ctx));

    this.warnOnDuplicateIds(rows);
    featuresExtractedCounter.inc({ table: tableName }, rows.length);

    logger.debug('Extracted table', {
      table: tableName,
      tag,
      row_count: rows.length,
    });

    return Object.freeze({
      name: tableName,
      featureType: tag,
      columns: this.columns,
      rows: Object.freeze(rows),
      geometryColumn: this.definition.geometry?.column ?? null,
      crs: this.definition.geometry ? ctx.documentCrs : null,
    });
  }

  private extractRow(element: Element, index: number, ctx: TableExtractionContext): Row {
    const { tableName, idColumn, columns, derived, geometry } = this.definition;

    const gmlId = getGmlId(element);
    if (gmlId === null) {
      throw new SchemaMismatchError(`${this.definition.tag} element #${index + 1} has no gml:id`, {
        table: tableName,
        column: idColumn,
        featureId: null,
        elementIndex: index,
      });
    }
    const featureId = ctx.stripIdPrefix ? removeIdPrefix(gmlId) : gmlId;

    const values: Record<string, ScalarValue> = { [idColumn]: featureId };
    for (const column of columns) {
      const value = readColumnValue(element, column, ctx);
      if (value === null && column.required) {
        throw new SchemaMismatchError(
          `${this.definition.tag} ${featureId} is missing required field ${column.name}`,
          { table: tableName, column: column.name, featureId, elementIndex: index }
        );
      }
      values[column.name] = value;
    }

    for (const column of derived ?? []) {
      values[column.name] = column.derive(values);
    }

    const row: Record<string, CellValue> = values;
    if (geometry) {
      const { geometry: value, crs } = this.readGeometry(element, featureId, geometry, ctx);
      row[geometry.column] = value === null ? null : freezeGeometry(value);
      row[geometry.crsColumn] = crs;
    }

    return Object.freeze(row);
  }

  /**
   * Read the geometry of a feature. Missing or unreadable geometries give null.
   */
  private readGeometry(
    element: Element,
    featureId: string,
    definition: GeometryDefinition,
    ctx: TableExtractionContext
  ): GeometryValue {
    const property = findPath(element, definition.path);
    const surface = property ? findSurfaceElement(property) : null;

    if (surface === null) {
      geometryFailuresCounter.inc({ reason: 'missing' });
      logger.debug('Feature has no surface geometry', {
        table: this.definition.tableName,
        feature_id: featureId,
      });
      return { geometry: null, crs: ctx.documentCrs };
    }

    try {
      const { geometry, srsName } = readGmlSurface(surface, {
        defaultSrsDimension: ctx.defaultSrsDimension,
      });
      return { geometry, crs: srsName ? horizontalCrsCode(srsName) : ctx.documentCrs };
    } catch (error) {
      geometryFailuresCounter.inc({ reason: 'invalid' });
      logger.warn('Could not read geometry, keeping row with null geometry', {
        table: this.definition.tableName,
        feature_id: featureId,
        reason: error instanceof Error ? error.message : String(error),
      });
      return { geometry: null, crs: ctx.documentCrs };
    }
  }

  private warnOnDuplicateIds(rows: Row[]): void {
    const seen = new Set<CellValue>();
    const duplicates = new Set<CellValue>();
    for (const row of rows) {
      const id = row[this.definition.idColumn];
      if (seen.has(id)) duplicates.add(id);
      seen.add(id);
    }

    if (duplicates.size > 0) {
      logger.warn('Duplicate feature ids, keeping all rows', {
        table: this.definition.tableName,
        duplicate_ids: Array.from(duplicates),
      });
    }
  }
}

function freezeGeometry(geometry: ParcelGeometry): ParcelGeometry {
  const freezeRings = (rings: Position[][]) => {
    for (const ring of rings) {
      ring.forEach((position) => Object.freeze(position));
      Object.freeze(ring);
    }
    Object.freeze(rings);
  };

  if (geometry.type === 'Polygon') {
    freezeRings(geometry.coordinates);
  } else {
    geometry.coordinates.forEach(freezeRings);
    Object.freeze(geometry.coordinates);
  }
  Object.freeze(geometry);
  return geometry;
}
