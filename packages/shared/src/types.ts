/**
 * Shared TypeScript Types
 *
 * Table and result types for NAS extraction, matching the JSON schemas in
 * docs/contracts/
 */

import type { MultiPolygon, Polygon } from 'geojson';

// ============================================================================
// Feature Types
// ============================================================================

export type TableName =
  | 'ax_flurstueck'
  | 'ax_person'
  | 'ax_buchungsblattbezirk'
  | 'ax_buchungsblatt'
  | 'ax_anschrift'
  | 'ax_namensnummer'
  | 'ax_buchungsstelle';

// ============================================================================
// Cell Values
// ============================================================================

/** Polygon or multipolygon of a parcel, in the reference system of its source element. */
export type ParcelGeometry = Polygon | MultiPolygon;

export type ScalarValue = string | number | null;

export type CellValue = ScalarValue | ParcelGeometry;

export type Row = Readonly<Record<string, CellValue>>;

// ============================================================================
// Tables
// ============================================================================

export interface Table {
  /** Table name, e.g. ax_person */
  readonly name: TableName;
  /** NAS tag the rows were read from, e.g. AX_Person */
  readonly featureType: string;
  /** Column names in output order; every row has exactly these keys */
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
  /** Name of the geometry column, null for attribute-only tables */
  readonly geometryColumn: string | null;
  /** Reference system code of the geometry column, e.g. ETRS89_UTM32 */
  readonly crs: string | null;
}

// ============================================================================
// Coordinate Reference System
// ============================================================================

export interface DocumentCrs {
  /** Code without URN prefix, e.g. ETRS89_UTM32 */
  code: string;
  /** Display name, e.g. "ETRS89 / UTM zone 32N" (null if the code has another pattern) */
  name: string | null;
  /** EPSG identifier, e.g. EPSG:25832 (null if unknown) */
  epsg: string | null;
}

// ============================================================================
// Extraction Result
// ============================================================================

export interface ExtractResult {
  /** Standard reference system declared by the document */
  readonly crs: DocumentCrs | null;
  readonly tables: ReadonlyMap<TableName, Table>;
  /**
   * Get a table by name.
   * @throws Error if the table was not extracted
   */
  getTable(name: TableName): Table;
}
