/**
 * Feature Type Definition Types
 *
 * A feature type definition describes, as data, how one NAS object type is
 * turned into a table: which tag to walk, which columns to read from which
 * child paths, which of them are required, and which columns are derived.
 */

import type { ScalarValue, TableName } from '../types';

/**
 * How a column value is read from the element at its path:
 * - 'text': trimmed text, empty text is null
 * - 'number': numeric text, unparsable text is null
 * - 'datetime': ISO 8601 text, normalised to UTC
 * - 'reference': xlink:href with the object id prefix stripped
 * - 'title': xlink:title
 * - 'list': text of every occurrence of a repeated child, comma-joined
 * - 'referenceList': xlink:href of every occurrence, comma-joined
 */
export type ColumnKind = 'text' | 'number' | 'datetime' | 'reference' | 'title' | 'list' | 'referenceList';

export interface ColumnDefinition {
  /** Output column name */
  name: string;
  kind: ColumnKind;
  /** Local names leading from the feature element to the value */
  path: readonly string[];
  /** Absent values raise SchemaMismatchError instead of producing null */
  required?: boolean;
}

export interface DerivedColumnDefinition {
  name: string;
  /** Compute the value from the columns read so far */
  derive: (values: Readonly<Record<string, ScalarValue>>) => ScalarValue;
}

export interface GeometryDefinition {
  /** Column holding the geometry value */
  column: string;
  /** Column holding the reference system code of the geometry */
  crsColumn: string;
  /** Property element holding the GML surface */
  path: readonly string[];
}

export interface FeatureTypeDefinition {
  /** Output table */
  tableName: TableName;
  /** NAS tag, matched in any AdV namespace */
  tag: string;
  /** Human-readable description */
  description: string;
  /** Column receiving the feature id (gml:id); always required */
  idColumn: string;
  columns: readonly ColumnDefinition[];
  derived?: readonly DerivedColumnDefinition[];
  geometry?: GeometryDefinition;
}
