/**
 * Feature Type Definitions
 *
 * One definition per extracted NAS object type, in output order.
 */

import type { FeatureTypeDefinition } from './types';
import { FLURSTUECK_DEFINITION } from './flurstueck.definition';
import { PERSON_DEFINITION } from './person.definition';
import { BUCHUNGSBLATTBEZIRK_DEFINITION } from './buchungsblattbezirk.definition';
import { BUCHUNGSBLATT_DEFINITION } from './buchungsblatt.definition';
import { ANSCHRIFT_DEFINITION } from './anschrift.definition';
import { NAMENSNUMMER_DEFINITION } from './namensnummer.definition';
import { BUCHUNGSSTELLE_DEFINITION } from './buchungsstelle.definition';

export type {
  FeatureTypeDefinition,
  ColumnDefinition,
  ColumnKind,
  DerivedColumnDefinition,
  GeometryDefinition,
} from './types';

export {
  FLURSTUECK_DEFINITION,
  PERSON_DEFINITION,
  BUCHUNGSBLATTBEZIRK_DEFINITION,
  BUCHUNGSBLATT_DEFINITION,
  ANSCHRIFT_DEFINITION,
  NAMENSNUMMER_DEFINITION,
  BUCHUNGSSTELLE_DEFINITION,
};

export const FEATURE_TYPE_DEFINITIONS: readonly FeatureTypeDefinition[] = [
  FLURSTUECK_DEFINITION,
  PERSON_DEFINITION,
  BUCHUNGSBLATTBEZIRK_DEFINITION,
  BUCHUNGSBLATT_DEFINITION,
  ANSCHRIFT_DEFINITION,
  NAMENSNUMMER_DEFINITION,
  BUCHUNGSSTELLE_DEFINITION,
];

/**
 * Output columns of a definition, in order: id, read columns, derived columns,
 * geometry columns.
 */
export function getColumnNames(definition: FeatureTypeDefinition): string[] {
  return [
    definition.idColumn,
    ...definition.columns.map((column) => column.name),
    ...(definition.derived ?? []).map((column) => column.name),
    ...(definition.geometry ? [definition.geometry.column, definition.geometry.crsColumn] : []),
  ];
}
