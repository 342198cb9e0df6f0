/**
 * GeoJSON Export
 */

import type { Feature, FeatureCollection } from 'geojson';
import type { CellValue, ParcelGeometry, Table } from '../types';

export type ParcelFeatureCollection = FeatureCollection<ParcelGeometry | null>;

/**
 * Convert the geometry table to a FeatureCollection.
 * Every row becomes a feature; the other columns become its properties.
 *
 * @throws Error if the table has no geometry column
 */
export function tableToFeatureCollection(table: Table): ParcelFeatureCollection {
  const { geometryColumn } = table;
  if (geometryColumn === null) {
    throw new Error(`Table ${table.name} has no geometry column`);
  }

  const features = table.rows.map((row): Feature<ParcelGeometry | null> => {
    const properties: Record<string, CellValue> = {};
    let geometry: ParcelGeometry | null = null;

    for (const column of table.columns) {
      const value = row[column] ?? null;
      if (column === geometryColumn) {
        geometry = value !== null && typeof value === 'object' ? value : null;
      } else {
        properties[column] = value;
      }
    }

    return { type: 'Feature', geometry, properties };
  });

  return { type: 'FeatureCollection', features };
}
