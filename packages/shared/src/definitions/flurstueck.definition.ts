/**
 * AX_Flurstueck (parcel)
 *
 * The only feature type with a geometry column: the boundary in ax:position.
 * istGebucht points to the booking entry, zeigtAuf / weistAuf to the location
 * descriptions without / with house number.
 */

import type { FeatureTypeDefinition } from './types';
import { LEBENSZEITINTERVALL_BEGINNT } from './common';

export const FLURSTUECK_DEFINITION: FeatureTypeDefinition = {
  tableName: 'ax_flurstueck',
  tag: 'AX_Flurstueck',
  description: 'Parcels with designation, official area, usage codes and boundary geometry',
  idColumn: 'ax_flurstueck_id',
  columns: [
    { name: 'flurstueckskennzeichen', kind: 'text', path: ['flurstueckskennzeichen'], required: true },
    { name: 'amtliche_flaeche', kind: 'number', path: ['amtlicheFlaeche'] },
    { name: 'nutzung', kind: 'list', path: ['nutzung'] },
    { name: 'flurnummer', kind: 'number', path: ['flurnummer'] },
    {
      name: 'flurstuecksnummer_zaehler',
      kind: 'text',
      path: ['flurstuecksnummer', 'AX_Flurstuecksnummer', 'zaehler'],
    },
    {
      name: 'flurstuecksnummer_nenner',
      kind: 'text',
      path: ['flurstuecksnummer', 'AX_Flurstuecksnummer', 'nenner'],
    },
    { name: 'gemarkung_land', kind: 'text', path: ['gemarkung', 'AX_Gemarkung_Schluessel', 'land'] },
    {
      name: 'gemarkungsnummer',
      kind: 'text',
      path: ['gemarkung', 'AX_Gemarkung_Schluessel', 'gemarkungsnummer'],
    },
    { name: 'ax_buchungsstelle_id', kind: 'reference', path: ['istGebucht'] },
    { name: 'ax_lagebezeichnung_ohne_hausnummer_id', kind: 'reference', path: ['zeigtAuf'] },
    { name: 'ax_lagebezeichnung_mit_hausnummer_ids', kind: 'referenceList', path: ['weistAuf'] },
    { name: 'zeitpunkt_der_entstehung', kind: 'text', path: ['zeitpunktDerEntstehung'] },
    LEBENSZEITINTERVALL_BEGINNT,
  ],
  geometry: {
    column: 'geometry',
    crsColumn: 'geometry_crs',
    path: ['position'],
  },
};
