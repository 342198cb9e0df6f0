/**
 * AX_Buchungsstelle (booking entry)
 */

import type { FeatureTypeDefinition } from './types';
import { LEBENSZEITINTERVALL_BEGINNT } from './common';

export const BUCHUNGSSTELLE_DEFINITION: FeatureTypeDefinition = {
  tableName: 'ax_buchungsstelle',
  tag: 'AX_Buchungsstelle',
  description: 'Booking entries on land register sheets',
  idColumn: 'ax_buchungsstelle_id',
  columns: [
    { name: 'buchungsart', kind: 'text', path: ['buchungsart'] },
    { name: 'laufende_nummer', kind: 'text', path: ['laufendeNummer'] },
    { name: 'ax_buchungsblatt_id', kind: 'reference', path: ['istBestandteilVon'] },
    LEBENSZEITINTERVALL_BEGINNT,
  ],
};
