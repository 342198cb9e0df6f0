/**
 * AX_Anschrift (postal address)
 */

import type { FeatureTypeDefinition } from './types';
import { ANLASS, LEBENSZEITINTERVALL_BEGINNT } from './common';

export const ANSCHRIFT_DEFINITION: FeatureTypeDefinition = {
  tableName: 'ax_anschrift',
  tag: 'AX_Anschrift',
  description: 'Postal addresses of persons',
  idColumn: 'ax_anschrift_id',
  columns: [
    { name: 'strasse', kind: 'text', path: ['strasse'], required: true },
    { name: 'hausnummer', kind: 'text', path: ['hausnummer'], required: true },
    { name: 'postleitzahl_postzustellung', kind: 'text', path: ['postleitzahlPostzustellung'] },
    { name: 'ort_post', kind: 'text', path: ['ort_Post'] },
    { name: 'ortsteil', kind: 'text', path: ['ortsteil'] },
    { name: 'telefon', kind: 'text', path: ['telefon'] },
    { name: 'weitere_adressen', kind: 'text', path: ['weitereAdressen'] },
    LEBENSZEITINTERVALL_BEGINNT,
    ANLASS,
  ],
};
