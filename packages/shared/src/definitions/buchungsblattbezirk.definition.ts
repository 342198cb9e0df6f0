/**
 * AX_Buchungsblattbezirk (land register district)
 */

import type { FeatureTypeDefinition } from './types';
import { ANLASS, LEBENSZEITINTERVALL_BEGINNT } from './common';

export const BUCHUNGSBLATTBEZIRK_DEFINITION: FeatureTypeDefinition = {
  tableName: 'ax_buchungsblattbezirk',
  tag: 'AX_Buchungsblattbezirk',
  description: 'Land register districts with designation, key and responsible office',
  idColumn: 'ax_buchungsblattbezirk_id',
  columns: [
    { name: 'bezeichnung', kind: 'text', path: ['bezeichnung'], required: true },
    { name: 'schluessel_gesamt', kind: 'text', path: ['schluesselGesamt'] },
    { name: 'land', kind: 'text', path: ['schluessel', 'AX_Buchungsblattbezirk_Schluessel', 'land'] },
    { name: 'bezirk', kind: 'text', path: ['schluessel', 'AX_Buchungsblattbezirk_Schluessel', 'bezirk'] },
    { name: 'dienststelle_land', kind: 'text', path: ['gehoertZu', 'AX_Dienststelle_Schluessel', 'land'] },
    {
      name: 'dienststelle_stelle',
      kind: 'text',
      path: ['gehoertZu', 'AX_Dienststelle_Schluessel', 'stelle'],
    },
    LEBENSZEITINTERVALL_BEGINNT,
    ANLASS,
  ],
};
