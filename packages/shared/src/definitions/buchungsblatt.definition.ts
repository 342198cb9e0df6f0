/**
 * AX_Buchungsblatt (land register sheet)
 *
 * The district is carried as its combined key (schluessel_gesamt = land + bezirk),
 * matching ax_buchungsblattbezirk.schluessel_gesamt. It is not resolved here.
 */

import type { FeatureTypeDefinition } from './types';
import { ANLASS, LEBENSZEITINTERVALL_BEGINNT } from './common';

export const BUCHUNGSBLATT_DEFINITION: FeatureTypeDefinition = {
  tableName: 'ax_buchungsblatt',
  tag: 'AX_Buchungsblatt',
  description: 'Land register sheets with number, kind and district key',
  idColumn: 'ax_buchungsblatt_id',
  columns: [
    {
      name: 'buchungsblattnummer_mit_buchstabenerweiterung',
      kind: 'text',
      path: ['buchungsblattnummerMitBuchstabenerweiterung'],
      required: true,
    },
    { name: 'buchungsblattkennzeichen', kind: 'text', path: ['buchungsblattkennzeichen'] },
    {
      name: 'land',
      kind: 'text',
      path: ['buchungsblattbezirk', 'AX_Buchungsblattbezirk_Schluessel', 'land'],
    },
    {
      name: 'bezirk',
      kind: 'text',
      path: ['buchungsblattbezirk', 'AX_Buchungsblattbezirk_Schluessel', 'bezirk'],
    },
    { name: 'blattart', kind: 'text', path: ['blattart'] },
    LEBENSZEITINTERVALL_BEGINNT,
    ANLASS,
  ],
  derived: [
    {
      name: 'schluessel_gesamt',
      derive: ({ land, bezirk }) =>
        typeof land === 'string' && typeof bezirk === 'string' ? `${land}${bezirk}` : null,
    },
  ],
};
