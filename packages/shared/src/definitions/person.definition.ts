/**
 * AX_Person (person or company)
 */

import type { FeatureTypeDefinition } from './types';
import { ANLASS, LEBENSZEITINTERVALL_BEGINNT } from './common';

export const PERSON_DEFINITION: FeatureTypeDefinition = {
  tableName: 'ax_person',
  tag: 'AX_Person',
  description: 'Persons and companies with name, birth data and address reference',
  idColumn: 'ax_person_id',
  columns: [
    { name: 'nachname_oder_firma', kind: 'text', path: ['nachnameOderFirma'], required: true },
    { name: 'vorname', kind: 'text', path: ['vorname'] },
    { name: 'anrede', kind: 'text', path: ['anrede'] },
    { name: 'namensbestandteil', kind: 'text', path: ['namensbestandteil'] },
    { name: 'akademischer_grad', kind: 'text', path: ['akademischerGrad'] },
    { name: 'geburtsname', kind: 'text', path: ['geburtsname'] },
    { name: 'geburtsdatum', kind: 'text', path: ['geburtsdatum'] },
    { name: 'ax_anschrift_id', kind: 'reference', path: ['hat'] },
    LEBENSZEITINTERVALL_BEGINNT,
    ANLASS,
  ],
};
