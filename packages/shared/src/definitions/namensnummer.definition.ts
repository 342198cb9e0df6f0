/**
 * AX_Namensnummer (name number)
 *
 * Links a person (benennt) to a land register sheet (istBestandteilVon) with
 * an ownership share. Every element is one row; rows are never merged.
 */

import type { FeatureTypeDefinition } from './types';

export const NAMENSNUMMER_DEFINITION: FeatureTypeDefinition = {
  tableName: 'ax_namensnummer',
  tag: 'AX_Namensnummer',
  description: 'Name numbers linking persons to land register sheets with their share',
  idColumn: 'ax_namensnummer_id',
  columns: [
    { name: 'laufende_nummer', kind: 'text', path: ['laufendeNummerNachDIN1421'] },
    { name: 'ax_person_id', kind: 'reference', path: ['benennt'] },
    { name: 'ax_buchungsblatt_id', kind: 'reference', path: ['istBestandteilVon'] },
    { name: 'art_der_rechtsgemeinschaft', kind: 'text', path: ['artDerRechtsgemeinschaft'] },
    { name: 'beschrieb_der_rechtsgemeinschaft', kind: 'text', path: ['beschriebDerRechtsgemeinschaft'] },
    {
      name: 'besteht_aus_rechtsverhaeltnissen_zu',
      kind: 'reference',
      path: ['bestehtAusRechtsverhaeltnissenZu'],
    },
    { name: 'anteil_zaehler', kind: 'number', path: ['anteil', 'AX_Anteil', 'zaehler'] },
    { name: 'anteil_nenner', kind: 'number', path: ['anteil', 'AX_Anteil', 'nenner'] },
    // Codelist reference; the reason is carried by its title
    { name: 'anlass', kind: 'title', path: ['anlass'] },
  ],
  derived: [
    {
      name: 'anteil',
      derive: ({ anteil_zaehler: zaehler, anteil_nenner: nenner }) =>
        typeof zaehler === 'number' && typeof nenner === 'number' && nenner !== 0
          ? zaehler / nenner
          : null,
    },
  ],
};
