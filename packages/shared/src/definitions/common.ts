/**
 * Columns shared by several feature types
 */

import type { ColumnDefinition } from './types';

/** Start of the object's life time (AA_Lebenszeitintervall/beginnt) */
export const LEBENSZEITINTERVALL_BEGINNT: ColumnDefinition = {
  name: 'aa_lebenszeitintervall_beginnt',
  kind: 'datetime',
  path: ['lebenszeitintervall', 'AA_Lebenszeitintervall', 'beginnt'],
};

/** Reason code of the last change */
export const ANLASS: ColumnDefinition = {
  name: 'anlass',
  kind: 'text',
  path: ['anlass'],
};
