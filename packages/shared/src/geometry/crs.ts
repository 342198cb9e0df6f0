/**
 * Coordinate Reference System Helpers
 *
 * NAS documents declare their reference systems as AdV URNs
 * (urn:adv:crs:ETRS89_UTM32). Geometries keep the system they are declared in.
 */

import type { DocumentCrs } from '../types';
import type { NasDocument } from '../xml/document';
import { findChild, getXlinkAttribute, textOf } from '../xml/elements';
import { CRS_PREFIX, isAdvNamespace } from '../xml/namespaces';
import { logger } from '../logger';

const UTM_PATTERN = /^ETRS89_UTM(\d+)$/i;

/**
 * Strip the urn:adv:crs: prefix
 */
export function removeCrsPrefix(value: string): string {
  return value.startsWith(CRS_PREFIX) ? value.slice(CRS_PREFIX.length) : value;
}

/**
 * Horizontal part of a reference system code.
 * Compound codes such as ETRS89_UTM32*DE_DHHN2016_NH name the height system after the asterisk.
 */
export function horizontalCrsCode(value: string): string {
  return removeCrsPrefix(value).split('*')[0];
}

/**
 * Format an ETRS89 UTM code as display name.
 *
 * @example formatCrsName('ETRS89_UTM33') // 'ETRS89 / UTM zone 33N'
 * @throws Error if the code is not of the form ETRS89_UTM<zone>
 */
export function formatCrsName(code: string): string {
  const match = code.match(UTM_PATTERN);
  if (!match) {
    throw new Error(`String '${code}' is not in the expected format 'ETRS89_UTM<number>'`);
  }
  return `ETRS89 / UTM zone ${match[1]}N`;
}

/**
 * EPSG identifier of an ETRS89 UTM code (EPSG:258<zone>), null for anything else
 */
export function toEpsgCode(code: string): string | null {
  const match = code.match(UTM_PATTERN);
  if (!match) return null;
  const zone = parseInt(match[1], 10);
  if (zone < 28 || zone > 38) return null;
  return `EPSG:${25800 + zone}`;
}

/**
 * Describe a reference system code
 */
export function describeCrs(code: string): DocumentCrs {
  let name: string | null = null;
  try {
    name = formatCrsName(code);
  } catch (error) {
    logger.debug('Reference system has no display name', {
      crs: code,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return { code, name, epsg: toEpsgCode(code) };
}

/**
 * Read the standard reference system of a document from its
 * AA_Koordinatenreferenzsystemangaben (the entry with standard = true).
 */
export function readDocumentCrs(nasDocument: NasDocument): DocumentCrs | null {
  const entries = nasDocument.document.getElementsByTagNameNS('*', 'AA_Koordinatenreferenzsystemangaben');

  for (let i = 0; i < entries.length; i++) {
    const entry = entries.item(i);
    if (!entry || !isAdvNamespace(entry.namespaceURI)) continue;
    if (textOf(findChild(entry, 'standard')) !== 'true') continue;

    const href = getXlinkAttribute(findChild(entry, 'crs'), 'href');
    if (href === null) {
      logger.warn('Standard reference system entry without crs reference');
      continue;
    }
    return describeCrs(horizontalCrsCode(href));
  }

  return null;
}
