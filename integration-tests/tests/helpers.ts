/**
 * Test Helpers
 *
 * Fixture loading and small NAS document builders.
 */

import fs from 'fs';
import path from 'path';

export const FIXTURES_DIR = path.join(__dirname, '../../fixtures/nas');

/**
 * Read a fixture from fixtures/nas as text
 */
export function loadFixture(name: string): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, name), 'utf-8');
}

/**
 * Wrap feature elements in a minimal NAS document using the default AdV namespace
 */
export function nasDocument(members: string, options: { crs?: string } = {}): string {
  const crs = options.crs
    ? `<koordinatenangaben><AA_Koordinatenreferenzsystemangaben>` +
      `<crs xlink:href="urn:adv:crs:${options.crs}"/><standard>true</standard>` +
      `</AA_Koordinatenreferenzsystemangaben></koordinatenangaben>`
    : '';

  return `<?xml version="1.0" encoding="UTF-8"?>
<AX_Bestandsdatenauszug xmlns="http://www.adv-online.de/namespaces/adv/gid/7.1"
    xmlns:gml="http://www.opengis.net/gml/3.2"
    xmlns:xlink="http://www.w3.org/1999/xlink">
  ${crs}
  <enthaelt>
    ${members}
  </enthaelt>
</AX_Bestandsdatenauszug>`;
}

/**
 * Closed square ring as gml:posList text
 */
export function squarePosList(x: number, y: number, size: number): string {
  return [x, y, x + size, y, x + size, y + size, x, y + size, x, y].join(' ');
}
