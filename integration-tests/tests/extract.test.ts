/**
 * Extraction Tests
 *
 * Runs extract() on the fixture documents and on small inline documents.
 */

import {
  extract,
  getMetrics,
  MalformedInputError,
  SchemaMismatchError,
  NAS_ERROR_CODES,
  PERSON_DEFINITION,
  type TableName,
} from '@nas-extract/shared';
import { loadFixture, nasDocument, squarePosList } from './helpers';

const TABLE_TAGS: [TableName, string][] = [
  ['ax_flurstueck', 'AX_Flurstueck'],
  ['ax_person', 'AX_Person'],
  ['ax_buchungsblattbezirk', 'AX_Buchungsblattbezirk'],
  ['ax_buchungsblatt', 'AX_Buchungsblatt'],
  ['ax_anschrift', 'AX_Anschrift'],
  ['ax_namensnummer', 'AX_Namensnummer'],
  ['ax_buchungsstelle', 'AX_Buchungsstelle'],
];

function countTags(xml: string, tag: string): number {
  return (xml.match(new RegExp(`<(\\w+:)?${tag}[\\s>/]`, 'g')) ?? []).length;
}

describe('extract', () => {
  const fullXml = loadFixture('bestandsdatenauszug.xml');

  describe('row counts', () => {
    it('should return all seven tables in a fixed order', () => {
      const result = extract(fullXml);

      expect(Array.from(result.tables.keys())).toEqual([
        'ax_flurstueck',
        'ax_person',
        'ax_buchungsblattbezirk',
        'ax_buchungsblatt',
        'ax_anschrift',
        'ax_namensnummer',
        'ax_buchungsstelle',
      ]);
    });

    it('should produce one row per element of each tag', () => {
      const result = extract(fullXml);

      for (const [tableName, tag] of TABLE_TAGS) {
        expect(result.getTable(tableName).rows.length).toBe(countTags(fullXml, tag));
      }
    });

    it('should find the expected number of rows in the fixture', () => {
      const result = extract(fullXml);

      expect(result.getTable('ax_flurstueck').rows).toHaveLength(3);
      expect(result.getTable('ax_person').rows).toHaveLength(2);
      expect(result.getTable('ax_buchungsblattbezirk').rows).toHaveLength(1);
      expect(result.getTable('ax_buchungsblatt').rows).toHaveLength(1);
      expect(result.getTable('ax_anschrift').rows).toHaveLength(1);
      expect(result.getTable('ax_namensnummer').rows).toHaveLength(3);
      expect(result.getTable('ax_buchungsstelle').rows).toHaveLength(1);
    });

    it('should ignore elements of the same name outside the AdV namespace', () => {
      const xml = nasDocument(`
        <other:AX_Person xmlns:other="http://example.com/other" gml:id="DEKY0002f0000099">
          <other:nachnameOderFirma>Fremd</other:nachnameOderFirma>
        </other:AX_Person>`);

      expect(extract(xml).getTable('ax_person').rows).toHaveLength(0);
    });

    it('should ignore feature types without a table', () => {
      const person = `
        <AX_Person gml:id="DEKY0002f0000002">
          <nachnameOderFirma>Mustermann</nachnameOderFirma>
        </AX_Person>`;
      const unknown = `
        <AX_Gebaeude gml:id="DEKY0010f0000001">
          <gebaeudefunktion>2000</gebaeudefunktion>
          <zeigtAuf xlink:href="urn:adv:oid:DEKY0011f0000001"/>
        </AX_Gebaeude>
        <AX_LagebezeichnungMitHausnummer gml:id="DEKY0011f0000001">
          <hausnummer>7</hausnummer>
        </AX_LagebezeichnungMitHausnummer>`;

      const plain = extract(nasDocument(person));
      const withUnknown = extract(nasDocument(unknown + person + unknown));

      expect(Array.from(withUnknown.tables.keys())).toEqual(Array.from(plain.tables.keys()));
      expect(Array.from(withUnknown.tables.values())).toEqual(Array.from(plain.tables.values()));
      expect(withUnknown.getTable('ax_person').rows).toEqual([
        expect.objectContaining({
          ax_person_id: 'DEKY0002f0000002',
          nachname_oder_firma: 'Mustermann',
        }),
      ]);
    });
  });

  describe('parcels', () => {
    it('should read all attributes and the polygon of a parcel', () => {
      const [row] = extract(fullXml).getTable('ax_flurstueck').rows;

      expect(row).toEqual({
        ax_flurstueck_id: 'DENW0001f0000101',
        flurstueckskennzeichen: '05123400100012______',
        amtliche_flaeche: 4850,
        nutzung: '41010,43001',
        flurnummer: 1,
        flurstuecksnummer_zaehler: '12',
        flurstuecksnummer_nenner: '3',
        gemarkung_land: '05',
        gemarkungsnummer: '1234',
        ax_buchungsstelle_id: 'DENW0001f0000601',
        ax_lagebezeichnung_ohne_hausnummer_id: 'DENW0001f0000701',
        ax_lagebezeichnung_mit_hausnummer_ids: 'DENW0001f0000801,DENW0001f0000802',
        zeitpunkt_der_entstehung: '1998-07-01',
        aa_lebenszeitintervall_beginnt: '2015-03-12T09:30:00.000Z',
        geometry: {
          type: 'Polygon',
          coordinates: [
            [
              [350000, 5600000],
              [350100, 5600000],
              [350100, 5600050],
              [350000, 5600050],
              [350000, 5600000],
            ],
            [
              [350010, 5600010],
              [350020, 5600010],
              [350020, 5600020],
              [350010, 5600010],
            ],
          ],
        },
        geometry_crs: 'ETRS89_UTM32',
      });
    });

    it('should keep a parcel with an invalid boundary and null its geometry', () => {
      const rows = extract(fullXml).getTable('ax_flurstueck').rows;

      expect(rows[1]).toEqual({
        ax_flurstueck_id: 'DENW0001f0000102',
        flurstueckskennzeichen: '05123400100013______',
        amtliche_flaeche: 120.5,
        nutzung: null,
        flurnummer: 1,
        flurstuecksnummer_zaehler: '13',
        flurstuecksnummer_nenner: null,
        gemarkung_land: null,
        gemarkungsnummer: null,
        ax_buchungsstelle_id: null,
        ax_lagebezeichnung_ohne_hausnummer_id: null,
        ax_lagebezeichnung_mit_hausnummer_ids: null,
        zeitpunkt_der_entstehung: null,
        aa_lebenszeitintervall_beginnt: '2016-01-05T00:00:00.000Z',
        geometry: null,
        geometry_crs: 'ETRS89_UTM32',
      });
      // the parcel after the broken one is still extracted
      expect(rows[2].ax_flurstueck_id).toBe('DENW0001f0000103');
    });

    it('should chain curve segments of a multi surface into one ring', () => {
      const row = extract(fullXml).getTable('ax_flurstueck').rows[2];

      expect(row.geometry).toEqual({
        type: 'MultiPolygon',
        coordinates: [
          [
            [
              [350200, 5600000],
              [350250, 5600000],
              [350260, 5600025],
              [350250, 5600050],
              [350200, 5600050],
              [350200, 5600000],
            ],
          ],
        ],
      });
      expect(row.geometry_crs).toBe('ETRS89_UTM32');
    });

    it('should null the geometry of a parcel without position', () => {
      const xml = nasDocument(
        `<AX_Flurstueck gml:id="DEKY0001f0000050">
          <flurstueckskennzeichen>16123400200050______</flurstueckskennzeichen>
        </AX_Flurstueck>`,
        { crs: 'ETRS89_UTM32' }
      );

      const [row] = extract(xml).getTable('ax_flurstueck').rows;
      expect(row.geometry).toBeNull();
      expect(row.geometry_crs).toBe('ETRS89_UTM32');
    });

    it('should read a three-dimensional coordinate list', () => {
      const xml = nasDocument(`
        <AX_Flurstueck gml:id="DEKY0001f0000051">
          <position>
            <gml:Polygon>
              <gml:exterior>
                <gml:LinearRing>
                  <gml:posList srsDimension="3">0 0 5 10 0 5 10 10 6 0 0 5</gml:posList>
                </gml:LinearRing>
              </gml:exterior>
            </gml:Polygon>
          </position>
          <flurstueckskennzeichen>16123400200051______</flurstueckskennzeichen>
        </AX_Flurstueck>`);

      const [row] = extract(xml).getTable('ax_flurstueck').rows;
      expect(row.geometry).toEqual({
        type: 'Polygon',
        coordinates: [
          [
            [0, 0, 5],
            [10, 0, 5],
            [10, 10, 6],
            [0, 0, 5],
          ],
        ],
      });
      expect(row.geometry_crs).toBeNull();
    });
  });

  describe('attribute tables', () => {
    it('should read persons with absent fields as null', () => {
      const rows = extract(fullXml).getTable('ax_person').rows;

      expect(rows).toEqual([
        {
          ax_person_id: 'DENW0001f0000201',
          nachname_oder_firma: 'Mustermann',
          vorname: 'Erika',
          anrede: '1100',
          namensbestandteil: null,
          akademischer_grad: 'Dr.',
          geburtsname: 'Gabler',
          geburtsdatum: '1964-08-12',
          ax_anschrift_id: 'DENW0001f0000501',
          aa_lebenszeitintervall_beginnt: '2010-05-01T10:00:00.000Z',
          anlass: '010102',
        },
        {
          ax_person_id: 'DENW0001f0000202',
          nachname_oder_firma: 'Muster & Söhne GmbH',
          vorname: null,
          anrede: null,
          namensbestandteil: null,
          akademischer_grad: null,
          geburtsname: null,
          geburtsdatum: null,
          ax_anschrift_id: null,
          aa_lebenszeitintervall_beginnt: null,
          anlass: null,
        },
      ]);
    });

    it('should read land register districts', () => {
      expect(extract(fullXml).getTable('ax_buchungsblattbezirk').rows).toEqual([
        {
          ax_buchungsblattbezirk_id: 'DENW0001f0000301',
          bezeichnung: 'Musterstadt',
          schluessel_gesamt: '051234',
          land: '05',
          bezirk: '1234',
          dienststelle_land: '05',
          dienststelle_stelle: '0123',
          aa_lebenszeitintervall_beginnt: '2009-11-20T08:00:00.000Z',
          anlass: '000000',
        },
      ]);
    });

    it('should derive the district key of a land register sheet', () => {
      expect(extract(fullXml).getTable('ax_buchungsblatt').rows).toEqual([
        {
          ax_buchungsblatt_id: 'DENW0001f0000401',
          buchungsblattnummer_mit_buchstabenerweiterung: '0000042',
          buchungsblattkennzeichen: '051234000042',
          land: '05',
          bezirk: '1234',
          blattart: '1000',
          aa_lebenszeitintervall_beginnt: '2011-02-14T10:15:00.000Z',
          anlass: '200100',
          schluessel_gesamt: '051234',
        },
      ]);
    });

    it('should read addresses', () => {
      expect(extract(fullXml).getTable('ax_anschrift').rows).toEqual([
        {
          ax_anschrift_id: 'DENW0001f0000501',
          strasse: 'Hauptstraße',
          hausnummer: '12a',
          postleitzahl_postzustellung: '50667',
          ort_post: 'Köln',
          ortsteil: null,
          telefon: null,
          weitere_adressen: null,
          aa_lebenszeitintervall_beginnt: '2010-05-01T10:00:00.000Z',
          anlass: null,
        },
      ]);
    });

    it('should compute the share of each name number', () => {
      const rows = extract(fullXml).getTable('ax_namensnummer').rows;

      expect(rows.map((row) => row.anteil)).toEqual([0.5, 0.25, null]);
      expect(rows[0]).toEqual({
        ax_namensnummer_id: 'DENW0001f0000901',
        laufende_nummer: '0001.00',
        ax_person_id: 'DENW0001f0000201',
        ax_buchungsblatt_id: 'DENW0001f0000401',
        art_der_rechtsgemeinschaft: null,
        beschrieb_der_rechtsgemeinschaft: null,
        besteht_aus_rechtsverhaeltnissen_zu: null,
        anteil_zaehler: 1,
        anteil_nenner: 2,
        anlass: 'Eintragung',
        anteil: 0.5,
      });
      expect(rows[2].beschrieb_der_rechtsgemeinschaft).toBe('Erbengemeinschaft');
    });

    it('should read the reason of a name number from its codelist title', () => {
      const xml = nasDocument(`
        <AX_Namensnummer gml:id="DEKY0009f0000001">
          <anlass xlink:href="urn:adv:codelist:AA_Anlassart:300700" xlink:title="Verschmelzung"/>
        </AX_Namensnummer>
        <AX_Namensnummer gml:id="DEKY0009f0000002">
          <anlass>300700</anlass>
        </AX_Namensnummer>`);

      const rows = extract(xml).getTable('ax_namensnummer').rows;

      expect(rows.map((row) => row.anlass)).toEqual(['Verschmelzung', null]);
    });

    it('should read booking entries', () => {
      expect(extract(fullXml).getTable('ax_buchungsstelle').rows).toEqual([
        {
          ax_buchungsstelle_id: 'DENW0001f0000601',
          buchungsart: '1100',
          laufende_nummer: '0001',
          ax_buchungsblatt_id: 'DENW0001f0000401',
          aa_lebenszeitintervall_beginnt: '2011-02-14T10:15:00.000Z',
        },
      ]);
    });

    it('should give every row exactly the table columns', () => {
      const result = extract(fullXml);

      for (const table of result.tables.values()) {
        for (const row of table.rows) {
          expect(Object.keys(row)).toEqual(table.columns);
        }
      }
    });
  });

  describe('reference systems', () => {
    it('should read the standard reference system of the document', () => {
      const result = extract(fullXml);

      expect(result.crs).toEqual({
        code: 'ETRS89_UTM32',
        name: 'ETRS89 / UTM zone 32N',
        epsg: 'EPSG:25832',
      });
      expect(result.getTable('ax_flurstueck').crs).toBe('ETRS89_UTM32');
      expect(result.getTable('ax_person').crs).toBeNull();
      expect(result.getTable('ax_flurstueck').geometryColumn).toBe('geometry');
      expect(result.getTable('ax_person').geometryColumn).toBeNull();
    });

    it('should return null without reference system declaration', () => {
      expect(extract(nasDocument('')).crs).toBeNull();
    });
  });

  describe('options', () => {
    it('should keep the urn:adv:oid: prefix when asked to', () => {
      const [row] = extract(fullXml, { stripIdPrefix: false }).getTable('ax_flurstueck').rows;

      expect(row.ax_flurstueck_id).toBe('DENW0001f0000101');
      expect(row.ax_buchungsstelle_id).toBe('urn:adv:oid:DENW0001f0000601');
    });

    it('should apply the default dimension to coordinate lists without srsDimension', () => {
      const xml = nasDocument(`
        <AX_Flurstueck gml:id="DEKY0001f0000052">
          <position>
            <gml:Polygon>
              <gml:exterior>
                <gml:LinearRing>
                  <gml:posList>0 0 1 10 0 1 10 10 1 0 0 1</gml:posList>
                </gml:LinearRing>
              </gml:exterior>
            </gml:Polygon>
          </position>
          <flurstueckskennzeichen>16123400200052______</flurstueckskennzeichen>
        </AX_Flurstueck>`);

      const [row] = extract(xml, { defaultSrsDimension: 3 }).getTable('ax_flurstueck').rows;
      expect(row.geometry).toEqual({
        type: 'Polygon',
        coordinates: [
          [
            [0, 0, 1],
            [10, 0, 1],
            [10, 10, 1],
            [0, 0, 1],
          ],
        ],
      });
    });

    it('should extract only the requested feature types', () => {
      const result = extract(fullXml, { featureTypes: [PERSON_DEFINITION] });

      expect(Array.from(result.tables.keys())).toEqual(['ax_person']);
      expect(() => result.getTable('ax_flurstueck')).toThrow('Table not extracted: ax_flurstueck');
    });
  });

  describe('input encodings', () => {
    it('should accept a string starting with a byte order mark', () => {
      const xml = nasDocument(`
        <AX_Person gml:id="DEKY0002f0000002">
          <nachnameOderFirma>Mustermann</nachnameOderFirma>
        </AX_Person>`);

      const [row] = extract(`\uFEFF${xml}`).getTable('ax_person').rows;

      expect(row.nachname_oder_firma).toBe('Mustermann');
    });

    it('should accept UTF-8 bytes', () => {
      const fromBytes = extract(Buffer.from(fullXml, 'utf-8'));

      expect(fromBytes.getTable('ax_anschrift').rows[0].ort_post).toBe('Köln');
    });

    it('should decode bytes with the encoding declared in the prolog', () => {
      const xml = nasDocument(`
        <AX_Anschrift gml:id="DEKY0005f0000001">
          <ort_Post>Münster</ort_Post>
          <strasse>Weißdornweg</strasse>
          <hausnummer>3</hausnummer>
        </AX_Anschrift>`).replace('encoding="UTF-8"', 'encoding="ISO-8859-1"');

      const [row] = extract(Buffer.from(xml, 'latin1')).getTable('ax_anschrift').rows;
      expect(row.ort_post).toBe('Münster');
      expect(row.strasse).toBe('Weißdornweg');
    });

    it('should reject an unknown declared encoding', () => {
      const xml = nasDocument('').replace('encoding="UTF-8"', 'encoding="x-no-such-encoding"');

      expect(() => extract(Buffer.from(xml, 'utf-8'))).toThrow(MalformedInputError);
    });

    it('should reject bytes that are not valid UTF-8', () => {
      const bytes = Buffer.concat([
        Buffer.from('<a>', 'utf-8'),
        Buffer.from([0xc3, 0x28]),
        Buffer.from('</a>', 'utf-8'),
      ]);

      expect(() => extract(bytes)).toThrow(MalformedInputError);
    });
  });

  describe('errors', () => {
    it('should raise MalformedInputError for an unclosed tag', () => {
      const xml = nasDocument(
        '<AX_Person gml:id="DEKY0002f0000002"><nachnameOderFirma>Mustermann</AX_Person>'
      );

      expect(() => extract(xml)).toThrow(MalformedInputError);
    });

    it('should carry the error code on MalformedInputError', () => {
      expect.assertions(2);
      try {
        extract('<AX_Bestandsdatenauszug><enthaelt>');
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedInputError);
        expect(error instanceof MalformedInputError && error.code).toBe(
          NAS_ERROR_CODES.MALFORMED_INPUT
        );
      }
    });

    it('should raise SchemaMismatchError for a feature without gml:id', () => {
      const xml = nasDocument(`
        <AX_Person gml:id="DEKY0002f0000002"><nachnameOderFirma>Mustermann</nachnameOderFirma></AX_Person>
        <AX_Person><nachnameOderFirma>Ohne Kennung</nachnameOderFirma></AX_Person>`);

      expect.assertions(4);
      try {
        extract(xml);
      } catch (error) {
        expect(error).toBeInstanceOf(SchemaMismatchError);
        if (error instanceof SchemaMismatchError) {
          expect(error.table).toBe('ax_person');
          expect(error.column).toBe('ax_person_id');
          expect(error.featureId).toBeNull();
        }
      }
    });

    it('should raise SchemaMismatchError for a missing required field', () => {
      const xml = nasDocument('<AX_Person gml:id="DEKY0002f0000009"><vorname>Max</vorname></AX_Person>');

      expect.assertions(3);
      try {
        extract(xml);
      } catch (error) {
        expect(error).toBeInstanceOf(SchemaMismatchError);
        if (error instanceof SchemaMismatchError) {
          expect(error.column).toBe('nachname_oder_firma');
          expect(error.featureId).toBe('DEKY0002f0000009');
        }
      }
    });
  });

  describe('result value', () => {
    it('should return equal tables for repeated extraction', () => {
      const first = extract(fullXml);
      const second = extract(fullXml);

      expect(Array.from(second.tables.values())).toEqual(Array.from(first.tables.values()));
      expect(second.crs).toEqual(first.crs);
    });

    it('should freeze the result, its tables and rows', () => {
      const result = extract(fullXml);
      const table = result.getTable('ax_flurstueck');
      const [row] = table.rows;

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(table)).toBe(true);
      expect(Object.isFrozen(table.rows)).toBe(true);
      expect(Object.isFrozen(row)).toBe(true);
      expect(Object.isFrozen(row.geometry)).toBe(true);
      expect(Reflect.set(row, 'flurnummer', 99)).toBe(false);
      expect(row.flurnummer).toBe(1);
    });

    it('should keep rows with duplicate feature ids and warn about them', () => {
      const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const xml = nasDocument(`
        <AX_Person gml:id="DEKY0002f0000003"><nachnameOderFirma>Erste</nachnameOderFirma></AX_Person>
        <AX_Person gml:id="DEKY0002f0000003"><nachnameOderFirma>Zweite</nachnameOderFirma></AX_Person>`);

      const rows = extract(xml).getTable('ax_person').rows;

      expect(rows.map((row) => row.nachname_oder_firma)).toEqual(['Erste', 'Zweite']);
      expect(
        warnSpy.mock.calls.some(([line]) => String(line).includes('Duplicate feature ids'))
      ).toBe(true);
      warnSpy.mockRestore();
    });

    it('should record processed documents in the metrics registry', async () => {
      extract(fullXml);
      expect(() => extract('<unclosed>')).toThrow(MalformedInputError);

      const metrics = await getMetrics();
      expect(metrics).toContain('nas_documents_processed_total{status="success"}');
      expect(metrics).toContain('nas_documents_processed_total{status="error"} ');
      expect(metrics).toContain('nas_geometry_failures_total{reason="invalid"}');
    });
  });

  describe('scenario: one parcel and one person', () => {
    const result = extract(loadFixture('flurstueck-person.xml'));

    it('should return one parcel with its geometry', () => {
      const rows = result.getTable('ax_flurstueck').rows;

      expect(rows).toHaveLength(1);
      expect(rows[0].ax_flurstueck_id).toBe('DEKY0001f0000001');
      expect(rows[0].geometry).toEqual({
        type: 'Polygon',
        coordinates: [
          [
            [400000, 5700000],
            [400040, 5700000],
            [400040, 5700030],
            [400000, 5700000],
          ],
        ],
      });
      expect(rows[0].geometry_crs).toBe('ETRS89_UTM33');
    });

    it('should return one person with id and name', () => {
      const rows = result.getTable('ax_person').rows;

      expect(rows).toHaveLength(1);
      expect(rows[0].ax_person_id).toBe('DEKY0002f0000002');
      expect(rows[0].nachname_oder_firma).toBe('Mustermann');
    });

    it('should return the other five tables empty', () => {
      const others: TableName[] = [
        'ax_buchungsblattbezirk',
        'ax_buchungsblatt',
        'ax_anschrift',
        'ax_namensnummer',
        'ax_buchungsstelle',
      ];
      for (const name of others) {
        expect(result.getTable(name).rows).toHaveLength(0);
      }
      expect(result.crs?.epsg).toBe('EPSG:25833');
    });
  });

  it('should read parcels built with the square helper', () => {
    const xml = nasDocument(`
      <AX_Flurstueck gml:id="DEKY0001f0000060">
        <position>
          <gml:Polygon srsName="urn:adv:crs:ETRS89_UTM32">
            <gml:exterior><gml:LinearRing><gml:posList>${squarePosList(100, 200, 10)}</gml:posList></gml:LinearRing></gml:exterior>
          </gml:Polygon>
        </position>
        <flurstueckskennzeichen>16123400200060______</flurstueckskennzeichen>
      </AX_Flurstueck>`);

    const [row] = extract(xml).getTable('ax_flurstueck').rows;
    expect(row.geometry).toEqual({
      type: 'Polygon',
      coordinates: [
        [
          [100, 200],
          [110, 200],
          [110, 210],
          [100, 210],
          [100, 200],
        ],
      ],
    });
  });
});
