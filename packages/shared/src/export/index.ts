export { tableToCsv, escapeField, type CsvOptions } from './csv';
export { tableToFeatureCollection, type ParcelFeatureCollection } from './geojson';
