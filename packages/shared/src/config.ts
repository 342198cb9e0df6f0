/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export interface Config {
  // Extraction
  stripIdPrefix: boolean;
  defaultSrsDimension: number;

  // Export
  inputDir: string;
  exportDir: string;
  csvDelimiter: string;

  // Logging
  logLevel: string;
}

export const config: Config = {
  // Extraction
  stripIdPrefix: process.env.NAS_STRIP_ID_PREFIX !== 'false',
  defaultSrsDimension: parseInt(process.env.NAS_DEFAULT_SRS_DIMENSION || '2', 10),

  // Export
  inputDir: process.env.NAS_INPUT_DIR || 'test_data',
  exportDir: process.env.NAS_EXPORT_DIR || 'export',
  csvDelimiter: process.env.NAS_CSV_DELIMITER || '|',

  // Logging
  logLevel: process.env.LOG_LEVEL || 'info',
};
