/**
 * Document Export
 *
 * Extracts one NAS file and writes its tables next to each other in the
 * export directory: `<table>_<basename>.csv` for every table and
 * `ax_flurstueck_<basename>.geojson` for the parcels.
 */

import fs from 'fs';
import path from 'path';
import {
  config,
  createContext,
  extract,
  logger,
  runWithContextAsync,
  tableToCsv,
  tableToFeatureCollection,
  validateExtractResult,
  type TableName,
} from '@nas-extract/shared';

export interface ExportOptions {
  /** CSV field delimiter (default from config) */
  delimiter: string;
}

export interface ExportSummary {
  source: string;
  files: string[];
  rowCounts: Partial<Record<TableName, number>>;
  valid: boolean;
  validationErrors: string[];
}

/**
 * Extract a NAS file and write its tables.
 *
 * @param file - Path of the NAS XML file
 * @param outDir - Directory for the written files (created if missing)
 */
export async function exportDocument(
  file: string,
  outDir: string,
  options: Partial<ExportOptions> = {}
): Promise<ExportSummary> {
  const { delimiter } = { delimiter: config.csvDelimiter, ...options };
  const basename = path.basename(file, path.extname(file));

  return runWithContextAsync(createContext(path.basename(file)), async () => {
    const content = await fs.promises.readFile(file);
    const result = extract(content, { sourceName: path.basename(file) });

    const validation = validateExtractResult(result);

    await fs.promises.mkdir(outDir, { recursive: true });

    const files: string[] = [];
    const rowCounts: Partial<Record<TableName, number>> = {};

    for (const table of result.tables.values()) {
      const csvPath = path.join(outDir, `${table.name}_${basename}.csv`);
      await fs.promises.writeFile(csvPath, tableToCsv(table, { delimiter }), 'utf-8');
      files.push(csvPath);
      rowCounts[table.name] = table.rows.length;

      if (table.geometryColumn !== null) {
        const geojsonPath = path.join(outDir, `${table.name}_${basename}.geojson`);
        const collection = tableToFeatureCollection(table);
        await fs.promises.writeFile(geojsonPath, JSON.stringify(collection), 'utf-8');
        files.push(geojsonPath);
      }
    }

    logger.info('Exported document', {
      out_dir: outDir,
      file_count: files.length,
      row_counts: rowCounts,
      valid: validation.valid,
    });

    return {
      source: file,
      files,
      rowCounts,
      valid: validation.valid,
      validationErrors: validation.errors ?? [],
    };
  });
}

/**
 * Export every `*.xml` file of a directory, in name order.
 * A file that fails is logged and reported; the others are still exported.
 */
export async function exportDirectory(
  inputDir: string,
  outDir: string,
  options: Partial<ExportOptions> = {}
): Promise<{ summaries: ExportSummary[]; failed: string[] }> {
  const entries = await fs.promises.readdir(inputDir);
  const xmlFiles = entries.filter((entry) => entry.toLowerCase().endsWith('.xml')).sort();

  logger.info('Exporting directory', { input_dir: inputDir, file_count: xmlFiles.length });

  const summaries: ExportSummary[] = [];
  const failed: string[] = [];

  for (const entry of xmlFiles) {
    const file = path.join(inputDir, entry);
    try {
      summaries.push(await exportDocument(file, outDir, options));
    } catch (error) {
      logger.error('Export failed', error, { file });
      failed.push(file);
    }
  }

  return { summaries, failed };
}
