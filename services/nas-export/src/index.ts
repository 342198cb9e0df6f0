/**
 * NAS Export Command
 *
 * Exports every NAS file of NAS_INPUT_DIR to NAS_EXPORT_DIR. Exits non-zero
 * if a file could not be extracted or a table breaks its contract.
 *
 * Usage: npm start (or npm run export at the repository root)
 */

import { config, logger } from '@nas-extract/shared';
import { exportDirectory } from './lib/export';

async function runExport(): Promise<void> {
  logger.info('Starting NAS export', {
    input_dir: config.inputDir,
    export_dir: config.exportDir,
  });

  const { summaries, failed } = await exportDirectory(config.inputDir, config.exportDir);
  const invalid = summaries.filter((summary) => !summary.valid).map((summary) => summary.source);

  logger.info('NAS export complete', {
    exported: summaries.length,
    failed: failed.length,
    invalid: invalid.length,
  });

  if (failed.length > 0 || invalid.length > 0) {
    throw new Error(`Export incomplete: ${failed.length} failed, ${invalid.length} invalid`);
  }
}

runExport()
  .then(() => process.exit(0))
  .catch((error) => {
    logger.error('NAS export failed', error);
    process.exit(1);
  });
