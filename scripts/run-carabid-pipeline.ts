/**
 * Carabid count pipeline runner
 *
 * Reads a cached dataset directory (field_samples.csv, sorting.csv,
 * pinning.csv, expert_taxonomy.csv), reconciles identifications and writes
 * the count table. The output format follows the file extension.
 *
 * Usage: npm run build && node dist/scripts/run-carabid-pipeline.js <dataDir> <output.csv|.xlsx|.json> [siteID,...]
 */

import dotenv from 'dotenv';
import path from 'path';
import { getPipelineConfig } from '../src/config/pipeline';
import { CarabidCountPipeline } from '../src/services/carabid';
import { FileCarabidDataProvider } from '../src/services/carabid/providers/fileProvider';
import { writeCountTable } from '../src/services/exports/countTableExport';

dotenv.config();

void main();

async function main() {
  const [dataDir, output, sites] = process.argv.slice(2);
  if (!dataDir || !output) {
    console.error('Usage: run-carabid-pipeline <dataDir> <output.csv|.xlsx|.json> [siteID,...]');
    process.exitCode = 1;
    return;
  }

  try {
    const pipeline = new CarabidCountPipeline(
      new FileCarabidDataProvider(path.resolve(dataDir)),
      getPipelineConfig()
    );
    const result = await pipeline.run({
      siteIDs: sites ? sites.split(',').map(s => s.trim()).filter(Boolean) : undefined,
    });

    await writeCountTable(result.counts, path.resolve(output), result.integrity);

    console.log(`Collected samples:   ${result.stats.collectedSamples}`);
    console.log(`Reconciled rows:     ${result.reconciled.length} (${result.stats.expertOverrides} expert, ${result.stats.residualRows} residual)`);
    console.log(`Count rows:          ${result.counts.length}`);
    console.log(`Individuals counted: ${result.integrity.countedTotal} of ${result.integrity.declaredTotal} declared`);
    if (!result.integrity.ok) {
      console.warn(`⚠️  ${result.integrity.subsampleMismatches.length} subsamples failed count conservation`);
    }
  } catch (err) {
    console.error(err);
    process.exitCode = 1;
  }
}
