/**
 * Manage carabid datasets stored in MongoDB
 *
 * Usage:
 *   npm run build && node dist/scripts/import-carabid-dataset.js <dataDir> <datasetId>
 *   node dist/scripts/import-carabid-dataset.js --list
 *   node dist/scripts/import-carabid-dataset.js --delete <datasetId>
 */

import dotenv from 'dotenv';
import path from 'path';
import { connectMongoDB, disconnectMongoDB } from '../src/config/database';
import { FileCarabidDataProvider } from '../src/services/carabid/providers/fileProvider';
import {
  deleteCarabidDataset,
  listCarabidDatasets,
  saveCarabidDataset,
} from '../src/services/carabid/dataStorage';

dotenv.config();

const USAGE = 'Usage: import-carabid-dataset <dataDir> <datasetId> | --list | --delete <datasetId>';

void main();

async function run(args: string[]): Promise<boolean> {
  const [first, second] = args;

  if (first === '--list') {
    const datasets = await listCarabidDatasets();
    if (datasets.length === 0) {
      console.log('No carabid datasets stored');
    }
    for (const d of datasets) {
      console.log(`${d.datasetId}\t${d.fieldSamples} field samples\t${d.sites.join(',')}`);
    }
    return true;
  }

  if (first === '--delete' && second) {
    const deleted = await deleteCarabidDataset(second);
    console.log(`Deleted ${deleted} rows of ${second}`);
    return true;
  }

  if (first && second && !first.startsWith('--')) {
    const tables = await new FileCarabidDataProvider(path.resolve(first)).loadTables();
    const counts = await saveCarabidDataset(second, tables);
    console.log(`Imported ${second}: ${counts.fieldSamples} field samples, ${counts.sortRecords} sort, ` +
      `${counts.pinRecords} pin, ${counts.expertRecords} expert rows`);
    return true;
  }

  return false;
}

async function main() {
  const args = process.argv.slice(2);
  if (args.length === 0) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  try {
    await connectMongoDB();
    if (!(await run(args))) {
      console.error(USAGE);
      process.exitCode = 1;
    }
  } catch (err) {
    console.error(err);
    process.exitCode = 1;
  } finally {
    await disconnectMongoDB();
  }
}
