/**
 * Export / import a scenario's driver values as JSON.
 *
 * Usage:
 *   npm run scenarios:export -- --scenario 3 --year 2025 --out drivers-2025.json
 *   npm run scenarios:export -- --scenario 4 --import drivers-2025.json --user planner
 */

import { readFile, writeFile } from 'fs/promises';
import { pool } from '../lib/db';
import {
  exportScenarioDrivers,
  importScenarioDrivers,
  parseScenarioDriverSet,
  serializeDriverSet,
} from '../lib/drivers';
import { scenarioRepository } from '../lib/scenario-repository';

interface ExportOptions {
  scenarioId?: number;
  year?: number;
  out?: string;
  importFile?: string;
  user: string | null;
}

function parseArgs(): ExportOptions {
  const args = process.argv.slice(2);
  const options: ExportOptions = { user: null };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    if (arg === '--scenario' && next) {
      options.scenarioId = parseInt(next, 10);
      i++;
    } else if (arg === '--year' && next) {
      options.year = parseInt(next, 10);
      i++;
    } else if (arg === '--out' && next) {
      options.out = next;
      i++;
    } else if (arg === '--import' && next) {
      options.importFile = next;
      i++;
    } else if (arg === '--user' && next) {
      options.user = next;
      i++;
    }
  }

  return options;
}

async function main() {
  const options = parseArgs();
  if (!options.scenarioId) throw new Error('--scenario is required');

  if (options.importFile) {
    const driverSet = parseScenarioDriverSet(JSON.parse(await readFile(options.importFile, 'utf8')));
    const saved = await importScenarioDrivers(scenarioRepository, options.scenarioId, driverSet, options.user);
    console.log(`Imported ${saved} values into scenario ${options.scenarioId} (${driverSet.year})`);
    return;
  }

  if (!options.year) throw new Error('--year is required for export');

  const driverSet = await exportScenarioDrivers(scenarioRepository, options.scenarioId, options.year);
  const json = JSON.stringify(serializeDriverSet(driverSet), null, 2);

  if (options.out) {
    await writeFile(options.out, json + '\n', 'utf8');
    console.log(`Exported ${Object.keys(driverSet.drivers).length} drivers to ${options.out}`);
  } else {
    console.log(json);
  }
}

main()
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
