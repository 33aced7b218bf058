/**
 * Compare two scenarios' driver values for one year.
 *
 * Usage:
 *   npm run scenarios:compare -- --a 1 --b 2 --year 2025
 *   npm run scenarios:compare -- --a 1 --b 2 --year 2025 --json
 */

import { pool } from '../lib/db';
import { compareScenarioDrivers, type PeriodValues } from '../lib/drivers';
import { scenarioRepository } from '../lib/scenario-repository';

interface CompareOptions {
  a?: number;
  b?: number;
  year?: number;
  json: boolean;
}

function parseArgs(): CompareOptions {
  const args = process.argv.slice(2);
  const options: CompareOptions = { json: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    if (arg === '--a' && next) {
      options.a = parseInt(next, 10);
      i++;
    } else if (arg === '--b' && next) {
      options.b = parseInt(next, 10);
      i++;
    } else if (arg === '--year' && next) {
      options.year = parseInt(next, 10);
      i++;
    } else if (arg === '--json') {
      options.json = true;
    }
  }

  return options;
}

const describe = (values: PeriodValues) => {
  const months = Object.entries(values.monthly).map(([m, v]) => `${m}:${v}`);
  return `annual=${values.annual ?? '-'} monthly={${months.join(', ')}}`;
};

async function main() {
  const { a, b, year, json } = parseArgs();

  if (!a || !b || !year) {
    throw new Error('Usage: compare-scenarios --a <scenarioId> --b <scenarioId> --year <yyyy>');
  }

  const result = await compareScenarioDrivers(scenarioRepository, a, b, year);

  if (json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  console.log('='.repeat(60));
  console.log(`Scenario ${a} vs ${b} (${year})`);
  console.log('='.repeat(60));
  console.log(`Total drivers: ${result.totalDrivers}`);
  console.log(`Same: ${result.sameCount}`);
  console.log(`Different: ${result.differentCount}`);
  console.log(`Only in ${a}: ${result.onlyInACount}`);
  console.log(`Only in ${b}: ${result.onlyInBCount}`);

  for (const diff of result.differences) {
    console.log(`\n${diff.driver}`);
    console.log(`  ${a}: ${describe(diff.scenarioA)}`);
    console.log(`  ${b}: ${describe(diff.scenarioB)}`);
  }

  if (result.onlyInA.length > 0) console.log(`\nOnly in ${a}: ${result.onlyInA.join(', ')}`);
  if (result.onlyInB.length > 0) console.log(`Only in ${b}: ${result.onlyInB.join(', ')}`);
  console.log('='.repeat(60));
}

main()
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
