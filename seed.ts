import { pool } from './lib/db';
import { ALL_DRIVERS, createDefaultFuelModel, ensureDriverDefinitions } from './lib/drivers';
import { scenarioRepository } from './lib/scenario-repository';

/**
 * Seeds driver_definitions from the default driver set. Existing rows are
 * left as they are.
 */
async function main() {
  console.log('Start seeding...');

  // Surface configuration problems before anything is written
  const model = createDefaultFuelModel();
  const issues = model.registry.validateDependencies();
  if (issues.length > 0) {
    for (const issue of issues) console.error(`  ${issue.message}`);
    throw new Error(`Default drivers have ${issues.length} unknown dependencies`);
  }
  console.log(`Calculation order resolved for ${model.calculationOrder.length} drivers.`);

  const definitions = await ensureDriverDefinitions(scenarioRepository, ALL_DRIVERS);

  console.log(`Seeded ${definitions.size} driver definitions.`);
}

main()
  .catch((error) => {
    console.error('Seeding failed:', error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
