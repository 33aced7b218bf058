import db from './db';
import { DrizzleScenarioDriverRepository } from './drivers/drizzle-repository';

export const scenarioRepository = new DrizzleScenarioDriverRepository(db);
