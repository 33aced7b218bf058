import { and, eq, isNull, like, or, type SQL } from 'drizzle-orm';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import * as schema from '@/lib/db/schema';
import { Decimal } from '@/lib/math';
import type {
  DriverDefinitionRecord,
  DriverValueHistoryInput,
  DriverValueKey,
  DriverValueRecord,
  ScenarioDriverRepository,
  ScenarioDriverValueRow,
  ScenarioValueQuery,
} from './repository';
import type { Driver, PlantId } from './types';

const { driverDefinitions, driverValues, driverValueHistory } = schema;

// Either the root database or a transaction
type Database = PgDatabase<NodePgQueryResultHKT, typeof schema>;

const plantCondition = (plantId: PlantId) =>
  plantId === null ? isNull(driverValues.plantId) : eq(driverValues.plantId, plantId);

const toRecord = (row: typeof driverValues.$inferSelect): DriverValueRecord => ({
  id: row.id,
  scenarioId: row.scenarioId,
  driverId: row.driverId,
  plantId: row.plantId,
  period: row.periodYyyymm,
  value: new Decimal(row.value),
  updatedBy: row.updatedBy,
  updatedAt: row.updatedAt,
});

/**
 * PostgreSQL implementation of the scenario driver bridge's persistence.
 */
export class DrizzleScenarioDriverRepository implements ScenarioDriverRepository {
  constructor(private db: Database) {}

  async listDriverDefinitions(): Promise<DriverDefinitionRecord[]> {
    return this.db
      .select({ id: driverDefinitions.id, name: driverDefinitions.name })
      .from(driverDefinitions);
  }

  async createDriverDefinition(driver: Driver): Promise<DriverDefinitionRecord> {
    const [row] = await this.db
      .insert(driverDefinitions)
      .values({
        name: driver.name,
        description: driver.description,
        driverType: driver.driverType,
        category: driver.category,
        unit: driver.unit,
        defaultValue: driver.defaultValue.toString(),
        minValue: driver.minValue?.toString() ?? null,
        maxValue: driver.maxValue?.toString() ?? null,
        step: driver.step.toString(),
        dependsOn: driver.dependsOn.length > 0 ? JSON.stringify(driver.dependsOn) : null,
        isPlantSpecific: driver.isPlantSpecific,
        displayOrder: driver.displayOrder,
      })
      .returning({ id: driverDefinitions.id, name: driverDefinitions.name });

    if (!row) throw new Error(`[ScenarioDrivers] Failed to create definition: ${driver.name}`);
    return row;
  }

  async findScenarioValues(query: ScenarioValueQuery): Promise<ScenarioDriverValueRow[]> {
    const conditions: (SQL | undefined)[] = [
      eq(driverValues.scenarioId, query.scenarioId),
      like(driverValues.periodYyyymm, `${query.year}%`),
    ];
    if (query.plantId != null) {
      conditions.push(or(eq(driverValues.plantId, query.plantId), isNull(driverValues.plantId)));
    }

    const rows = await this.db
      .select({
        driverName: driverDefinitions.name,
        plantId: driverValues.plantId,
        period: driverValues.periodYyyymm,
        value: driverValues.value,
      })
      .from(driverValues)
      .innerJoin(driverDefinitions, eq(driverValues.driverId, driverDefinitions.id))
      .where(and(...conditions))
      .orderBy(driverDefinitions.name, driverValues.periodYyyymm);

    return rows.map((row) => ({ ...row, value: new Decimal(row.value) }));
  }

  async findDriverValue(key: DriverValueKey): Promise<DriverValueRecord | null> {
    const [row] = await this.db
      .select()
      .from(driverValues)
      .where(
        and(
          eq(driverValues.scenarioId, key.scenarioId),
          eq(driverValues.driverId, key.driverId),
          plantCondition(key.plantId),
          eq(driverValues.periodYyyymm, key.period)
        )
      )
      .limit(1);

    return row ? toRecord(row) : null;
  }

  async createDriverValue(
    key: DriverValueKey,
    value: Decimal,
    updatedBy: string | null
  ): Promise<DriverValueRecord> {
    const [row] = await this.db
      .insert(driverValues)
      .values({
        scenarioId: key.scenarioId,
        driverId: key.driverId,
        plantId: key.plantId,
        periodYyyymm: key.period,
        value: value.toString(),
        updatedBy,
      })
      .returning();

    if (!row) throw new Error(`[ScenarioDrivers] Failed to create value for period ${key.period}`);
    return toRecord(row);
  }

  async updateDriverValue(id: number, value: Decimal, updatedBy: string | null): Promise<void> {
    await this.db
      .update(driverValues)
      .set({ value: value.toString(), updatedBy, updatedAt: new Date() })
      .where(eq(driverValues.id, id));
  }

  async recordHistory(entry: DriverValueHistoryInput): Promise<void> {
    await this.db.insert(driverValueHistory).values({
      driverValueId: entry.driverValueId,
      scenarioId: entry.scenarioId,
      driverId: entry.driverId,
      plantId: entry.plantId,
      periodYyyymm: entry.period,
      oldValue: entry.oldValue?.toString() ?? null,
      newValue: entry.newValue.toString(),
      changeType: entry.changeType,
      changedBy: entry.changedBy,
    });
  }

  async transaction<T>(work: (repo: ScenarioDriverRepository) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(new DrizzleScenarioDriverRepository(tx)));
  }
}
