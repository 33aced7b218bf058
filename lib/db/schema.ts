import {
  boolean,
  index,
  integer,
  numeric,
  pgTable,
  serial,
  text,
  timestamp,
  varchar,
} from 'drizzle-orm/pg-core';

// ============================================================================
// Driver definitions
// ============================================================================

export const driverDefinitions = pgTable('driver_definitions', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 100 }).notNull().unique(),
  description: text('description'),
  driverType: varchar('driver_type', { length: 20 }).notNull(),
  category: varchar('category', { length: 30 }).notNull().default('other'),
  unit: varchar('unit', { length: 50 }).notNull().default(''),
  defaultValue: numeric('default_value', { precision: 18, scale: 6 }).notNull().default('0'),
  minValue: numeric('min_value', { precision: 18, scale: 6 }),
  maxValue: numeric('max_value', { precision: 18, scale: 6 }),
  step: numeric('step', { precision: 18, scale: 6 }).notNull().default('1'),
  dependsOn: text('depends_on'), // JSON array of driver names
  isPlantSpecific: boolean('is_plant_specific').notNull().default(false),
  displayOrder: integer('display_order').notNull().default(0),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
});

// ============================================================================
// Driver values (period_yyyymm: 'YYYYMM' monthly, 'YYYY' annual)
// ============================================================================

export const driverValues = pgTable(
  'driver_values',
  {
    id: serial('id').primaryKey(),
    scenarioId: integer('scenario_id').notNull(),
    driverId: integer('driver_id')
      .notNull()
      .references(() => driverDefinitions.id, { onDelete: 'cascade' }),
    plantId: integer('plant_id'), // NULL = system-wide
    periodYyyymm: varchar('period_yyyymm', { length: 6 }).notNull(),
    value: numeric('value', { precision: 18, scale: 6 }).notNull(),
    notes: text('notes'),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
    updatedBy: varchar('updated_by', { length: 100 }),
  },
  (t) => ({
    lookupIdx: index('ix_driver_value_lookup').on(t.scenarioId, t.driverId, t.periodYyyymm),
    fullIdx: index('ix_driver_value_full').on(t.scenarioId, t.driverId, t.plantId, t.periodYyyymm),
    scenarioPeriodIdx: index('ix_driver_value_scenario_period').on(t.scenarioId, t.periodYyyymm),
  })
);

// ============================================================================
// Audit trail
// ============================================================================

export const driverValueHistory = pgTable(
  'driver_value_history',
  {
    id: serial('id').primaryKey(),
    driverValueId: integer('driver_value_id'), // not a FK: history outlives the value
    scenarioId: integer('scenario_id').notNull(),
    driverId: integer('driver_id').notNull(),
    plantId: integer('plant_id'),
    periodYyyymm: varchar('period_yyyymm', { length: 6 }).notNull(),
    oldValue: numeric('old_value', { precision: 18, scale: 6 }),
    newValue: numeric('new_value', { precision: 18, scale: 6 }),
    changeType: varchar('change_type', { length: 20 }).notNull(),
    changedAt: timestamp('changed_at').notNull().defaultNow(),
    changedBy: varchar('changed_by', { length: 100 }),
  },
  (t) => ({
    lookupIdx: index('ix_driver_history_lookup').on(t.scenarioId, t.driverId, t.periodYyyymm),
  })
);
