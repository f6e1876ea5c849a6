import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('subscription_plan_history')
    .addColumn('id', 'uuid', (col) =>
      col.primaryKey().defaultTo(sql`gen_random_uuid()`)
    )
    .addColumn('subscription_plan_id', 'uuid', (col) =>
      col.notNull().references('subscription_plans.id').onDelete('cascade')
    )
    .addColumn('change_reason', 'varchar(32)', (col) => col.notNull())
    .addColumn('snapshot', 'jsonb', (col) => col.notNull())
    .addColumn('changed_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await sql`
    ALTER TABLE subscription_plan_history
    ADD CONSTRAINT check_change_reason
    CHECK (change_reason IN ('new', 'renewal', 'expansion', 'manual_changes', 'other'))
  `.execute(db);

  await db.schema
    .createIndex('idx_subscription_plan_history_plan_changed_at')
    .on('subscription_plan_history')
    .columns(['subscription_plan_id', 'changed_at'])
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema
    .dropIndex('idx_subscription_plan_history_plan_changed_at')
    .execute();
  await db.schema.dropTable('subscription_plan_history').execute();
}
