import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('customer_agreements')
    .addColumn('id', 'uuid', (col) =>
      col.primaryKey().defaultTo(sql`gen_random_uuid()`)
    )
    .addColumn('enterprise_customer_uuid', 'uuid', (col) =>
      col.notNull().unique()
    )
    .addColumn('enterprise_customer_slug', 'varchar(128)', (col) =>
      col.notNull().unique()
    )
    .addColumn('enterprise_customer_name', 'varchar(255)', (col) =>
      col.notNull()
    )
    .addColumn('default_enterprise_catalog_uuid', 'uuid')
    .addColumn('disable_expiration_notifications', 'boolean', (col) =>
      col.notNull().defaultTo(false)
    )
    .addColumn('license_duration_before_purge_days', 'integer', (col) =>
      col.notNull().defaultTo(90)
    )
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn('updated_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createTable('plan_types')
    .addColumn('id', 'uuid', (col) =>
      col.primaryKey().defaultTo(sql`gen_random_uuid()`)
    )
    .addColumn('label', 'varchar(128)', (col) => col.notNull().unique())
    .addColumn('description', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('sf_id_required', 'boolean', (col) =>
      col.notNull().defaultTo(false)
    )
    .addColumn('ns_id_required', 'boolean', (col) =>
      col.notNull().defaultTo(false)
    )
    .addColumn('is_paid_subscription', 'boolean', (col) =>
      col.notNull().defaultTo(true)
    )
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn('updated_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createTable('products')
    .addColumn('id', 'uuid', (col) =>
      col.primaryKey().defaultTo(sql`gen_random_uuid()`)
    )
    .addColumn('name', 'varchar(255)', (col) => col.notNull().unique())
    .addColumn('description', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('netsuite_id', 'integer')
    .addColumn('salesforce_product_id', 'varchar(18)')
    .addColumn('plan_type_id', 'uuid', (col) =>
      col.notNull().references('plan_types.id').onDelete('restrict')
    )
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn('updated_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createTable('subscription_plans')
    .addColumn('id', 'uuid', (col) =>
      col.primaryKey().defaultTo(sql`gen_random_uuid()`)
    )
    .addColumn('title', 'varchar(128)', (col) => col.notNull())
    .addColumn('customer_agreement_id', 'uuid', (col) =>
      col.notNull().references('customer_agreements.id').onDelete('cascade')
    )
    .addColumn('product_id', 'uuid', (col) =>
      col.references('products.id').onDelete('set null')
    )
    .addColumn('enterprise_catalog_uuid', 'uuid')
    .addColumn('salesforce_opportunity_id', 'varchar(18)')
    .addColumn('start_date', 'timestamptz', (col) => col.notNull())
    .addColumn('expiration_date', 'timestamptz', (col) => col.notNull())
    .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('for_internal_use_only', 'boolean', (col) =>
      col.notNull().defaultTo(false)
    )
    .addColumn('is_revocation_cap_enabled', 'boolean', (col) =>
      col.notNull().defaultTo(false)
    )
    .addColumn('revoke_max_percentage', 'integer', (col) =>
      col.notNull().defaultTo(5)
    )
    .addColumn('num_revocations_applied', 'integer', (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn('num_licenses', 'integer', (col) => col.notNull())
    .addColumn('should_auto_apply_licenses', 'boolean', (col) =>
      col.notNull().defaultTo(false)
    )
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn('updated_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addCheckConstraint(
      'check_subscription_plan_dates',
      sql`start_date <= expiration_date`
    )
    .addCheckConstraint(
      'check_revoke_max_percentage',
      sql`revoke_max_percentage >= 0`
    )
    .execute();

  // Backs the auto-apply choice query
  await db.schema
    .createIndex('idx_subscription_plans_agreement_active')
    .on('subscription_plans')
    .columns(['customer_agreement_id', 'is_active', 'start_date'])
    .execute();

  // One auto-applied plan per agreement
  await sql`
    CREATE UNIQUE INDEX idx_subscription_plans_single_auto_apply
    ON subscription_plans (customer_agreement_id)
    WHERE should_auto_apply_licenses
  `.execute(db);

  await db.schema
    .createTable('subscription_plan_renewals')
    .addColumn('id', 'uuid', (col) =>
      col.primaryKey().defaultTo(sql`gen_random_uuid()`)
    )
    .addColumn('prior_subscription_plan_id', 'uuid', (col) =>
      col
        .notNull()
        .unique()
        .references('subscription_plans.id')
        .onDelete('cascade')
    )
    .addColumn('renewed_subscription_plan_id', 'uuid', (col) =>
      col.unique().references('subscription_plans.id').onDelete('set null')
    )
    .addColumn('effective_date', 'timestamptz', (col) => col.notNull())
    .addColumn('renewed_expiration_date', 'timestamptz', (col) => col.notNull())
    .addColumn('number_of_licenses', 'integer', (col) => col.notNull())
    .addColumn('salesforce_opportunity_id', 'varchar(18)')
    .addColumn('renewed_plan_title', 'varchar(128)')
    .addColumn('processed', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn('updated_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('subscription_plan_renewals').execute();
  await db.schema.dropTable('subscription_plans').execute();
  await db.schema.dropTable('products').execute();
  await db.schema.dropTable('plan_types').execute();
  await db.schema.dropTable('customer_agreements').execute();
}
