/**
 * Customer agreement repository implementation
 */

import type { Kysely } from 'kysely';
import {
  BaseCrudRepositoryImpl,
  type ResolvedPagination,
} from '../BaseCrudRepository.js';
import type { CustomerAgreementRepository } from './CustomerAgreementRepository.js';
import type {
  CustomerAgreement,
  CreateCustomerAgreementData,
  UpdateCustomerAgreementData,
  CustomerAgreementSortColumn,
} from './types.js';
import type {
  CustomerAgreementRow,
  CustomerAgreementRowUpdate,
  Database,
  NewCustomerAgreementRow,
} from '../../database/types.js';

/**
 * Agreement row with the flagged plan resolved by subquery
 */
type CustomerAgreementWithAutoApplyRow = CustomerAgreementRow & {
  auto_applicable_subscription_id: string | null;
  auto_applicable_subscription_title: string | null;
};

const SORT_COLUMNS = {
  created_at: 'customer_agreements.created_at',
  updated_at: 'customer_agreements.updated_at',
  enterprise_customer_name: 'customer_agreements.enterprise_customer_name',
} as const satisfies Record<CustomerAgreementSortColumn, string>;

export class CustomerAgreementRepositoryImpl
  extends BaseCrudRepositoryImpl<
    CustomerAgreement,
    CreateCustomerAgreementData,
    UpdateCustomerAgreementData,
    CustomerAgreementSortColumn
  >
  implements CustomerAgreementRepository
{
  constructor(db: Kysely<Database>) {
    super(db, 'created_at');
  }

  async findById(id: string): Promise<CustomerAgreement | null> {
    const row = await this.selectWithAutoApply()
      .where('customer_agreements.id', '=', id)
      .executeTakeFirst();

    return row ? mapCustomerAgreementRow(row) : null;
  }

  async findBySlug(
    enterpriseCustomerSlug: string
  ): Promise<CustomerAgreement | null> {
    const row = await this.selectWithAutoApply()
      .where(
        'customer_agreements.enterprise_customer_slug',
        '=',
        enterpriseCustomerSlug
      )
      .executeTakeFirst();

    return row ? mapCustomerAgreementRow(row) : null;
  }

  async create(data: CreateCustomerAgreementData): Promise<CustomerAgreement> {
    const values: NewCustomerAgreementRow = {
      enterprise_customer_uuid: data.enterpriseCustomerUuid,
      enterprise_customer_slug: data.enterpriseCustomerSlug,
      enterprise_customer_name: data.enterpriseCustomerName,
      default_enterprise_catalog_uuid: data.defaultEnterpriseCatalogUuid ?? null,
      disable_expiration_notifications:
        data.disableExpirationNotifications ?? false,
      license_duration_before_purge_days: data.licenseDurationBeforePurgeDays,
    };

    const row = await this.db
      .insertInto('customer_agreements')
      .values(values)
      .returningAll()
      .executeTakeFirstOrThrow();

    // A fresh agreement has no plans to auto-apply from
    return mapCustomerAgreementRow({
      ...row,
      auto_applicable_subscription_id: null,
      auto_applicable_subscription_title: null,
    });
  }

  async update(
    id: string,
    data: UpdateCustomerAgreementData
  ): Promise<CustomerAgreement | null> {
    const changes: CustomerAgreementRowUpdate = { updated_at: this.timestamp() };

    if (data.enterpriseCustomerUuid !== undefined) {
      changes.enterprise_customer_uuid = data.enterpriseCustomerUuid;
    }
    if (data.enterpriseCustomerSlug !== undefined) {
      changes.enterprise_customer_slug = data.enterpriseCustomerSlug;
    }
    if (data.enterpriseCustomerName !== undefined) {
      changes.enterprise_customer_name = data.enterpriseCustomerName;
    }
    if (data.defaultEnterpriseCatalogUuid !== undefined) {
      changes.default_enterprise_catalog_uuid = data.defaultEnterpriseCatalogUuid;
    }
    if (data.disableExpirationNotifications !== undefined) {
      changes.disable_expiration_notifications =
        data.disableExpirationNotifications;
    }
    if (data.licenseDurationBeforePurgeDays !== undefined) {
      changes.license_duration_before_purge_days =
        data.licenseDurationBeforePurgeDays;
    }

    const updated = await this.db
      .updateTable('customer_agreements')
      .set(changes)
      .where('id', '=', id)
      .returning('id')
      .executeTakeFirst();

    return updated ? this.findById(updated.id) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db
      .deleteFrom('customer_agreements')
      .where('id', '=', id)
      .executeTakeFirst();

    return Number(result.numDeletedRows) > 0;
  }

  protected async findPage({
    limit,
    offset,
    sortBy,
    sortOrder,
  }: ResolvedPagination<CustomerAgreementSortColumn>): Promise<
    CustomerAgreement[]
  > {
    const rows = await this.selectWithAutoApply()
      .orderBy(SORT_COLUMNS[sortBy], sortOrder)
      .limit(limit)
      .offset(offset)
      .execute();

    return rows.map(mapCustomerAgreementRow);
  }

  protected async countAll(): Promise<number> {
    const { count } = await this.db
      .selectFrom('customer_agreements')
      .select((eb) => eb.fn.countAll().as('count'))
      .executeTakeFirstOrThrow();

    return Number(count);
  }

  private selectWithAutoApply() {
    return this.db
      .selectFrom('customer_agreements')
      .selectAll('customer_agreements')
      .select((eb) => [
        eb
          .selectFrom('subscription_plans')
          .select('subscription_plans.id')
          .whereRef(
            'subscription_plans.customer_agreement_id',
            '=',
            'customer_agreements.id'
          )
          .where('subscription_plans.should_auto_apply_licenses', '=', true)
          .limit(1)
          .as('auto_applicable_subscription_id'),
        eb
          .selectFrom('subscription_plans')
          .select('subscription_plans.title')
          .whereRef(
            'subscription_plans.customer_agreement_id',
            '=',
            'customer_agreements.id'
          )
          .where('subscription_plans.should_auto_apply_licenses', '=', true)
          .limit(1)
          .as('auto_applicable_subscription_title'),
      ]);
  }
}

function mapCustomerAgreementRow(
  row: CustomerAgreementWithAutoApplyRow
): CustomerAgreement {
  return {
    id: row.id,
    enterpriseCustomerUuid: row.enterprise_customer_uuid,
    enterpriseCustomerSlug: row.enterprise_customer_slug,
    enterpriseCustomerName: row.enterprise_customer_name,
    defaultEnterpriseCatalogUuid: row.default_enterprise_catalog_uuid,
    disableExpirationNotifications: row.disable_expiration_notifications,
    licenseDurationBeforePurgeDays: row.license_duration_before_purge_days,
    autoApplicableSubscription:
      row.auto_applicable_subscription_id &&
      row.auto_applicable_subscription_title !== null
        ? {
            id: row.auto_applicable_subscription_id,
            title: row.auto_applicable_subscription_title,
          }
        : null,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
