/**
 * Subscription plan renewal repository implementation
 */

import type { Kysely } from 'kysely';
import {
  BaseCrudRepositoryImpl,
  type ResolvedPagination,
} from '../BaseCrudRepository.js';
import type { RenewalRepository } from './RenewalRepository.js';
import type {
  SubscriptionPlanRenewal,
  CreateRenewalData,
  UpdateRenewalData,
  RenewalSortColumn,
} from './types.js';
import type {
  Database,
  NewSubscriptionPlanRenewalRow,
  SubscriptionPlanRenewalRow,
  SubscriptionPlanRenewalRowUpdate,
} from '../../database/types.js';

export class RenewalRepositoryImpl
  extends BaseCrudRepositoryImpl<
    SubscriptionPlanRenewal,
    CreateRenewalData,
    UpdateRenewalData,
    RenewalSortColumn
  >
  implements RenewalRepository
{
  constructor(db: Kysely<Database>) {
    super(db, 'effective_date');
  }

  async findById(id: string): Promise<SubscriptionPlanRenewal | null> {
    const row = await this.db
      .selectFrom('subscription_plan_renewals')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();

    return row ? mapRenewalRow(row) : null;
  }

  async create(data: CreateRenewalData): Promise<SubscriptionPlanRenewal> {
    const values: NewSubscriptionPlanRenewalRow = {
      prior_subscription_plan_id: data.priorSubscriptionPlanId,
      effective_date: data.effectiveDate,
      renewed_expiration_date: data.renewedExpirationDate,
      number_of_licenses: data.numberOfLicenses,
      salesforce_opportunity_id: data.salesforceOpportunityId ?? null,
      renewed_plan_title: data.renewedPlanTitle ?? null,
    };

    const row = await this.db
      .insertInto('subscription_plan_renewals')
      .values(values)
      .returningAll()
      .executeTakeFirstOrThrow();

    return mapRenewalRow(row);
  }

  async update(
    id: string,
    data: UpdateRenewalData
  ): Promise<SubscriptionPlanRenewal | null> {
    const changes: SubscriptionPlanRenewalRowUpdate = {
      updated_at: this.timestamp(),
    };

    if (data.priorSubscriptionPlanId !== undefined) {
      changes.prior_subscription_plan_id = data.priorSubscriptionPlanId;
    }
    if (data.effectiveDate !== undefined) changes.effective_date = data.effectiveDate;
    if (data.renewedExpirationDate !== undefined) {
      changes.renewed_expiration_date = data.renewedExpirationDate;
    }
    if (data.numberOfLicenses !== undefined) {
      changes.number_of_licenses = data.numberOfLicenses;
    }
    if (data.salesforceOpportunityId !== undefined) {
      changes.salesforce_opportunity_id = data.salesforceOpportunityId;
    }
    if (data.renewedPlanTitle !== undefined) {
      changes.renewed_plan_title = data.renewedPlanTitle;
    }

    const row = await this.db
      .updateTable('subscription_plan_renewals')
      .set(changes)
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirst();

    return row ? mapRenewalRow(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db
      .deleteFrom('subscription_plan_renewals')
      .where('id', '=', id)
      .executeTakeFirst();

    return Number(result.numDeletedRows) > 0;
  }

  protected async findPage({
    limit,
    offset,
    sortBy,
    sortOrder,
  }: ResolvedPagination<RenewalSortColumn>): Promise<SubscriptionPlanRenewal[]> {
    const rows = await this.db
      .selectFrom('subscription_plan_renewals')
      .selectAll()
      .orderBy(sortBy, sortOrder)
      .limit(limit)
      .offset(offset)
      .execute();

    return rows.map(mapRenewalRow);
  }

  protected async countAll(): Promise<number> {
    const { count } = await this.db
      .selectFrom('subscription_plan_renewals')
      .select((eb) => eb.fn.countAll().as('count'))
      .executeTakeFirstOrThrow();

    return Number(count);
  }
}

function mapRenewalRow(row: SubscriptionPlanRenewalRow): SubscriptionPlanRenewal {
  return {
    id: row.id,
    priorSubscriptionPlanId: row.prior_subscription_plan_id,
    renewedSubscriptionPlanId: row.renewed_subscription_plan_id,
    effectiveDate: new Date(row.effective_date),
    renewedExpirationDate: new Date(row.renewed_expiration_date),
    numberOfLicenses: row.number_of_licenses,
    salesforceOpportunityId: row.salesforce_opportunity_id,
    renewedPlanTitle: row.renewed_plan_title,
    processed: row.processed,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
