/**
 * Subscription plan repository implementation
 */

import type { Kysely } from 'kysely';
import {
  BaseCrudRepositoryImpl,
  type ResolvedPagination,
} from '../BaseCrudRepository.js';
import type { SubscriptionPlanRepository } from './SubscriptionPlanRepository.js';
import type {
  SubscriptionPlan,
  CreateSubscriptionPlanData,
  UpdateSubscriptionPlanData,
  SubscriptionPlanHistoryEntry,
  SubscriptionPlanSortColumn,
} from './types.js';
import {
  computeRevocationsRemaining,
  DEFAULT_REVOKE_MAX_PERCENTAGE,
} from './revocations.js';
import type {
  ChangeReason,
  Database,
  NewSubscriptionPlanRow,
  SubscriptionPlanHistoryRow,
  SubscriptionPlanRow,
  SubscriptionPlanRowUpdate,
} from '../../database/types.js';

export class SubscriptionPlanRepositoryImpl
  extends BaseCrudRepositoryImpl<
    SubscriptionPlan,
    CreateSubscriptionPlanData,
    UpdateSubscriptionPlanData,
    SubscriptionPlanSortColumn
  >
  implements SubscriptionPlanRepository
{
  constructor(db: Kysely<Database>) {
    super(db, 'created_at');
  }

  async findById(id: string): Promise<SubscriptionPlan | null> {
    const row = await this.db
      .selectFrom('subscription_plans')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();

    return row ? mapSubscriptionPlanRow(row) : null;
  }

  /**
   * Insert the plan and its first history entry in one transaction
   */
  async create(data: CreateSubscriptionPlanData): Promise<SubscriptionPlan> {
    const values: NewSubscriptionPlanRow = {
      title: data.title,
      customer_agreement_id: data.customerAgreementId,
      product_id: data.productId,
      enterprise_catalog_uuid: data.enterpriseCatalogUuid ?? null,
      salesforce_opportunity_id: data.salesforceOpportunityId ?? null,
      start_date: data.startDate,
      expiration_date: data.expirationDate,
      is_active: data.isActive ?? false,
      for_internal_use_only: data.forInternalUseOnly ?? false,
      is_revocation_cap_enabled: data.isRevocationCapEnabled ?? false,
      revoke_max_percentage: data.revokeMaxPercentage ?? DEFAULT_REVOKE_MAX_PERCENTAGE,
      num_licenses: data.numLicenses,
    };

    return this.db.transaction().execute(async (trx) => {
      const row = await trx
        .insertInto('subscription_plans')
        .values(values)
        .returningAll()
        .executeTakeFirstOrThrow();

      await recordHistory(trx, row, data.changeReason);
      return mapSubscriptionPlanRow(row);
    });
  }

  /**
   * Apply the changes and record a history entry in one transaction
   */
  async update(
    id: string,
    data: UpdateSubscriptionPlanData
  ): Promise<SubscriptionPlan | null> {
    const changes: SubscriptionPlanRowUpdate = { updated_at: this.timestamp() };

    if (data.title !== undefined) changes.title = data.title;
    if (data.customerAgreementId !== undefined) {
      changes.customer_agreement_id = data.customerAgreementId;
    }
    if (data.productId !== undefined) changes.product_id = data.productId;
    if (data.enterpriseCatalogUuid !== undefined) {
      changes.enterprise_catalog_uuid = data.enterpriseCatalogUuid;
    }
    if (data.salesforceOpportunityId !== undefined) {
      changes.salesforce_opportunity_id = data.salesforceOpportunityId;
    }
    if (data.startDate !== undefined) changes.start_date = data.startDate;
    if (data.expirationDate !== undefined) {
      changes.expiration_date = data.expirationDate;
    }
    if (data.isActive !== undefined) changes.is_active = data.isActive;
    if (data.forInternalUseOnly !== undefined) {
      changes.for_internal_use_only = data.forInternalUseOnly;
    }
    if (data.isRevocationCapEnabled !== undefined) {
      changes.is_revocation_cap_enabled = data.isRevocationCapEnabled;
    }
    if (data.revokeMaxPercentage !== undefined) {
      changes.revoke_max_percentage = data.revokeMaxPercentage;
    }
    if (data.numLicenses !== undefined) changes.num_licenses = data.numLicenses;

    return this.db.transaction().execute(async (trx) => {
      const row = await trx
        .updateTable('subscription_plans')
        .set(changes)
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();

      if (!row) {
        return null;
      }

      await recordHistory(trx, row, data.changeReason);
      return mapSubscriptionPlanRow(row);
    });
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db
      .deleteFrom('subscription_plans')
      .where('id', '=', id)
      .executeTakeFirst();

    return Number(result.numDeletedRows) > 0;
  }

  async findActiveForAgreement(
    customerAgreementId: string,
    now: Date
  ): Promise<SubscriptionPlan[]> {
    const rows = await this.db
      .selectFrom('subscription_plans')
      .selectAll()
      .where('customer_agreement_id', '=', customerAgreementId)
      .where('is_active', '=', true)
      .where('start_date', '<=', now)
      .where('expiration_date', '>=', now)
      .orderBy('start_date', 'asc')
      .execute();

    return rows.map(mapSubscriptionPlanRow);
  }

  async setAutoApplicableSubscription(
    customerAgreementId: string,
    subscriptionPlanId: string | null
  ): Promise<void> {
    const updatedAt = this.timestamp();

    await this.db.transaction().execute(async (trx) => {
      // Clear first so the partial unique index never sees two flags
      await trx
        .updateTable('subscription_plans')
        .set({ should_auto_apply_licenses: false, updated_at: updatedAt })
        .where('customer_agreement_id', '=', customerAgreementId)
        .where('should_auto_apply_licenses', '=', true)
        .execute();

      if (subscriptionPlanId) {
        await trx
          .updateTable('subscription_plans')
          .set({ should_auto_apply_licenses: true, updated_at: updatedAt })
          .where('id', '=', subscriptionPlanId)
          .where('customer_agreement_id', '=', customerAgreementId)
          .execute();
      }
    });
  }

  async findHistory(
    subscriptionPlanId: string
  ): Promise<SubscriptionPlanHistoryEntry[]> {
    const rows = await this.db
      .selectFrom('subscription_plan_history')
      .selectAll()
      .where('subscription_plan_id', '=', subscriptionPlanId)
      .orderBy('changed_at', 'desc')
      .execute();

    return rows.map(mapHistoryRow);
  }

  protected async findPage({
    limit,
    offset,
    sortBy,
    sortOrder,
  }: ResolvedPagination<SubscriptionPlanSortColumn>): Promise<
    SubscriptionPlan[]
  > {
    const rows = await this.db
      .selectFrom('subscription_plans')
      .selectAll()
      .orderBy(sortBy, sortOrder)
      .limit(limit)
      .offset(offset)
      .execute();

    return rows.map(mapSubscriptionPlanRow);
  }

  protected async countAll(): Promise<number> {
    const { count } = await this.db
      .selectFrom('subscription_plans')
      .select((eb) => eb.fn.countAll().as('count'))
      .executeTakeFirstOrThrow();

    return Number(count);
  }
}

async function recordHistory(
  executor: Kysely<Database>,
  row: SubscriptionPlanRow,
  changeReason: ChangeReason
): Promise<void> {
  await executor
    .insertInto('subscription_plan_history')
    .values({
      subscription_plan_id: row.id,
      change_reason: changeReason,
      snapshot: JSON.stringify(row),
    })
    .execute();
}

/**
 * Map database row to domain entity
 */
export function mapSubscriptionPlanRow(row: SubscriptionPlanRow): SubscriptionPlan {
  const plan = {
    id: row.id,
    title: row.title,
    customerAgreementId: row.customer_agreement_id,
    productId: row.product_id,
    enterpriseCatalogUuid: row.enterprise_catalog_uuid,
    salesforceOpportunityId: row.salesforce_opportunity_id,
    startDate: new Date(row.start_date),
    expirationDate: new Date(row.expiration_date),
    isActive: row.is_active,
    forInternalUseOnly: row.for_internal_use_only,
    isRevocationCapEnabled: row.is_revocation_cap_enabled,
    revokeMaxPercentage: row.revoke_max_percentage,
    numRevocationsApplied: row.num_revocations_applied,
    numLicenses: row.num_licenses,
    shouldAutoApplyLicenses: row.should_auto_apply_licenses,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };

  return { ...plan, numRevocationsRemaining: computeRevocationsRemaining(plan) };
}

function mapHistoryRow(row: SubscriptionPlanHistoryRow): SubscriptionPlanHistoryEntry {
  return {
    id: row.id,
    subscriptionPlanId: row.subscription_plan_id,
    changeReason: row.change_reason,
    snapshot: row.snapshot,
    changedAt: new Date(row.changed_at),
  };
}
