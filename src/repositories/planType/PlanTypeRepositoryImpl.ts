/**
 * Plan type repository implementation
 */

import type { Kysely } from 'kysely';
import {
  BaseCrudRepositoryImpl,
  type ResolvedPagination,
} from '../BaseCrudRepository.js';
import type { PlanTypeRepository } from './PlanTypeRepository.js';
import type {
  PlanType,
  CreatePlanTypeData,
  UpdatePlanTypeData,
  PlanTypeSortColumn,
} from './types.js';
import type {
  Database,
  PlanTypeRow,
  NewPlanTypeRow,
  PlanTypeRowUpdate,
} from '../../database/types.js';

export class PlanTypeRepositoryImpl
  extends BaseCrudRepositoryImpl<
    PlanType,
    CreatePlanTypeData,
    UpdatePlanTypeData,
    PlanTypeSortColumn
  >
  implements PlanTypeRepository
{
  constructor(db: Kysely<Database>) {
    super(db, 'created_at');
  }

  async findById(id: string): Promise<PlanType | null> {
    const row = await this.db
      .selectFrom('plan_types')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();

    return row ? mapPlanTypeRow(row) : null;
  }

  async create(data: CreatePlanTypeData): Promise<PlanType> {
    const values: NewPlanTypeRow = {
      label: data.label,
      description: data.description ?? '',
      sf_id_required: data.sfIdRequired ?? false,
      ns_id_required: data.nsIdRequired ?? false,
      is_paid_subscription: data.isPaidSubscription ?? true,
    };

    const row = await this.db
      .insertInto('plan_types')
      .values(values)
      .returningAll()
      .executeTakeFirstOrThrow();

    return mapPlanTypeRow(row);
  }

  async update(id: string, data: UpdatePlanTypeData): Promise<PlanType | null> {
    const changes: PlanTypeRowUpdate = { updated_at: this.timestamp() };

    if (data.label !== undefined) changes.label = data.label;
    if (data.description !== undefined) changes.description = data.description;
    if (data.sfIdRequired !== undefined) changes.sf_id_required = data.sfIdRequired;
    if (data.nsIdRequired !== undefined) changes.ns_id_required = data.nsIdRequired;
    if (data.isPaidSubscription !== undefined) {
      changes.is_paid_subscription = data.isPaidSubscription;
    }

    const row = await this.db
      .updateTable('plan_types')
      .set(changes)
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirst();

    return row ? mapPlanTypeRow(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db
      .deleteFrom('plan_types')
      .where('id', '=', id)
      .executeTakeFirst();

    return Number(result.numDeletedRows) > 0;
  }

  protected async findPage({
    limit,
    offset,
    sortBy,
    sortOrder,
  }: ResolvedPagination<PlanTypeSortColumn>): Promise<PlanType[]> {
    const rows = await this.db
      .selectFrom('plan_types')
      .selectAll()
      .orderBy(sortBy, sortOrder)
      .limit(limit)
      .offset(offset)
      .execute();

    return rows.map(mapPlanTypeRow);
  }

  protected async countAll(): Promise<number> {
    const { count } = await this.db
      .selectFrom('plan_types')
      .select((eb) => eb.fn.countAll().as('count'))
      .executeTakeFirstOrThrow();

    return Number(count);
  }
}

/**
 * Map database row to domain entity
 */
export function mapPlanTypeRow(row: PlanTypeRow): PlanType {
  return {
    id: row.id,
    label: row.label,
    description: row.description,
    sfIdRequired: row.sf_id_required,
    nsIdRequired: row.ns_id_required,
    isPaidSubscription: row.is_paid_subscription,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
