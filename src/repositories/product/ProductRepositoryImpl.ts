/**
 * Product repository implementation
 */

import type { Kysely } from 'kysely';
import {
  BaseCrudRepositoryImpl,
  type ResolvedPagination,
} from '../BaseCrudRepository.js';
import type { ProductRepository } from './ProductRepository.js';
import type {
  Product,
  CreateProductData,
  UpdateProductData,
  ProductSortColumn,
} from './types.js';
import type {
  Database,
  ProductRow,
  NewProductRow,
  ProductRowUpdate,
} from '../../database/types.js';

/**
 * Product row joined with the columns of its plan type
 */
type ProductWithPlanTypeRow = ProductRow & {
  plan_type_label: string;
  plan_type_description: string;
  plan_type_sf_id_required: boolean;
  plan_type_ns_id_required: boolean;
  plan_type_is_paid_subscription: boolean;
  plan_type_created_at: Date;
  plan_type_updated_at: Date;
};

// Qualified so the join with plan_types stays unambiguous
const SORT_COLUMNS = {
  created_at: 'products.created_at',
  updated_at: 'products.updated_at',
  name: 'products.name',
} as const satisfies Record<ProductSortColumn, string>;

export class ProductRepositoryImpl
  extends BaseCrudRepositoryImpl<
    Product,
    CreateProductData,
    UpdateProductData,
    ProductSortColumn
  >
  implements ProductRepository
{
  constructor(db: Kysely<Database>) {
    super(db, 'created_at');
  }

  async findById(id: string): Promise<Product | null> {
    const row = await this.selectWithPlanType()
      .where('products.id', '=', id)
      .executeTakeFirst();

    return row ? mapProductRow(row) : null;
  }

  async create(data: CreateProductData): Promise<Product> {
    const values: NewProductRow = {
      name: data.name,
      description: data.description ?? '',
      netsuite_id: data.netsuiteId ?? null,
      salesforce_product_id: data.salesforceProductId ?? null,
      plan_type_id: data.planTypeId,
    };

    const { id } = await this.db
      .insertInto('products')
      .values(values)
      .returning('id')
      .executeTakeFirstOrThrow();

    // Re-read to hydrate the plan type
    const created = await this.findById(id);
    if (!created) {
      throw new Error(`Product ${id} vanished after insert`);
    }
    return created;
  }

  async update(id: string, data: UpdateProductData): Promise<Product | null> {
    const changes: ProductRowUpdate = { updated_at: this.timestamp() };

    if (data.name !== undefined) changes.name = data.name;
    if (data.description !== undefined) changes.description = data.description;
    if (data.netsuiteId !== undefined) changes.netsuite_id = data.netsuiteId;
    if (data.salesforceProductId !== undefined) {
      changes.salesforce_product_id = data.salesforceProductId;
    }
    if (data.planTypeId !== undefined) changes.plan_type_id = data.planTypeId;

    const updated = await this.db
      .updateTable('products')
      .set(changes)
      .where('id', '=', id)
      .returning('id')
      .executeTakeFirst();

    return updated ? this.findById(updated.id) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db
      .deleteFrom('products')
      .where('id', '=', id)
      .executeTakeFirst();

    return Number(result.numDeletedRows) > 0;
  }

  protected async findPage({
    limit,
    offset,
    sortBy,
    sortOrder,
  }: ResolvedPagination<ProductSortColumn>): Promise<Product[]> {
    const rows = await this.selectWithPlanType()
      .orderBy(SORT_COLUMNS[sortBy], sortOrder)
      .limit(limit)
      .offset(offset)
      .execute();

    return rows.map(mapProductRow);
  }

  protected async countAll(): Promise<number> {
    const { count } = await this.db
      .selectFrom('products')
      .select((eb) => eb.fn.countAll().as('count'))
      .executeTakeFirstOrThrow();

    return Number(count);
  }

  private selectWithPlanType() {
    return this.db
      .selectFrom('products')
      .innerJoin('plan_types', 'plan_types.id', 'products.plan_type_id')
      .selectAll('products')
      .select([
        'plan_types.label as plan_type_label',
        'plan_types.description as plan_type_description',
        'plan_types.sf_id_required as plan_type_sf_id_required',
        'plan_types.ns_id_required as plan_type_ns_id_required',
        'plan_types.is_paid_subscription as plan_type_is_paid_subscription',
        'plan_types.created_at as plan_type_created_at',
        'plan_types.updated_at as plan_type_updated_at',
      ]);
  }
}

/**
 * Map a joined product row to the domain entity
 */
function mapProductRow(row: ProductWithPlanTypeRow): Product {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    netsuiteId: row.netsuite_id,
    salesforceProductId: row.salesforce_product_id,
    planTypeId: row.plan_type_id,
    planType: {
      id: row.plan_type_id,
      label: row.plan_type_label,
      description: row.plan_type_description,
      sfIdRequired: row.plan_type_sf_id_required,
      nsIdRequired: row.plan_type_ns_id_required,
      isPaidSubscription: row.plan_type_is_paid_subscription,
      createdAt: new Date(row.plan_type_created_at),
      updatedAt: new Date(row.plan_type_updated_at),
    },
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
