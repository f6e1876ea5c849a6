import type { Kysely } from 'kysely';
import type { Database } from '../database/types.js';
import type {
  BaseCrudRepository,
  PaginatedResult,
  PaginationOptions,
} from './types.js';

/**
 * Pagination options with every default applied
 */
export interface ResolvedPagination<TSort extends string> {
  page: number;
  limit: number;
  offset: number;
  sortBy: TSort;
  sortOrder: 'asc' | 'desc';
}

/**
 * Abstract base class for CRUD repository implementations
 * Owns pagination; concrete repositories supply the typed Kysely queries
 */
export abstract class BaseCrudRepositoryImpl<
  T,
  CreateData,
  UpdateData,
  TSort extends string,
> implements BaseCrudRepository<T, CreateData, UpdateData, TSort>
{
  constructor(
    protected readonly db: Kysely<Database>,
    private readonly defaultSortBy: TSort
  ) {}

  /**
   * Find all entities with pagination and sorting
   */
  async findAll(
    pagination?: PaginationOptions<TSort>
  ): Promise<PaginatedResult<T>> {
    const {
      page = 1,
      limit = 10,
      sortBy = this.defaultSortBy,
      sortOrder = 'desc',
    } = pagination || {};

    // Calculate offset for pagination
    const offset = (page - 1) * limit;

    // Execute count and data queries in parallel
    const [data, total] = await Promise.all([
      this.findPage({ page, limit, offset, sortBy, sortOrder }),
      this.countAll(),
    ]);

    return {
      data,
      pagination: {
        page,
        limit,
        total,
        totalPages: Math.ceil(total / limit),
      },
    };
  }

  abstract findById(id: string): Promise<T | null>;

  abstract create(data: CreateData): Promise<T>;

  abstract update(id: string, data: UpdateData): Promise<T | null>;

  abstract delete(id: string): Promise<boolean>;

  /**
   * Fetch one page of entities in the requested order
   */
  protected abstract findPage(options: ResolvedPagination<TSort>): Promise<T[]>;

  /**
   * Count every entity in the table
   */
  protected abstract countAll(): Promise<number>;

  /**
   * Timestamp written to updated_at columns
   */
  protected timestamp(): string {
    return new Date().toISOString();
  }
}
