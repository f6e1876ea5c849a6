import { describe, it, expect, beforeEach } from 'vitest';
import {
  DummyDriver,
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type CompiledQuery,
} from 'kysely';
import type { Database } from '../../../database/types.js';
import { SubscriptionPlanRepositoryImpl } from '../SubscriptionPlanRepositoryImpl.js';

const AGREEMENT_ID = 'a1b2c3d4-0000-4000-8000-0000000000aa';
const PLAN_ID = 'a1b2c3d4-0000-4000-8000-00000000000a';

describe('SubscriptionPlanRepositoryImpl', () => {
  let queries: CompiledQuery[];
  let repository: SubscriptionPlanRepositoryImpl;

  beforeEach(() => {
    queries = [];
    const db = new Kysely<Database>({
      dialect: {
        createAdapter: () => new PostgresAdapter(),
        createDriver: () => new DummyDriver(),
        createIntrospector: (database) => new PostgresIntrospector(database),
        createQueryCompiler: () => new PostgresQueryCompiler(),
      },
      log: (event) => {
        queries.push(event.query);
      },
    });
    repository = new SubscriptionPlanRepositoryImpl(db);
  });

  describe('findActiveForAgreement', () => {
    it('filters on agreement, active flag and a term containing now', async () => {
      const now = new Date('2026-03-15T12:00:00Z');

      const plans = await repository.findActiveForAgreement(AGREEMENT_ID, now);

      expect(plans).toEqual([]);
      expect(queries).toHaveLength(1);
      expect(queries[0]?.sql).toBe(
        'select * from "subscription_plans" where "customer_agreement_id" = $1 and "is_active" = $2 and "start_date" <= $3 and "expiration_date" >= $4 order by "start_date" asc'
      );
      expect(queries[0]?.parameters).toEqual([AGREEMENT_ID, true, now, now]);
    });
  });

  describe('setAutoApplicableSubscription', () => {
    it('clears the current flag before setting the new one', async () => {
      await repository.setAutoApplicableSubscription(AGREEMENT_ID, PLAN_ID);

      expect(queries.map((query) => query.sql)).toEqual([
        'update "subscription_plans" set "should_auto_apply_licenses" = $1, "updated_at" = $2 where "customer_agreement_id" = $3 and "should_auto_apply_licenses" = $4',
        'update "subscription_plans" set "should_auto_apply_licenses" = $1, "updated_at" = $2 where "id" = $3 and "customer_agreement_id" = $4',
      ]);
      expect(queries[1]?.parameters).toEqual([
        true,
        expect.any(String),
        PLAN_ID,
        AGREEMENT_ID,
      ]);
    });

    it('only clears the flag when no plan is chosen', async () => {
      await repository.setAutoApplicableSubscription(AGREEMENT_ID, null);

      expect(queries).toHaveLength(1);
      expect(queries[0]?.parameters).toEqual([
        false,
        expect.any(String),
        AGREEMENT_ID,
        true,
      ]);
    });
  });

  it('returns null for an unknown plan', async () => {
    await expect(repository.findById(PLAN_ID)).resolves.toBeNull();
  });
});
