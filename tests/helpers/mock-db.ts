// ---------------------------------------------------------------------------
// Chainable Drizzle mock for route and service tests
// ---------------------------------------------------------------------------
// Builder methods return the chain; `where`, `orderBy`, `limit` and
// `returning` return thenables, so any of them can end an awaited query.
// ---------------------------------------------------------------------------

import { vi } from "vitest";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type MockFn = ReturnType<typeof vi.fn>;

export interface DbChain {
  values: MockFn;
  onConflictDoUpdate: MockFn;
  onConflictDoNothing: MockFn;
  set: MockFn;
  from: MockFn;
  leftJoin: MockFn;
  where: MockFn;
  orderBy: MockFn;
  limit: MockFn;
  returning: MockFn;
}

export interface MockDb {
  insert: MockFn;
  select: MockFn;
  update: MockFn;
  delete: MockFn;
  transaction: MockFn;
  execute: MockFn;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a chain whose awaited value is `terminalResult`.
 * Pass an Error as `failWith` to make every terminal step reject instead.
 */
export function createChainableProxy(terminalResult: unknown = [], failWith?: Error): DbChain {
  const chain: DbChain = {
    values: vi.fn(),
    onConflictDoUpdate: vi.fn(),
    onConflictDoNothing: vi.fn(),
    set: vi.fn(),
    from: vi.fn(),
    leftJoin: vi.fn(),
    where: vi.fn(),
    orderBy: vi.fn(),
    limit: vi.fn(),
    returning: vi.fn(),
  };

  const settle = () => (failWith ? Promise.reject(failWith) : Promise.resolve(terminalResult));

  // Spread the chain so per-test overrides of its methods stay visible
  const makeThenable = () => ({
    ...chain,
    then: (resolve: (val: unknown) => void, reject?: (err: unknown) => void) =>
      settle().then(resolve, reject),
  });

  for (const m of ["set", "from", "leftJoin"] as const) {
    chain[m].mockImplementation(() => chain);
  }
  for (const m of ["values", "onConflictDoUpdate", "onConflictDoNothing"] as const) {
    chain[m].mockImplementation(() => makeThenable());
  }
  for (const m of ["where", "orderBy", "limit", "returning"] as const) {
    chain[m].mockImplementation(() => makeThenable());
  }

  return chain;
}

export function createMockDb(): MockDb {
  return {
    insert: vi.fn(),
    select: vi.fn(),
    update: vi.fn(),
    delete: vi.fn(),
    transaction: vi.fn(),
    execute: vi.fn(),
  };
}

/**
 * Reset every chain to an empty result and wire `transaction` to run its
 * callback against the same mock. Call in beforeEach.
 * Returns the default select chain.
 */
export function resetDbMocks(mockDb: MockDb): DbChain {
  const selectChain = createChainableProxy([]);
  mockDb.insert.mockReset().mockReturnValue(createChainableProxy());
  mockDb.select.mockReset().mockReturnValue(selectChain);
  mockDb.update.mockReset().mockReturnValue(createChainableProxy([]));
  mockDb.delete.mockReset().mockReturnValue(createChainableProxy());
  mockDb.transaction
    .mockReset()
    .mockImplementation(async (fn: (tx: MockDb) => Promise<unknown>) => await fn(mockDb));
  mockDb.execute.mockReset();
  return selectChain;
}

/**
 * Queue results for successive `db.select()` calls, in call order.
 * Returns the chains so tests can inspect what each query received.
 */
export function queueSelects(mockDb: MockDb, ...results: unknown[]): DbChain[] {
  return results.map((result) => {
    const chain = createChainableProxy(result);
    mockDb.select.mockReturnValueOnce(chain);
    return chain;
  });
}
