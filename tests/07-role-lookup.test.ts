// =============================================================================
// STOCKROOM — Test Suite 07: Postgres Role Lookup
//
// The pool never connects: query is stubbed per test.
// =============================================================================

import { Pool, QueryResult } from 'pg';
import { PgRoleLookup } from '../src/services/role-lookup';

function roleRows(...roles: string[]): QueryResult<{ role: string }> {
  return {
    command: 'SELECT',
    rowCount: roles.length,
    oid: 0,
    fields: [],
    rows: roles.map((role) => ({ role })),
  };
}

describe('PgRoleLookup', () => {
  let pool: Pool;
  let lookup: PgRoleLookup;

  beforeEach(() => {
    pool = new Pool();
    lookup = new PgRoleLookup(pool);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await pool.end();
  });

  test('only the oldest known role is effective', async () => {
    const query = jest
      .spyOn(pool, 'query')
      .mockImplementation(async () => roleRows('wizard', 'employee', 'admin'));

    expect(await lookup.fetchRoles('u1')).toEqual(['employee']);
    expect(query).toHaveBeenCalledTimes(1);
    expect(query).toHaveBeenCalledWith(expect.stringContaining('archived_at IS NULL'), ['u1']);
    expect(query).toHaveBeenCalledWith(expect.stringContaining('ORDER BY created_at ASC'), ['u1']);
  });

  test('no active assignment gives an empty role set', async () => {
    jest.spyOn(pool, 'query').mockImplementation(async () => roleRows());
    expect(await lookup.fetchRoles('u1')).toEqual([]);
  });

  test('rows holding only unknown roles give an empty role set', async () => {
    jest.spyOn(pool, 'query').mockImplementation(async () => roleRows('wizard', 'ADMIN'));
    expect(await lookup.fetchRoles('u1')).toEqual([]);
  });

  test('an already-aborted signal rejects before querying', async () => {
    const query = jest.spyOn(pool, 'query').mockImplementation(async () => roleRows());
    const controller = new AbortController();
    const reason = new Error('client went away');
    controller.abort(reason);

    await expect(lookup.fetchRoles('u1', controller.signal)).rejects.toBe(reason);
    expect(query).not.toHaveBeenCalled();
  });

  test('a live signal does not stop the query', async () => {
    jest.spyOn(pool, 'query').mockImplementation(async () => roleRows('asset_manager'));
    expect(await lookup.fetchRoles('u1', new AbortController().signal)).toEqual(['asset_manager']);
  });

  test('query failures propagate', async () => {
    const failure = new Error('connection refused');
    jest.spyOn(pool, 'query').mockImplementation(async () => {
      throw failure;
    });
    await expect(lookup.fetchRoles('u1')).rejects.toBe(failure);
  });
});
