import { describe, expect, it, vi } from 'vitest';
import type { NextFunction, Request, Response } from 'express';
import { errorHandler } from '../../middleware/error-handler.js';
import { peopleResultSet } from '../../models/people.js';
import { DoesPaging } from '../../paging/does-paging.js';
import { deleteRows, listRows } from '../../routes/resource.js';
import { DatabaseError, MissingParameterError, ValidationError } from '../../utils/errors.js';
import { membershipsResultSet } from '../../models/memberships.js';
import { FakeDb, SELECT_PEOPLE } from '../helpers/fake-db.js';

// Suppress pino log noise in tests
vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn().mockReturnThis(),
  }),
}));

// ── Minimal Express doubles ─────────────────────────────────────────────

interface MockResponse {
  statusCode: number;
  body: unknown;
  status(code: number): MockResponse;
  json(body: unknown): MockResponse;
}

function mockResponse(): MockResponse {
  return {
    statusCode: 200,
    body: undefined,
    status(code) {
      this.statusCode = code;
      return this;
    },
    json(body) {
      this.body = body;
      return this;
    },
  };
}

function mockRequest(init: { query?: Record<string, unknown>; body?: unknown }) {
  return { method: 'GET', url: '/api/people', query: init.query ?? {}, body: init.body } as unknown as Request;
}

const asResponse = (res: MockResponse) => res as unknown as Response;

const people = [
  { id: 1, first_name: 'Ada', last_name: 'Lovelace', email: 'ada@example.com' },
  { id: 2, first_name: 'Alan', last_name: 'Turing', email: null },
];

function peopleDb() {
  return new FakeDb((text) =>
    text.startsWith('SELECT COUNT') ? { rows: [{ count: 27 }], rowCount: 1 } : { rows: people, rowCount: 2 },
  );
}

describe('listRows', () => {
  it('responds with the page of rows and its pager', async () => {
    const db = peopleDb();
    const handler = listRows({ name: 'people', paging: new DoesPaging(), resultSet: () => peopleResultSet(db) });
    const res = mockResponse();
    const next = vi.fn();

    await handler(mockRequest({ query: { first_name: 'a', limit: '2', start: '2' } }), asResponse(res), next);

    expect(next).not.toHaveBeenCalled();
    expect(res.body).toEqual({ data: people, total: 27, page: 2, limit: 2, totalPages: 14 });
    expect(db.calls).toContainEqual({
      text: `${SELECT_PEOPLE} WHERE "me"."first_name"::text ILIKE $1 ORDER BY "me"."id" ASC LIMIT $2 OFFSET $3`,
      values: ['%a%', 2, 2],
    });
    expect(db.calls).toContainEqual({
      text: 'SELECT COUNT(*)::int AS count FROM "people" AS "me" WHERE "me"."first_name"::text ILIKE $1',
      values: ['%a%'],
    });
  });

  it('serves at most 100 rows however large the limit', async () => {
    const db = peopleDb();
    const handler = listRows({ name: 'people', paging: new DoesPaging(), resultSet: () => peopleResultSet(db) });
    const res = mockResponse();

    await handler(mockRequest({ query: { limit: '100000' } }), asResponse(res), vi.fn());

    expect(res.body).toEqual({ data: people, total: 27, page: 1, limit: 100, totalPages: 1 });
    expect(db.calls).toContainEqual({ text: `${SELECT_PEOPLE} ORDER BY "me"."id" ASC LIMIT $1 OFFSET $2`, values: [100, 0] });
  });

  it('passes validation failures to next', async () => {
    const db = peopleDb();
    const handler = listRows({ name: 'people', paging: new DoesPaging(), resultSet: () => peopleResultSet(db) });
    const next = vi.fn();

    await handler(mockRequest({ query: { limit: '0' } }), asResponse(mockResponse()), next);

    expect(next).toHaveBeenCalledWith(expect.any(ValidationError));
    expect(db.calls).toEqual([]);
  });
});

describe('deleteRows', () => {
  it('deletes the ids posted in the body', async () => {
    const db = new FakeDb(() => ({ rows: [], rowCount: 2 }));
    const handler = deleteRows({ name: 'people', paging: new DoesPaging(), resultSet: () => peopleResultSet(db) });
    const res = mockResponse();

    await handler(mockRequest({ body: { to_delete: ['1', '2'] } }), asResponse(res), vi.fn());

    expect(res.body).toEqual({ deleted: ['1', '2'] });
    expect(db.calls).toEqual([
      { text: 'DELETE FROM "people" AS "me" WHERE "me"."id" = ANY($1)', values: [['1', '2']] },
    ]);
  });

  it('accepts numeric ids in a JSON body', async () => {
    const db = new FakeDb(() => ({ rows: [], rowCount: 2 }));
    const handler = deleteRows({ name: 'people', paging: new DoesPaging(), resultSet: () => peopleResultSet(db) });
    const res = mockResponse();
    const next = vi.fn();

    await handler(mockRequest({ body: { to_delete: [7, 8] } }), asResponse(res), next);

    expect(next).not.toHaveBeenCalled();
    expect(res.body).toEqual({ deleted: ['7', '8'] });
    expect(db.calls).toEqual([
      { text: 'DELETE FROM "people" AS "me" WHERE "me"."id" = ANY($1)', values: [['7', '8']] },
    ]);
  });

  it('answers 400 when an id does not fit the key column', async () => {
    const db = new FakeDb(() => {
      throw Object.assign(new Error('invalid input syntax for type integer: "x"'), { code: '22P02' });
    });
    const handler = deleteRows({
      name: 'memberships',
      paging: new DoesPaging(),
      resultSet: () => membershipsResultSet(db),
    });
    const next = vi.fn();

    await handler(mockRequest({ query: { to_delete: 'x,7' } }), asResponse(mockResponse()), next);

    expect(next).toHaveBeenCalledWith(expect.any(ValidationError));
    const res = mockResponse();
    errorHandler(next.mock.calls[0][0], mockRequest({}), asResponse(res), vi.fn());
    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'invalid input syntax for type integer: "x"',
        details: { table: 'memberships', operation: 'delete', sqlState: '22P02' },
      },
    });
  });

  it('reads to_delete from the query string', async () => {
    const db = new FakeDb(() => ({ rows: [], rowCount: 3 }));
    const handler = deleteRows({ name: 'people', paging: new DoesPaging(), resultSet: () => peopleResultSet(db) });
    const res = mockResponse();

    await handler(mockRequest({ query: { to_delete: '4,5,6' } }), asResponse(res), vi.fn());

    expect(res.body).toEqual({ deleted: ['4', '5', '6'] });
  });

  it('reports a missing to_delete through next', async () => {
    const db = new FakeDb();
    const handler = deleteRows({ name: 'people', paging: new DoesPaging(), resultSet: () => peopleResultSet(db) });
    const next = vi.fn();

    await handler(mockRequest({}), asResponse(mockResponse()), next);

    expect(next).toHaveBeenCalledWith(expect.any(MissingParameterError));
    expect(db.calls).toEqual([]);
  });
});

describe('errorHandler', () => {
  const next: NextFunction = vi.fn();

  it('sends operational errors with their status, code and context', () => {
    const res = mockResponse();
    errorHandler(new ValidationError('Query parameter (dir) must be asc or desc', { dir: 'up' }), mockRequest({}), asResponse(res), next);

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Query parameter (dir) must be asc or desc',
        details: { dir: 'up' },
      },
    });
  });

  it('hides the message of non-operational errors', () => {
    const res = mockResponse();
    errorHandler(new DatabaseError('select', 'relation "people" does not exist'), mockRequest({}), asResponse(res), next);

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: { code: 'DATABASE_ERROR', message: 'Internal server error' } });
  });

  it('answers 500 for anything else', () => {
    const res = mockResponse();
    errorHandler('not an error', mockRequest({}), asResponse(res), next);

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
  });
});
