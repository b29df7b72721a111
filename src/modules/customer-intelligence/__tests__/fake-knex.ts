import type { Knex } from "knex";

export type Row = Record<string, unknown>;

/** Chainable stand-in for a knex query builder that resolves to fixed rows. */
export class FakeQuery implements PromiseLike<Row[]> {
  readonly calls: Array<[string, unknown[]]> = [];

  constructor(private readonly result: Row[] | Error) {}

  private record(method: string, args: unknown[]): this {
    this.calls.push([method, args]);
    return this;
  }

  select(...args: unknown[]): this {
    return this.record("select", args);
  }

  leftJoin(...args: unknown[]): this {
    return this.record("leftJoin", args);
  }

  whereNotNull(...args: unknown[]): this {
    return this.record("whereNotNull", args);
  }

  whereNot(...args: unknown[]): this {
    return this.record("whereNot", args);
  }

  orderBy(...args: unknown[]): this {
    return this.record("orderBy", args);
  }

  then<TResult1 = Row[], TResult2 = never>(
    onfulfilled?: ((value: Row[]) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): PromiseLike<TResult1 | TResult2> {
    const settled =
      this.result instanceof Error
        ? Promise.reject(this.result)
        : Promise.resolve(this.result);
    return settled.then(onfulfilled, onrejected);
  }
}

/**
 * Routes `db(table)` calls to canned results keyed by the table expression
 * the repository passes in.
 */
export const buildFakeKnex = (results: Record<string, Row[] | Error>) => {
  const queries = new Map<string, FakeQuery>();
  const db = jest.fn((table: string) => {
    const query = new FakeQuery(results[table] ?? []);
    queries.set(table, query);
    return query;
  });
  // The repository only uses the builder methods FakeQuery implements.
  return { db: db as unknown as Knex, calls: db, queries };
};
