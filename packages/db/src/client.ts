import pg from 'pg';

export type QueryOutcome = {
  rowCount: number | null;
  rows: unknown[];
};

// The one capability the checker needs from PostgreSQL. `pg.Pool` and the test fakes both satisfy it.
export type Queryable = {
  query(text: string, values?: unknown[]): Promise<QueryOutcome>;
};

export type Db = Queryable & {
  close(): Promise<void>;
};

export function createDb(connectionString: string): Db {
  return dbFromPool(new pg.Pool({ connectionString }));
}

export function dbFromPool(pool: pg.Pool): Db {
  // An idle client dropping its connection is emitted on the pool; unhandled, it would end the process.
  pool.on('error', (err) => {
    console.error('db: idle client error', err);
  });

  return {
    async query(text, values) {
      const r = await pool.query(text, values);
      return { rowCount: r.rowCount, rows: r.rows };
    },
    async close() {
      await pool.end();
    },
  };
}

export async function pingDb(db: Queryable): Promise<void> {
  await db.query('SELECT 1');
}
