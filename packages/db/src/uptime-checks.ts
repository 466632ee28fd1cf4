import type { Queryable } from './client';

export type UptimeCheckStatus = 'up' | 'degraded' | 'down';

export type UptimeCheckRow = {
  websiteId: string;
  status: UptimeCheckStatus;
  responseTimeMs: number;
  statusCode: number;
};

export async function insertUptimeCheck(db: Queryable, row: UptimeCheckRow): Promise<void> {
  const r = await db.query(
    `
    INSERT INTO uptime_checks (website_id, status, response_time, status_code)
    VALUES ($1, $2, $3, $4)
  `,
    [row.websiteId, row.status, row.responseTimeMs, row.statusCode],
  );

  if (r.rowCount !== null && r.rowCount !== 1) {
    throw new Error(`uptime_checks insert affected ${r.rowCount} rows`);
  }
}
