import { insertUptimeCheck, type Queryable } from '@upcheck/db';

import type { CheckResult } from '../monitor/types';

// One insert per result, no transaction and no retry. A failed write is logged and
// reported to the caller as `false`; it never throws.
export async function persistCheckResult(db: Queryable, result: CheckResult): Promise<boolean> {
  try {
    await insertUptimeCheck(db, {
      websiteId: result.websiteId,
      status: result.status,
      responseTimeMs: result.responseTimeMs,
      statusCode: result.statusCode,
    });
    return true;
  } catch (err) {
    console.error(`persist: insert failed website=${result.websiteId}`, err);
    return false;
  }
}
