export { createDb, dbFromPool, pingDb, type Db, type QueryOutcome, type Queryable } from './client';
export { insertUptimeCheck, type UptimeCheckRow, type UptimeCheckStatus } from './uptime-checks';
