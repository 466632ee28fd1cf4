import type { Queryable } from '@upcheck/db';

import { AppError } from '../middleware/errors';
import { fanOut, MAX_BATCH_SIZE } from '../monitor/fan-out';
import type { CheckResult, CheckStatus, Probe } from '../monitor/types';
import type { CheckBatchInput } from '../schemas/check-batch';
import { persistCheckResult } from './sink';

export type CheckBatchDeps = {
  db: Queryable;
  probe: Probe;
};

export type CheckReportEntry = {
  websiteId: string;
  url: string;
  status: CheckStatus;
  statusCode: number;
  responseTime: number;
};

export function assertBatchSize(count: number): void {
  if (count > MAX_BATCH_SIZE) {
    throw new AppError(
      400,
      'INVALID_ARGUMENT',
      `Too many URLs, maximum allowed is ${MAX_BATCH_SIZE}`,
    );
  }
}

export async function runCheckBatch(
  deps: CheckBatchDeps,
  input: CheckBatchInput,
): Promise<CheckResult[]> {
  assertBatchSize(input.urls.length);

  const collector = await fanOut(input.urls, deps.probe);
  const results = collector.drain();

  let persistFailures = 0;
  for (const r of results) {
    console.log(
      `check: website=${r.websiteId} url=${r.url} status=${r.status} code=${r.statusCode} time=${r.responseTimeMs}ms`,
    );
    const ok = await persistCheckResult(deps.db, r);
    if (!ok) persistFailures += 1;
  }

  const region = input.region ?? 'unknown';
  console.log(
    `batch: region=${region} checked=${results.length} persist_failures=${persistFailures}`,
  );

  return results;
}

export function toReportEntry(result: CheckResult): CheckReportEntry {
  return {
    websiteId: result.websiteId,
    url: result.url,
    status: result.status,
    statusCode: result.statusCode,
    responseTime: result.responseTimeMs,
  };
}

export function serializeCheckReport(results: readonly CheckResult[]): string {
  try {
    return JSON.stringify(results.map(toReportEntry));
  } catch (err) {
    console.error('report: serialization failed', err);
    throw new AppError(500, 'INTERNAL', 'Error generating response');
  }
}
