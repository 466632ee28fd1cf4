import { ResultCollector } from './collector';
import type { CheckResult, CheckTarget, Probe } from './types';

export const MAX_BATCH_SIZE = 5;

function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

// Probes run concurrently and independently; the returned promise settles only
// once every one of them has pushed its result.
export async function fanOut(
  targets: readonly CheckTarget[],
  probe: Probe,
): Promise<ResultCollector<CheckResult>> {
  if (targets.length > MAX_BATCH_SIZE) {
    throw new RangeError(`Batch of ${targets.length} exceeds the maximum of ${MAX_BATCH_SIZE}`);
  }

  const collector = new ResultCollector<CheckResult>(targets.length);

  await Promise.allSettled(
    targets.map(async (target) => {
      let result: CheckResult;
      try {
        result = await probe(target);
      } catch (err) {
        console.error(`fan-out: probe threw website=${target.websiteId} error="${toErrorMessage(err)}"`);
        result = {
          websiteId: target.websiteId,
          url: target.url,
          status: 'down',
          statusCode: 0,
          responseTimeMs: 0,
        };
      }
      collector.push(result);
    }),
  );

  collector.close();
  return collector;
}
