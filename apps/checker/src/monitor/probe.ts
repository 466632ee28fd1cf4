import { validateProbeUrl } from './targets';
import type { CheckResult, CheckStatus, CheckTarget, Probe } from './types';

const USER_AGENT = 'Upcheck/0.1';

export const DEGRADED_THRESHOLD_MS = 1000;

export type ProbeOptions = {
  timeoutMs: number;
  allowPrivateTargets: boolean;
};

function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function classifyResponse(elapsedMs: number): Exclude<CheckStatus, 'down'> {
  return elapsedMs > DEGRADED_THRESHOLD_MS ? 'degraded' : 'up';
}

async function fetchWithTimeout(
  url: string,
  timeoutMs: number,
  init: RequestInit,
): Promise<Response> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(t);
  }
}

async function releaseBody(res: Response): Promise<void> {
  if (!res.body) return;
  try {
    await res.body.cancel();
  } catch (err) {
    console.warn('probe: failed to release response body', err);
  }
}

export async function probeTarget(target: CheckTarget, options: ProbeOptions): Promise<CheckResult> {
  const down = (responseTimeMs: number): CheckResult => ({
    websiteId: target.websiteId,
    url: target.url,
    status: 'down',
    statusCode: 0,
    responseTimeMs,
  });

  const targetErr = validateProbeUrl(target.url, { allowPrivate: options.allowPrivateTargets });
  if (targetErr) {
    console.warn(`probe: skipped website=${target.websiteId} reason="${targetErr}"`);
    return down(0);
  }

  const started = performance.now();
  const elapsed = () => Math.max(0, Math.round(performance.now() - started));

  let res: Response;
  try {
    res = await fetchWithTimeout(target.url, options.timeoutMs, {
      method: 'GET',
      headers: { 'User-Agent': USER_AGENT },
    });
  } catch (err) {
    const responseTimeMs = elapsed();
    console.warn(`probe: request failed website=${target.websiteId} error="${toErrorMessage(err)}"`);
    return down(responseTimeMs);
  }

  const responseTimeMs = elapsed();
  await releaseBody(res);

  return {
    websiteId: target.websiteId,
    url: target.url,
    status: classifyResponse(responseTimeMs),
    statusCode: res.status,
    responseTimeMs,
  };
}

export function createProbe(options: ProbeOptions): Probe {
  return (target) => probeTarget(target, options);
}
