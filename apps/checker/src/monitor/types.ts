export type CheckStatus = 'up' | 'degraded' | 'down';

export type CheckTarget = {
  readonly websiteId: string;
  readonly url: string;
};

export type CheckResult = {
  readonly websiteId: string;
  readonly url: string;
  readonly status: CheckStatus;
  // 0 when no HTTP response was received.
  readonly statusCode: number;
  readonly responseTimeMs: number;
};

export type Probe = (target: CheckTarget) => Promise<CheckResult>;
