// [network, prefix length] pairs that a public uptime check has no business reaching.
const BLOCKED_IPV4_RANGES: ReadonlyArray<readonly [string, number]> = [
  ['0.0.0.0', 8],
  ['10.0.0.0', 8],
  ['100.64.0.0', 10], // carrier-grade NAT
  ['127.0.0.0', 8],
  ['169.254.0.0', 16], // link-local
  ['172.16.0.0', 12],
  ['192.0.0.0', 24],
  ['192.168.0.0', 16],
  ['198.18.0.0', 15],
  ['224.0.0.0', 4], // multicast
  ['240.0.0.0', 4],
];

function parseIpv4(host: string): number | null {
  const parts = host.split('.');
  if (parts.length !== 4) return null;

  let value = 0;
  for (const part of parts) {
    if (!/^[0-9]{1,3}$/.test(part)) return null;
    const octet = Number(part);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

function inRange(ip: number, network: string, prefix: number): boolean {
  const base = parseIpv4(network);
  if (base === null) return false;
  const size = 2 ** (32 - prefix);
  return Math.floor(ip / size) === Math.floor(base / size);
}

function isBlockedIpv4(ip: number): boolean {
  return BLOCKED_IPV4_RANGES.some(([network, prefix]) => inRange(ip, network, prefix));
}

// The WHATWG URL parser prints mapped addresses as ::ffff:7f00:1.
function mappedIpv4(host: string): number | null {
  const m = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/.exec(host);
  if (!m) return null;
  const hi = Number.parseInt(m[1] ?? '', 16);
  const lo = Number.parseInt(m[2] ?? '', 16);
  return hi * 65536 + lo;
}

function isBlockedHost(hostname: string): boolean {
  const host = hostname.toLowerCase().replace(/^\[/, '').replace(/\]$/, '');
  if (host === 'localhost' || host.endsWith('.localhost')) return true;

  if (host.includes(':')) {
    if (host === '::' || host === '::1') return true;
    if (host.startsWith('fe80:')) return true;
    if (host.startsWith('fc') || host.startsWith('fd')) return true;
    const mapped = mappedIpv4(host);
    return mapped !== null && isBlockedIpv4(mapped);
  }

  const ip = parseIpv4(host);
  return ip !== null && isBlockedIpv4(ip);
}

export type TargetPolicy = {
  allowPrivate: boolean;
};

export function validateProbeUrl(target: string, policy: TargetPolicy): string | null {
  let url: URL;
  try {
    url = new URL(target);
  } catch {
    return 'target must be a valid URL';
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return 'target protocol must be http or https';
  }
  if (!url.hostname) return 'target must include a hostname';

  if (!policy.allowPrivate && isBlockedHost(url.hostname)) {
    return 'target hostname is not allowed';
  }

  return null;
}
