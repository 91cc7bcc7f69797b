/**
 * CIDR canonicalization for advertised and allowed routes.
 *
 * The same route can arrive with different host bits from different sources
 * (`192.168.1.5/24` from one, `192.168.1.0/24` from another). Every route is
 * reduced to its network address in a single textual form before comparison
 * or deduplication. Canonicalizing a canonical route returns it unchanged.
 *
 * @module overlay/cidr
 */
import { isIPv4, isIPv6 } from 'node:net';

/** IPv4 and IPv6 default routes, the pair an active exit node must be allowed. */
export const DEFAULT_ROUTES = ['0.0.0.0/0', '::/0'] as const;

interface ParsedAddress {
  family: 4 | 6;
  value: bigint;
}

function parseIPv4(text: string): bigint {
  return text
    .split('.')
    .reduce((acc, octet) => (acc << 8n) | BigInt(Number.parseInt(octet, 10)), 0n);
}

function parseIPv6(text: string): bigint {
  let groups: string[];
  // Embedded IPv4 tail (::ffff:10.0.0.1) becomes two hex groups
  const lastColon = text.lastIndexOf(':');
  const tail = text.slice(lastColon + 1);
  let head = text;
  const extra: string[] = [];
  if (tail.includes('.')) {
    const v4 = parseIPv4(tail);
    extra.push(((v4 >> 16n) & 0xffffn).toString(16), (v4 & 0xffffn).toString(16));
    head = text.slice(0, lastColon + 1) + '0';
  }

  if (head.includes('::')) {
    const [left, right] = head.split('::');
    const leftGroups = left ? left.split(':') : [];
    const rightGroups = right ? right.split(':') : [];
    if (extra.length > 0) rightGroups.pop();
    const missing = 8 - leftGroups.length - rightGroups.length - extra.length;
    groups = [...leftGroups, ...Array<string>(missing).fill('0'), ...rightGroups, ...extra];
  } else {
    groups = head.split(':');
    if (extra.length > 0) groups.pop();
    groups = [...groups, ...extra];
  }

  return groups.reduce((acc, group) => (acc << 16n) | BigInt(Number.parseInt(group, 16)), 0n);
}

function parseAddress(text: string): ParsedAddress | null {
  if (isIPv4(text)) return { family: 4, value: parseIPv4(text) };
  // Zone ids (fe80::1%eth0) are not routable prefixes
  if (isIPv6(text) && !text.includes('%')) return { family: 6, value: parseIPv6(text) };
  return null;
}

function formatIPv4(value: bigint): string {
  return [24n, 16n, 8n, 0n].map((shift) => String((value >> shift) & 0xffn)).join('.');
}

/** RFC 5952 text: lowercase, no leading zeros, longest zero run compressed. */
function formatIPv6(value: bigint): string {
  const groups: number[] = [];
  for (let shift = 112n; shift >= 0n; shift -= 16n) {
    groups.push(Number((value >> shift) & 0xffffn));
  }

  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < groups.length && groups[j] === 0) j++;
    if (j - i > bestLength) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = groups.map((g) => g.toString(16));
  if (bestLength < 2) return hex.join(':');
  const left = hex.slice(0, bestStart).join(':');
  const right = hex.slice(bestStart + bestLength).join(':');
  return `${left}::${right}`;
}

/**
 * Reduce a CIDR (or bare address) to its canonical network form.
 *
 * Bare addresses are treated as host routes (/32 or /128).
 *
 * @returns The canonical CIDR, or `null` when the input is not a valid route.
 */
export function canonicalizeRoute(input: string): string | null {
  const trimmed = input.trim();
  const slash = trimmed.indexOf('/');
  const addressText = slash === -1 ? trimmed : trimmed.slice(0, slash);
  const prefixText = slash === -1 ? null : trimmed.slice(slash + 1);

  const address = parseAddress(addressText);
  if (!address) return null;

  const width = address.family === 4 ? 32 : 128;
  let prefix = width;
  if (prefixText !== null) {
    if (!/^\d{1,3}$/.test(prefixText)) return null;
    prefix = Number.parseInt(prefixText, 10);
    if (prefix > width) return null;
  }

  const hostBits = BigInt(width - prefix);
  const network = (address.value >> hostBits) << hostBits;
  const text = address.family === 4 ? formatIPv4(network) : formatIPv6(network);
  return `${text}/${prefix}`;
}

/** Whether `input` parses as a route. */
export function isValidRoute(input: string): boolean {
  return canonicalizeRoute(input) !== null;
}

/**
 * Canonicalize, deduplicate, and sort a list of routes. Invalid entries are dropped;
 * callers that must fail closed validate first with {@link isValidRoute}.
 */
export function canonicalizeRoutes(routes: readonly string[]): string[] {
  const canonical = new Set<string>();
  for (const route of routes) {
    const value = canonicalizeRoute(route);
    if (value) canonical.add(value);
  }
  return [...canonical].sort(compareRoutes);
}

/** IPv4 before IPv6, then lexical. Stable for rendering and equality checks. */
function compareRoutes(a: string, b: string): number {
  const aV6 = a.includes(':');
  const bV6 = b.includes(':');
  if (aV6 !== bV6) return aV6 ? 1 : -1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Whether `routes` contains both default routes. */
export function includesDefaultRoutes(routes: readonly string[]): boolean {
  const canonical = new Set(canonicalizeRoutes(routes));
  return DEFAULT_ROUTES.every((route) => canonical.has(route));
}

/** Whether `route` is one of the default routes. */
export function isDefaultRoute(route: string): boolean {
  const canonical = canonicalizeRoute(route);
  return canonical === DEFAULT_ROUTES[0] || canonical === DEFAULT_ROUTES[1];
}
