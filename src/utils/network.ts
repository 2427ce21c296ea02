/**
 * @module utils/network
 * @fileoverview Private-address detection used to block SSRF before a page
 * fetch leaves the host.
 *
 * A crawl follows links chosen by whoever wrote the page, so a link to
 * `http://169.254.169.254/` or `http://localhost:6379/` must never be fetched.
 * Every A and AAAA record of a hostname is checked; a single private answer
 * blocks the request.
 *
 * ## Blocked Ranges
 * | Range            | Purpose                     |
 * | ---------------- | --------------------------- |
 * | 0.0.0.0/8        | this network                |
 * | 10.0.0.0/8       | private                     |
 * | 100.64.0.0/10    | carrier-grade NAT           |
 * | 127.0.0.0/8      | loopback                    |
 * | 169.254.0.0/16   | link-local, cloud metadata  |
 * | 172.16.0.0/12    | private                     |
 * | 192.0.0.0/24     | IETF protocol assignments   |
 * | 192.168.0.0/16   | private                     |
 * | 198.18.0.0/15    | benchmarking                |
 * | ::1, ::          | IPv6 loopback, unspecified  |
 * | fc00::/7         | IPv6 unique local           |
 * | fe80::/10        | IPv6 link-local             |
 * | ::ffff:0:0/96    | IPv4-mapped (checked as v4) |
 */

import dns from "node:dns/promises";
import { isIP } from "node:net";
import { SecurityError } from "./errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * IPv4
 * ──────────────────────────────────────────────────────────────────────────── */

function ipv4ToInt(ip: string): number {
  return ip
    .split(".")
    .reduce((acc, octet) => ((acc << 8) | parseInt(octet, 10)) >>> 0, 0);
}

interface IPv4Range {
  readonly start: number;
  readonly end: number;
}

function cidr(block: string): IPv4Range {
  const [base, bits] = block.split("/");
  const size = 2 ** (32 - parseInt(bits ?? "32", 10));
  const start = ipv4ToInt(base ?? "0.0.0.0");
  return { start, end: start + size - 1 };
}

const IPV4_PRIVATE_RANGES: readonly IPv4Range[] = [
  "0.0.0.0/8",
  "10.0.0.0/8",
  "100.64.0.0/10",
  "127.0.0.0/8",
  "169.254.0.0/16",
  "172.16.0.0/12",
  "192.0.0.0/24",
  "192.168.0.0/16",
  "198.18.0.0/15",
].map(cidr);

function isIPv4Private(ip: string): boolean {
  const value = ipv4ToInt(ip);
  return IPV4_PRIVATE_RANGES.some((range) => value >= range.start && value <= range.end);
}

/* ────────────────────────────────────────────────────────────────────────────
 * IPv6
 * ──────────────────────────────────────────────────────────────────────────── */

/** Expand to eight zero-padded lowercase groups; zone ids are dropped. */
function expandIPv6(ip: string): string[] {
  const [address = ""] = ip.split("%");
  const halves = address.split("::");

  let groups: string[];
  if (halves.length === 2) {
    const left = halves[0] ? halves[0].split(":") : [];
    const right = halves[1] ? halves[1].split(":") : [];
    const middle = new Array<string>(8 - left.length - right.length).fill("0");
    groups = [...left, ...middle, ...right];
  } else {
    groups = address.split(":");
  }

  return groups.map((group) => group.padStart(4, "0").toLowerCase());
}

function isIPv6Private(ip: string): boolean {
  // Dotted tail, e.g. ::ffff:127.0.0.1
  const dotted = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/i.exec(ip);
  if (dotted?.[1]) return isIPv4Private(dotted[1]);

  const groups = expandIPv6(ip);
  const joined = groups.join(":");

  if (joined === "0000:0000:0000:0000:0000:0000:0000:0001") return true;
  if (joined === "0000:0000:0000:0000:0000:0000:0000:0000") return true;

  const first = parseInt(groups[0] ?? "0", 16);
  if ((first & 0xfe00) === 0xfc00) return true; // fc00::/7
  if ((first & 0xffc0) === 0xfe80) return true; // fe80::/10

  if (joined.startsWith("0000:0000:0000:0000:0000:ffff:")) {
    const high = parseInt(groups[6] ?? "0", 16);
    const low = parseInt(groups[7] ?? "0", 16);
    return isIPv4Private(`${high >> 8}.${high & 0xff}.${low >> 8}.${low & 0xff}`);
  }

  return false;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Public API
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * `true` when `ip` (v4 or v6 literal) is in a private or reserved range.
 */
export function isPrivateIP(ip: string): boolean {
  return ip.includes(":") ? isIPv6Private(ip) : isIPv4Private(ip);
}

/** Resolves a hostname to its A and AAAA records. */
export type HostResolver = (hostname: string) => Promise<string[]>;

/**
 * Default resolver: A and AAAA lookups in parallel. A family with no records
 * contributes nothing; both failing yields an empty list.
 */
export const dnsResolver: HostResolver = async (hostname) => {
  const answers = await Promise.allSettled([dns.resolve4(hostname), dns.resolve6(hostname)]);
  return answers.flatMap((answer) => (answer.status === "fulfilled" ? answer.value : []));
};

/**
 * Throw unless every address `hostname` resolves to is public. IP literals
 * are checked without a lookup.
 *
 * @throws {SecurityError} When the name does not resolve or resolves to a
 *   private address.
 */
export async function validateHostname(
  hostname: string,
  resolve: HostResolver = dnsResolver,
): Promise<void> {
  // URL.hostname keeps the brackets of an IPv6 literal.
  const bare = hostname.replace(/^\[(.*)\]$/, "$1");

  const addresses = isIP(bare) !== 0 ? [bare] : await resolve(bare);
  if (addresses.length === 0) {
    throw new SecurityError(`DNS resolution failed for '${bare}': no A or AAAA records found`);
  }

  const blocked = addresses.find(isPrivateIP);
  if (blocked !== undefined) {
    throw new SecurityError(
      `Hostname '${bare}' resolves to private address ${blocked}; request blocked`,
    );
  }
}
