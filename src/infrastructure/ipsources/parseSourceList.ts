import IPCIDR from "ip-cidr";
import net from "net";
import type { Candidate } from "../../core/probe/probe.types";

export type ParseSourceListOptions = {
  samplesPerCidr: number;
  maxAddresses?: number;
  random?: () => number;
};

export const ipv4ToInt = (ip: string): number =>
  ip.split(".").reduce((acc, octet) => ((acc << 8) + Number(octet)) >>> 0, 0);

export const intToIpv4 = (n: number): string =>
  [n >>> 24, (n >>> 16) & 255, (n >>> 8) & 255, n & 255].join(".");

const readCidrBounds = (cidr: string): { start: string; end: string } | undefined => {
  try {
    const block = new IPCIDR(cidr);
    return { start: String(block.start()), end: String(block.end()) };
  } catch {
    return undefined;
  }
};

const parseCidrRange = (cidr: string): { first: number; last: number } | undefined => {
  const bounds = readCidrBounds(cidr);
  if (!bounds || !net.isIPv4(bounds.start) || !net.isIPv4(bounds.end)) return undefined;
  return { first: ipv4ToInt(bounds.start), last: ipv4ToInt(bounds.end) };
};

/**
 * Random host addresses from an IPv4 block, network and broadcast excluded.
 * Blocks without usable hosts (/31, /32) yield nothing.
 */
export const sampleCidr = (cidr: string, count: number, random: () => number = Math.random): string[] => {
  const range = parseCidrRange(cidr);
  if (!range) return [];

  const hostCount = range.last - range.first - 1;
  if (hostCount <= 0) return [];

  const wanted = Math.min(count, hostCount);
  const picked = new Set<number>();
  for (let attempts = 0; picked.size < wanted && attempts < wanted * 10; attempts += 1) {
    picked.add(range.first + 1 + Math.floor(random() * hostCount));
  }
  return Array.from(picked, intToIpv4);
};

const BRACKETED_WITH_PORT = /^\[([0-9a-fA-F:.]+)\]:(\d+)$/;

const readPort = (raw: string): number | undefined => {
  const port = Number(raw);
  return /^\d+$/.test(raw) && port >= 1 && port <= 65535 ? port : undefined;
};

/**
 * Strips `#comment` and splits an `ip:port` (or `[ipv6]:port`) entry into the
 * address and its port. A port outside 1..65535 is dropped.
 */
export const normalizeSourceLine = (line: string): { entry: string; port?: number } => {
  const [main = ""] = line.split("#", 1);
  const trimmed = main.trim();

  const bracketed = BRACKETED_WITH_PORT.exec(trimmed);
  if (bracketed && net.isIPv6(bracketed[1])) {
    const port = readPort(bracketed[2]);
    return port === undefined ? { entry: bracketed[1] } : { entry: bracketed[1], port };
  }

  const portSeparator = trimmed.lastIndexOf(":");
  if (portSeparator > 0 && net.isIPv4(trimmed.slice(0, portSeparator))) {
    const entry = trimmed.slice(0, portSeparator);
    const port = readPort(trimmed.slice(portSeparator + 1));
    return port === undefined ? { entry } : { entry, port };
  }
  return { entry: trimmed };
};

/**
 * Turns an IP list document into candidates: single IPs are kept with any port
 * the line names, CIDR blocks are sampled, anything else is skipped.
 */
export const parseSourceList = (text: string, opts: ParseSourceListOptions): Candidate[] => {
  const { samplesPerCidr, maxAddresses = Number.POSITIVE_INFINITY, random = Math.random } = opts;
  const candidates = new Map<string, Candidate>();
  const add = (candidate: Candidate) => {
    if (!candidates.has(candidate.address)) candidates.set(candidate.address, candidate);
  };

  for (const rawLine of text.split(/\r?\n/)) {
    if (candidates.size >= maxAddresses) break;
    const { entry, port } = normalizeSourceLine(rawLine);
    if (entry === "") continue;

    if (entry.includes("/")) {
      for (const ip of sampleCidr(entry, samplesPerCidr, random)) add({ address: ip });
    } else if (net.isIP(entry) !== 0) {
      add(port === undefined ? { address: entry } : { address: entry, port });
    }
  }

  return Array.from(candidates.values()).slice(0, Number.isFinite(maxAddresses) ? maxAddresses : undefined);
};
