import type { CountryCode, ProbeResult } from "../probe/probe.types";

export type Buckets = Record<CountryCode, ProbeResult[]>;

export type ResultStore = {
  insert(result: ProbeResult): boolean;
  size(country: CountryCode): number;
  buckets(): Buckets;
  freeze(): void;
  isFrozen(): boolean;
};

/**
 * Index of the first entry strictly slower than `latencyMs`; inserting there keeps
 * equal latencies in arrival order.
 */
const upperBound = (bucket: readonly ProbeResult[], latencyMs: number): number => {
  let lo = 0;
  let hi = bucket.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (bucket[mid].latencyMs <= latencyMs) lo = mid + 1;
    else hi = mid;
  }
  return lo;
};

/**
 * Per-country buckets sorted ascending by latency. Capacity is the country's quota;
 * a full bucket rejects new results and never evicts an accepted one.
 */
export const createResultStore = (capacities: Record<CountryCode, number>): ResultStore => {
  const bucketsByCountry = new Map<CountryCode, { capacity: number; items: ProbeResult[]; addresses: Set<string> }>();
  for (const [country, capacity] of Object.entries(capacities)) {
    bucketsByCountry.set(country, { capacity, items: [], addresses: new Set() });
  }
  let frozen = false;

  return {
    insert: (result) => {
      if (frozen) return false;
      const bucket = bucketsByCountry.get(result.country);
      if (!bucket) return false;
      if (bucket.items.length >= bucket.capacity) return false;
      if (bucket.addresses.has(result.address)) return false;

      bucket.items.splice(upperBound(bucket.items, result.latencyMs), 0, result);
      bucket.addresses.add(result.address);
      return true;
    },
    size: (country) => bucketsByCountry.get(country)?.items.length ?? 0,
    buckets: () => {
      const out: Buckets = {};
      for (const [country, bucket] of bucketsByCountry) out[country] = bucket.items.slice();
      return out;
    },
    freeze: () => {
      frozen = true;
    },
    isFrozen: () => frozen
  };
};
