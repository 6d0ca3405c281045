import type { Candidate } from "../../core/probe/probe.types";
import { CandidateSourceUnavailableError, type CandidateSource } from "../../ports/CandidateSource";
import type { IpSourceClient } from "../../ports/IpSourceClient";
import { runWorkerPool } from "../../shared/concurrency/workerPool";
import type { IpSourceDefinition } from "./ipSource.catalog";
import { createListCandidateSource } from "./ListCandidateSource";
import { parseSourceList } from "./parseSourceList";

export type RemoteCandidateSourceOptions = {
  client: IpSourceClient;
  sources: IpSourceDefinition[];
  maxPoolSize?: number;
  concurrency?: number;
  random?: () => number;
};

export const shuffleInPlace = <T>(items: T[], random: () => number = Math.random): T[] => {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
};

/**
 * Downloads every configured source on the first `nextBatch`, then serves the merged,
 * deduplicated and shuffled pool. Sources that fail are skipped; if all of them fail
 * the source is unavailable.
 */
export const createRemoteCandidateSource = (opts: RemoteCandidateSourceOptions): CandidateSource => {
  const { client, sources, maxPoolSize = 10000, concurrency = 4, random = Math.random } = opts;
  let loading: Promise<CandidateSource> | undefined;

  const load = async (): Promise<CandidateSource> => {
    const collected = new Map<string, Candidate>();
    const failedSources: string[] = [];
    const pending = sources.slice();

    await runWorkerPool({
      size: Math.max(1, Math.min(concurrency, pending.length || 1)),
      take: async () => pending.shift(),
      work: async (source) => {
        try {
          const text = await client.fetchList(source.url);
          const candidates = parseSourceList(text, {
            samplesPerCidr: source.samplesPerCidr,
            maxAddresses: source.maxAddresses,
            random
          });
          for (const candidate of candidates) {
            if (!collected.has(candidate.address)) collected.set(candidate.address, candidate);
          }
          console.log(JSON.stringify({ event: "source.loaded", source: source.name, addresses: candidates.length }));
        } catch (err) {
          failedSources.push(source.name);
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "source.failed",
            source: source.name,
            reason: err instanceof Error ? err.message : String(err)
          }));
        }
      }
    });

    if (sources.length > 0 && failedSources.length === sources.length) {
      throw new CandidateSourceUnavailableError(
        `All ${sources.length} IP sources failed: ${failedSources.join(", ")}`,
        failedSources
      );
    }

    const pool = shuffleInPlace(Array.from(collected.values()), random).slice(0, maxPoolSize);
    console.log(JSON.stringify({ event: "source.pool_ready", candidates: pool.length, failedSources }));
    return createListCandidateSource(pool);
  };

  return {
    nextBatch: async (size) => {
      if (!loading) loading = load();
      const pool = await loading;
      return pool.nextBatch(size);
    }
  };
};
