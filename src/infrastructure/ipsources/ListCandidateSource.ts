import type { Candidate } from "../../core/probe/probe.types";
import type { CandidateSource } from "../../ports/CandidateSource";

const toCandidate = (entry: string | Candidate): Candidate =>
  typeof entry === "string" ? { address: entry } : entry;

/**
 * Serves a fixed candidate list in order, duplicate addresses collapsed to their
 * first occurrence.
 */
export const createListCandidateSource = (entries: Iterable<string | Candidate>): CandidateSource => {
  const byAddress = new Map<string, Candidate>();
  for (const entry of entries) {
    const candidate = toCandidate(entry);
    if (!byAddress.has(candidate.address)) byAddress.set(candidate.address, candidate);
  }
  const pool = Array.from(byAddress.values());
  let cursor = 0;

  return {
    nextBatch: async (size) => {
      const batch = pool.slice(cursor, cursor + Math.max(0, size));
      cursor += batch.length;
      return batch;
    }
  };
};
