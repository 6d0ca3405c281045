import type { Candidate } from "../core/probe/probe.types";

/**
 * Supplies candidates in order. An empty batch means the pool is exhausted.
 * Implementations may throw when they cannot produce candidates at all.
 */
export interface CandidateSource {
  nextBatch(size: number): Promise<Candidate[]>;
}

export class CandidateSourceUnavailableError extends Error {
  constructor(message: string, readonly failedSources: string[] = []) {
    super(message);
    this.name = "CandidateSourceUnavailableError";
  }
}
