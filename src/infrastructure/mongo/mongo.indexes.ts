import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

type IndexPlan = { keys: IndexSpecification; options: CreateIndexesOptions };

/**
 * Index plan for the probe results collection:
 * - unique: { address: 1, port: 1 }
 * - lookup by country ordered by latency
 */
export const mongoIndexes: { probeResultCollection: IndexPlan[] } = {
  probeResultCollection: [
    { keys: { address: 1, port: 1 }, options: { unique: true } },
    { keys: { country: 1, latencyMs: 1 }, options: {} }
  ]
};
