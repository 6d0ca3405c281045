import { randomUUID } from "crypto";
import { MongoClient, type Collection } from "mongodb";
import type { ProbeResult } from "../../core/probe/probe.types";
import type { Buckets } from "../../core/results/ResultStore";
import type { ResultSink, ResultWriteSummary } from "../../ports/ResultSink";
import { mongoIndexes } from "./mongo.indexes";

export type ProbeResultDoc = {
  _id: string;
  address: string;
  port: number;
  country: string;
  latencyMs: number;
  firstSeenAt: Date;
  lastSeenAt: Date;
};

const endpointKey = (result: ProbeResult) => `${result.address}:${result.port}`;

/**
 * Within one batch the latest result for an endpoint wins.
 */
export const dedupeResultsByEndpoint = (results: ProbeResult[]): ProbeResult[] => {
  const byEndpoint = new Map<string, ProbeResult>();
  for (const result of results) byEndpoint.set(endpointKey(result), result);
  return Array.from(byEndpoint.values());
};

/**
 * Mongo sink upserting results by `{ address, port }`.
 */
export class MongoProbeResultRepository implements ResultSink {
  private client?: MongoClient;
  private collection?: Collection<ProbeResultDoc>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "relay-scout",
    private readonly collectionName = "probe_results"
  ) {}

  private async getCollection(): Promise<Collection<ProbeResultDoc>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    const col = this.client.db(this.dbName).collection<ProbeResultDoc>(this.collectionName);
    for (const idx of mongoIndexes.probeResultCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async write(buckets: Buckets): Promise<ResultWriteSummary> {
    const nonEmpty = Object.values(buckets).filter((results) => results.length > 0);
    const results = dedupeResultsByEndpoint(nonEmpty.flat());
    if (results.length === 0) {
      return { countries: 0, written: 0 };
    }

    const col = await this.getCollection();
    const ops = results.map((result) => ({
      updateOne: {
        filter: { address: result.address, port: result.port },
        update: {
          $setOnInsert: {
            _id: randomUUID(),
            address: result.address,
            port: result.port,
            firstSeenAt: result.timestamp
          },
          $set: {
            country: result.country,
            latencyMs: result.latencyMs,
            lastSeenAt: result.timestamp
          }
        },
        upsert: true
      }
    }));

    const res = await col.bulkWrite(ops, { ordered: false });
    const written = (res.upsertedCount ?? 0) + (res.modifiedCount ?? 0);
    console.log(JSON.stringify({
      event: "results.written",
      sink: "mongo",
      collection: this.collectionName,
      countries: nonEmpty.length,
      written
    }));
    return { countries: nonEmpty.length, written };
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
