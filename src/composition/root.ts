import { runProbeScan, type ScanRunResult } from "../application/probe-scan/runProbeScan.usecase";
import type { CountryResolver } from "../ports/CountryResolver";
import type { ResultSink } from "../ports/ResultSink";
import { IpApiCountryResolver } from "../infrastructure/geo/IpApiCountryResolver";
import { TraceCountryResolver } from "../infrastructure/geo/TraceCountryResolver";
import { resolveIpSources } from "../infrastructure/ipsources/ipSource.catalog";
import { IpSourceHttpClient } from "../infrastructure/ipsources/IpSourceHttpClient";
import { createRemoteCandidateSource } from "../infrastructure/ipsources/RemoteCandidateSource";
import { MongoProbeResultRepository } from "../infrastructure/mongo/MongoProbeResultRepository";
import { TcpProber } from "../infrastructure/net/TcpProber";
import { FileResultSink } from "../infrastructure/results/FileResultSink";
import { mergeResultDirectories, type MergeSummary } from "../infrastructure/results/mergeResultDirectories";
import { loadEnv, type Env } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";

const createResolver = (runtime: RuntimeConfig, env: Env): CountryResolver =>
  runtime.resolver === "trace"
    ? new TraceCountryResolver(runtime.scanConfig.timeoutMs)
    : new IpApiCountryResolver(env.GEO_API_BASE_URL);

const createSink = (runtime: RuntimeConfig, env: Env): ResultSink =>
  runtime.sink === "mongo"
    ? new MongoProbeResultRepository(env.MONGO_URI)
    : new FileResultSink(env.OUTPUT_DIR, [`Generated at: ${new Date().toISOString()}`]);

export const runScan = async (): Promise<ScanRunResult> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const sources = resolveIpSources(runtime.sources);

  const source = createRemoteCandidateSource({
    client: new IpSourceHttpClient(runtime.sourceTimeoutMs),
    sources
  });
  const sink = createSink(runtime, env);

  try {
    const result = await runProbeScan({
      source,
      prober: new TcpProber(),
      resolver: createResolver(runtime, env),
      config: runtime.scanConfig
    });
    await sink.write(result.buckets);
    return result;
  } finally {
    await sink.close?.();
  }
};

export const runMerge = async (): Promise<MergeSummary> => {
  const inputDir = process.env.MERGE_INPUT_DIR?.trim() || "ip_results";
  const outputDir = process.env.MERGE_OUTPUT_DIR?.trim() || "merged_results";
  return mergeResultDirectories(inputDir, outputDir);
};
