import {
  createProbeResult,
  type Candidate,
  normalizeCountryCode,
  UNKNOWN_COUNTRY,
  type CountryCode,
  type ProbeMeasurement
} from "../../core/probe/probe.types";
import { createQuotaTracker, type QuotaState } from "../../core/quota/QuotaTracker";
import { createResultStore, type Buckets } from "../../core/results/ResultStore";
import type { CandidateSource } from "../../ports/CandidateSource";
import type { CountryResolver } from "../../ports/CountryResolver";
import type { Prober } from "../../ports/Prober";
import { createStopSignal } from "../../shared/concurrency/stopSignal";
import { runWorkerPool } from "../../shared/concurrency/workerPool";
import { probeCandidate } from "./probeCandidate";
import type { ScanConfigInput } from "./scan.config";
import { resolveScanConfig } from "./scan.config";
import {
  createScanRunSummaryTracker,
  type ScanRunSummary,
  type ScanRunSummaryTracker,
  wrapSourceUnavailable
} from "./scan.error-handler";

export type StopReason = "quota_satisfied" | "pool_exhausted" | "scan_cap_reached";

export type ScanRunResult = {
  buckets: Buckets;
  stopReason: StopReason;
  satisfied: boolean;
  quotas: Record<CountryCode, QuotaState>;
  summary: ScanRunSummary;
};

export type ScanDeps = {
  source: CandidateSource;
  prober: Prober;
  resolver: CountryResolver;
  config: ScanConfigInput;
  clock?: () => number;
};

const resolveCountry = async (
  resolver: CountryResolver,
  address: string,
  tracker: ScanRunSummaryTracker
): Promise<CountryCode> => {
  try {
    return normalizeCountryCode(await resolver.resolve(address));
  } catch {
    tracker.addResolverFailure();
    return UNKNOWN_COUNTRY;
  }
};

/**
 * Probes candidates with a fixed pool of `maxConcurrent` workers until every country
 * quota is filled, the source runs dry, or the scan cap is reached.
 */
export const runProbeScan = async (deps: ScanDeps): Promise<ScanRunResult> => {
  const { source, prober, resolver, clock = Date.now } = deps;
  const config = resolveScanConfig(deps.config);

  const quotaTargets: Record<CountryCode, number> = {};
  for (const country of config.targetCountries) quotaTargets[country] = config.countsPerCountry[country];

  const quota = createQuotaTracker(quotaTargets);
  const store = createResultStore(quotaTargets);
  const stop = createStopSignal<StopReason>(clock);
  const tracker = createScanRunSummaryTracker();
  // Fired only once every quota is met; exhaustion and the scan cap let in-flight work finish.
  const cancelInFlight = new AbortController();
  const inFlightSignal = config.cancelInFlightOnStop ? cancelInFlight.signal : undefined;

  const queue: Candidate[] = [];
  const seen = new Set<string>();
  const pool: { exhausted: boolean; pulled: number; refill?: Promise<void> } = { exhausted: false, pulled: 0 };

  const refill = async (): Promise<void> => {
    const remaining = config.maxCandidatesScanned > 0 ? config.maxCandidatesScanned - pool.pulled : config.batchSize;
    let batch: Candidate[];
    try {
      batch = await source.nextBatch(Math.max(1, Math.min(config.batchSize, remaining)));
    } catch (err) {
      if (pool.pulled === 0) {
        throw wrapSourceUnavailable(err, { scanned: 0, accepted: 0 });
      }
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "scan.source_error",
        reason: err instanceof Error ? err.message : String(err),
        scanned: tracker.scanned()
      }));
      batch = [];
    }

    if (batch.length === 0) {
      pool.exhausted = true;
      return;
    }
    for (const candidate of batch) {
      if (seen.has(candidate.address)) continue;
      seen.add(candidate.address);
      queue.push(candidate);
    }
  };

  const take = async (): Promise<Candidate | undefined> => {
    while (true) {
      if (stop.isStopped()) return undefined;
      if (config.maxCandidatesScanned > 0 && pool.pulled >= config.maxCandidatesScanned) {
        stop.stop("scan_cap_reached");
        return undefined;
      }

      const next = queue.shift();
      if (next !== undefined) {
        pool.pulled += 1;
        return next;
      }

      if (pool.exhausted) {
        stop.stop("pool_exhausted");
        return undefined;
      }

      // One refill at a time; other workers wait on the same promise.
      if (!pool.refill) {
        pool.refill = refill().finally(() => {
          pool.refill = undefined;
        });
      }
      await pool.refill;
    }
  };

  const checkSatisfied = () => {
    if (!quota.isAllSatisfied()) return;
    stop.stop("quota_satisfied");
    if (!cancelInFlight.signal.aborted) cancelInFlight.abort();
  };

  const work = async ({ address, port }: Candidate): Promise<void> => {
    tracker.addScanned();
    tracker.enterFlight();
    try {
      let measurement: ProbeMeasurement;
      try {
        measurement = await probeCandidate(prober, address, {
          ports: config.ports,
          timeoutMs: config.timeoutMs,
          policy: config.portPolicy,
          signal: inFlightSignal,
          preferredPort: port
        });
      } catch (err) {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "scan.probe_error",
          address,
          reason: err instanceof Error ? err.message : String(err)
        }));
        measurement = { ok: false, address, port: port ?? config.ports[0], reason: "error" };
      }

      if (!measurement.ok) {
        tracker.addFailed(measurement.reason);
        return;
      }
      if (measurement.latencyMs > config.maxLatencyMs) {
        tracker.addFailed("too_slow");
        return;
      }

      const country = await resolveCountry(resolver, address, tracker);
      if (!quota.isTracked(country)) {
        tracker.addDiscarded(country === UNKNOWN_COUNTRY ? "unknown_country" : "untargeted_country");
        return;
      }

      // record + insert run in one synchronous step
      if (!quota.record(country)) {
        tracker.addRejected();
        return;
      }
      store.insert(createProbeResult(measurement, country, new Date(clock())));
      tracker.addAccepted();
      if (quota.isCountrySatisfied(country)) {
        console.log(JSON.stringify({ event: "scan.country_satisfied", country, scanned: tracker.scanned() }));
      }
    } finally {
      tracker.leaveFlight();
      checkSatisfied();
    }
  };

  const startedAt = clock();
  console.log(JSON.stringify({
    event: "scan.started",
    countries: quotaTargets,
    maxConcurrent: config.maxConcurrent,
    ports: config.ports,
    timeoutMs: config.timeoutMs,
    maxCandidatesScanned: config.maxCandidatesScanned
  }));

  await runWorkerPool({ size: config.maxConcurrent, take, work });

  store.freeze();
  const satisfied = quota.isAllSatisfied();
  // Quotas filled by in-flight work after exhaustion or the cap still count as satisfied.
  const stopReason: StopReason = satisfied ? "quota_satisfied" : stop.reason() ?? "pool_exhausted";
  const result: ScanRunResult = {
    buckets: store.buckets(),
    stopReason,
    satisfied,
    quotas: quota.snapshot(),
    summary: tracker.summary()
  };

  console.log(JSON.stringify({
    event: "scan.completed",
    stopReason,
    satisfied: result.satisfied,
    durationMs: clock() - startedAt,
    stoppedAfterMs: (stop.stoppedAt() ?? clock()) - startedAt,
    ...result.summary
  }));

  return result;
};
