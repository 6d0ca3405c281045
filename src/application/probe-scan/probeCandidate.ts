import type { ProbeMeasurement } from "../../core/probe/probe.types";
import type { Prober } from "../../ports/Prober";
import type { PortPolicy } from "./scan.config";

/**
 * Measures one candidate across the configured ports.
 *
 * - `first-success`: ports are a fallback chain, the first reachable one wins.
 * - `all`: every port must connect; the result reports the first port and the
 *   slowest latency seen.
 *
 * A `preferredPort` (the port a source line named) is tried before the configured ones.
 */
export const probeCandidate = async (
  prober: Prober,
  address: string,
  opts: {
    ports: readonly number[];
    timeoutMs: number;
    policy: PortPolicy;
    signal?: AbortSignal;
    preferredPort?: number;
  }
): Promise<ProbeMeasurement> => {
  const { timeoutMs, policy, signal, preferredPort } = opts;
  const ports = preferredPort === undefined
    ? opts.ports
    : [preferredPort, ...opts.ports.filter((port) => port !== preferredPort)];
  let last: ProbeMeasurement | undefined;
  let slowestMs = 0;

  for (const port of ports) {
    if (signal?.aborted) {
      return { ok: false, address, port, reason: "aborted" };
    }

    const measurement = await prober.probe(address, port, timeoutMs, signal);
    if (policy === "first-success") {
      if (measurement.ok) return measurement;
      last = measurement;
      continue;
    }

    if (!measurement.ok) return measurement;
    slowestMs = Math.max(slowestMs, measurement.latencyMs);
  }

  if (policy === "all") {
    return { ok: true, address, port: ports[0], latencyMs: slowestMs };
  }

  return last ?? { ok: false, address, port: ports[0], reason: "error" };
};
