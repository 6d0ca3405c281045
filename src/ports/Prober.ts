import type { ProbeMeasurement } from "../core/probe/probe.types";

export interface Prober {
  probe(address: string, port: number, timeoutMs: number, signal?: AbortSignal): Promise<ProbeMeasurement>;
}
