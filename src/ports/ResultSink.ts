import type { Buckets } from "../core/results/ResultStore";

export type ResultWriteSummary = {
  countries: number;
  written: number;
};

export interface ResultSink {
  write(buckets: Buckets): Promise<ResultWriteSummary>;
  close?(): Promise<void>;
}
