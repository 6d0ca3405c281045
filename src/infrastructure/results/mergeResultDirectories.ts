import { readdir } from "fs/promises";
import path from "path";
import type { ProbeResult } from "../../core/probe/probe.types";
import type { Buckets } from "../../core/results/ResultStore";
import { FileResultSink, readResultFile } from "./FileResultSink";

const BATCH_DIR = /_batch_(\d+)$/;
const COUNTRY_FILE = /^([A-Z]{2,})_ips\.txt$/;

export type MergeSummary = {
  batches: number;
  countries: number;
  written: number;
};

/**
 * Folds the `*_batch_<n>` result directories under `inputDir` into one set of country
 * files. Batches are read in numeric order; the first occurrence of an `ip:port` wins.
 */
export const mergeResultDirectories = async (inputDir: string, outputDir: string): Promise<MergeSummary> => {
  const entries = await readdir(inputDir, { withFileTypes: true });
  const batchDirs = entries
    .filter((entry) => entry.isDirectory() && BATCH_DIR.test(entry.name))
    .map((entry) => ({ name: entry.name, index: Number(BATCH_DIR.exec(entry.name)?.[1] ?? 0) }))
    .sort((a, b) => a.index - b.index);

  const merged: Buckets = {};
  const seen = new Set<string>();

  for (const batch of batchDirs) {
    const batchPath = path.join(inputDir, batch.name);
    const files = (await readdir(batchPath)).filter((file) => COUNTRY_FILE.test(file)).sort();
    for (const file of files) {
      const country = COUNTRY_FILE.exec(file)?.[1] ?? "";
      const bucket: ProbeResult[] = merged[country] ?? [];
      for (const result of await readResultFile(path.join(batchPath, file))) {
        const key = `${result.address}:${result.port}`;
        if (seen.has(key)) continue;
        seen.add(key);
        bucket.push(result);
      }
      merged[country] = bucket;
    }
  }

  const { countries, written } = await new FileResultSink(outputDir, [`Merged batches: ${batchDirs.length}`]).write(merged);
  console.log(JSON.stringify({ event: "merge.completed", batches: batchDirs.length, countries, written }));
  return { batches: batchDirs.length, countries, written };
};
