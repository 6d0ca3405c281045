import { mkdir, readFile, writeFile } from "fs/promises";
import net from "net";
import path from "path";
import type { ProbeResult } from "../../core/probe/probe.types";
import type { Buckets } from "../../core/results/ResultStore";
import type { ResultSink, ResultWriteSummary } from "../../ports/ResultSink";

// `a.b.c.d:port#CC 12ms`, or `[v6]:port#CC 12ms` for IPv6
const RESULT_LINE = /^(?:(\d{1,3}(?:\.\d{1,3}){3})|\[([0-9a-fA-F:.]+)\]):(\d+)#([A-Z]{2,})\s+(\d+(?:\.\d+)?)ms$/;

export const formatResultLine = (result: ProbeResult): string => {
  const host = net.isIPv6(result.address) ? `[${result.address}]` : result.address;
  return `${host}:${result.port}#${result.country} ${Math.round(result.latencyMs)}ms`;
};

/** Inverse of `formatResultLine`; returns undefined for headers and malformed lines. */
export const parseResultLine = (line: string, timestamp: Date = new Date(0)): ProbeResult | undefined => {
  const match = RESULT_LINE.exec(line.trim());
  if (!match) return undefined;
  const [, v4, v6, port, country, latency] = match;
  const address = v4 ?? v6;
  const valid = v4 !== undefined ? net.isIPv4(v4) : v6 !== undefined && net.isIPv6(v6);
  if (address === undefined || !valid) return undefined;
  return Object.freeze({ address, port: Number(port), country, latencyMs: Number(latency), timestamp });
};

export const readResultFile = async (filePath: string): Promise<ProbeResult[]> => {
  const text = await readFile(filePath, "utf8");
  return text.split(/\r?\n/).flatMap((line) => {
    const parsed = parseResultLine(line);
    return parsed ? [parsed] : [];
  });
};

export const formatSummary = (buckets: Buckets, header: string[] = []): string => {
  const lines = ["# IP scan summary", ...header.map((h) => `# ${h}`), ""];
  let total = 0;
  for (const [country, results] of Object.entries(buckets)) {
    if (results.length === 0) continue;
    total += results.length;
    const average = results.reduce((sum, r) => sum + r.latencyMs, 0) / results.length;
    lines.push(`${country}: ${results.length} IPs, average latency ${average.toFixed(1)}ms`);
  }
  lines.push("", `Total: ${total} IPs`);
  return `${lines.join("\n")}\n`;
};

/**
 * Writes one `{CC}_ips.txt` per non-empty bucket plus `summary.txt`.
 */
export class FileResultSink implements ResultSink {
  constructor(
    private readonly outputDir: string,
    private readonly summaryHeader: string[] = []
  ) {}

  async write(buckets: Buckets): Promise<ResultWriteSummary> {
    await mkdir(this.outputDir, { recursive: true });

    let countries = 0;
    let written = 0;
    for (const [country, results] of Object.entries(buckets)) {
      if (results.length === 0) continue;
      const sorted = results.slice().sort((a, b) => a.latencyMs - b.latencyMs);
      await writeFile(
        path.join(this.outputDir, `${country}_ips.txt`),
        `${sorted.map(formatResultLine).join("\n")}\n`,
        "utf8"
      );
      countries += 1;
      written += sorted.length;
    }

    await writeFile(path.join(this.outputDir, "summary.txt"), formatSummary(buckets, this.summaryHeader), "utf8");
    console.log(JSON.stringify({ event: "results.written", sink: "file", outputDir: this.outputDir, countries, written }));
    return { countries, written };
  }
}
