import {
  defaultScanConfig,
  type PortPolicy,
  resolveScanConfig,
  type ScanConfig
} from "../../application/probe-scan/scan.config";
import { defaultIpSourceNames } from "../../infrastructure/ipsources/ipSource.catalog";

export const runtimeCaps = {
  concurrency: { min: 1, max: 1000 },
  port: { min: 1, max: 65535 },
  timeoutMs: { min: 100, max: 30000 },
  maxLatencyMs: { min: 1, max: 60000 },
  count: { min: 1, max: 10000 },
  sourceTimeoutMs: { min: 1000, max: 30000 }
} as const;

export type ResolverKind = "ip-api" | "trace";
export type SinkKind = "file" | "mongo";

export type RuntimeConfig = {
  scanConfig: ScanConfig;
  sources: string[];
  resolver: ResolverKind;
  sink: SinkKind;
  sourceTimeoutMs: number;
};

const readOptional = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;
  return raw.trim();
};

const parseIntInRange = (name: string, raw: string, range: { min: number; max: number }): number => {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }
  return value;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = readOptional(env, name);
  return raw == null ? undefined : parseIntInRange(name, raw, range);
};

const parseOptionalNonNegativeInteger = (env: NodeJS.ProcessEnv, name: string): number | undefined =>
  parseOptionalIntInRange(env, name, { min: 0, max: Number.MAX_SAFE_INTEGER });

const parseList = (raw: string): string[] =>
  raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");

const parseOptionalChoice = <T extends string>(
  env: NodeJS.ProcessEnv,
  name: string,
  choices: readonly T[]
): T | undefined => {
  const raw = readOptional(env, name);
  if (raw == null) return undefined;
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new Error(`${name}=${raw} must be one of: ${choices.join(", ")}`);
  }
  return match;
};

/**
 * SCAN_COUNTRIES and SCAN_COUNTS are parallel comma lists ("US,HK" / "20,5").
 */
const parseQuotas = (env: NodeJS.ProcessEnv): Pick<ScanConfig, "targetCountries" | "countsPerCountry"> => {
  const countriesRaw = readOptional(env, "SCAN_COUNTRIES");
  const countsRaw = readOptional(env, "SCAN_COUNTS");
  if (countriesRaw == null && countsRaw == null) {
    return {
      targetCountries: defaultScanConfig.targetCountries,
      countsPerCountry: defaultScanConfig.countsPerCountry
    };
  }

  const countries = parseList(countriesRaw ?? defaultScanConfig.targetCountries.join(",")).map((c) => c.toUpperCase());
  const duplicate = countries.find((country, index) => countries.indexOf(country) !== index);
  if (duplicate !== undefined) {
    throw new Error(`SCAN_COUNTRIES=${countriesRaw ?? ""} lists ${duplicate} more than once`);
  }
  const counts = countsRaw == null
    ? countries.map((country) => defaultScanConfig.countsPerCountry[country] ?? 3)
    : parseList(countsRaw).map((raw) => parseIntInRange("SCAN_COUNTS", raw, runtimeCaps.count));

  if (countries.length !== counts.length) {
    throw new Error(
      `SCAN_COUNTRIES and SCAN_COUNTS must have the same length (got ${countries.length} and ${counts.length})`
    );
  }

  const countsPerCountry: Record<string, number> = {};
  countries.forEach((country, index) => {
    countsPerCountry[country] = counts[index];
  });
  return { targetCountries: countries, countsPerCountry };
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const portsRaw = readOptional(env, "SCAN_PORTS");
  const maxConcurrent = parseOptionalIntInRange(env, "SCAN_CONCURRENCY", runtimeCaps.concurrency)
    ?? defaultScanConfig.maxConcurrent;

  const scanConfig = resolveScanConfig({
    ...parseQuotas(env),
    maxConcurrent,
    ports: portsRaw == null
      ? defaultScanConfig.ports
      : parseList(portsRaw).map((raw) => parseIntInRange("SCAN_PORTS", raw, runtimeCaps.port)),
    timeoutMs: parseOptionalIntInRange(env, "SCAN_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? defaultScanConfig.timeoutMs,
    maxLatencyMs: parseOptionalIntInRange(env, "SCAN_MAX_LATENCY_MS", runtimeCaps.maxLatencyMs) ?? 2000,
    maxCandidatesScanned: parseOptionalNonNegativeInteger(env, "SCAN_MAX_CANDIDATES")
      ?? defaultScanConfig.maxCandidatesScanned,
    portPolicy: parseOptionalChoice<PortPolicy>(env, "SCAN_PORT_POLICY", ["first-success", "all"])
      ?? defaultScanConfig.portPolicy,
    batchSize: maxConcurrent
  });

  const sourcesRaw = readOptional(env, "SCAN_SOURCES");

  return {
    scanConfig,
    sources: sourcesRaw == null ? defaultIpSourceNames.slice() : parseList(sourcesRaw),
    resolver: parseOptionalChoice<ResolverKind>(env, "SCAN_RESOLVER", ["ip-api", "trace"]) ?? "ip-api",
    sink: parseOptionalChoice<SinkKind>(env, "RESULT_SINK", ["file", "mongo"]) ?? "file",
    sourceTimeoutMs: parseOptionalIntInRange(env, "SOURCE_TIMEOUT_MS", runtimeCaps.sourceTimeoutMs) ?? 10000
  };
};
