import { normalizeCountryCode, UNKNOWN_COUNTRY } from "../../core/probe/probe.types";

export type PortPolicy = "first-success" | "all";

export type ScanConfig = {
  targetCountries: string[];
  countsPerCountry: Record<string, number>;
  maxConcurrent: number;
  ports: number[];
  timeoutMs: number;
  maxCandidatesScanned: number; // 0 = unbounded
  maxLatencyMs: number;
  portPolicy: PortPolicy;
  batchSize: number;
  cancelInFlightOnStop: boolean;
};

export type ScanConfigInput = Partial<ScanConfig>;

export const defaultScanConfig: ScanConfig = {
  targetCountries: ["US", "HK", "JP", "SG"],
  countsPerCountry: { US: 20, HK: 20, JP: 5, SG: 5 },
  maxConcurrent: 30,
  ports: [8443],
  timeoutMs: 5000,
  maxCandidatesScanned: 0,
  maxLatencyMs: 5000,
  portPolicy: "first-success",
  batchSize: 30,
  cancelInFlightOnStop: false
};

export const scanCaps = {
  maxConcurrent: { min: 1, max: 1000 },
  port: { min: 1, max: 65535 },
  timeoutMs: { min: 1, max: 60000 },
  maxLatencyMs: { min: 1, max: 60000 },
  maxCandidatesScanned: { min: 0, max: Number.MAX_SAFE_INTEGER },
  batchSize: { min: 1, max: 100000 }
} as const;

export class InvalidScanConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidScanConfigError";
  }
}

const assertIntegerInRange = (name: string, value: number, range: { min: number; max: number }) => {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new InvalidScanConfigError(`${name}=${String(value)} is out of allowed range [${range.min}..${range.max}]`);
  }
};

export const validateScanConfig = (config: ScanConfig): ScanConfig => {
  if (config.targetCountries.length === 0) {
    throw new InvalidScanConfigError("targetCountries must name at least one country");
  }
  for (const country of [...config.targetCountries, ...Object.keys(config.countsPerCountry)]) {
    if (country === UNKNOWN_COUNTRY) {
      throw new InvalidScanConfigError(`${UNKNOWN_COUNTRY} cannot be a target country`);
    }
  }
  for (const country of config.targetCountries) {
    const count = config.countsPerCountry[country];
    if (count == null) {
      throw new InvalidScanConfigError(`countsPerCountry is missing a quota for ${country}`);
    }
    if (!Number.isInteger(count) || count < 1) {
      throw new InvalidScanConfigError(`quota for ${country} must be an integer >= 1, got ${String(count)}`);
    }
  }

  assertIntegerInRange("maxConcurrent", config.maxConcurrent, scanCaps.maxConcurrent);
  if (config.ports.length === 0) {
    throw new InvalidScanConfigError("ports must contain at least one port");
  }
  for (const port of config.ports) assertIntegerInRange("port", port, scanCaps.port);
  assertIntegerInRange("timeoutMs", config.timeoutMs, scanCaps.timeoutMs);
  assertIntegerInRange("maxLatencyMs", config.maxLatencyMs, scanCaps.maxLatencyMs);
  assertIntegerInRange("maxCandidatesScanned", config.maxCandidatesScanned, scanCaps.maxCandidatesScanned);
  assertIntegerInRange("batchSize", config.batchSize, scanCaps.batchSize);
  if (config.portPolicy !== "first-success" && config.portPolicy !== "all") {
    throw new InvalidScanConfigError(`portPolicy=${String(config.portPolicy)} must be "first-success" or "all"`);
  }
  return config;
};

const normalizeCounts = (counts: Record<string, number>): Record<string, number> => {
  const out: Record<string, number> = {};
  for (const [country, count] of Object.entries(counts)) out[normalizeCountryCode(country)] = count;
  return out;
};

/**
 * Merges `input` over the defaults. Supplying countries without counts (or counts
 * without countries) derives the missing side, so callers can pass either.
 */
export const resolveScanConfig = (input: ScanConfigInput = {}): ScanConfig => {
  const countsPerCountry = normalizeCounts(input.countsPerCountry ?? defaultScanConfig.countsPerCountry);
  const targetCountries = Array.from(
    new Set(
      (input.targetCountries ?? (input.countsPerCountry ? Object.keys(countsPerCountry) : defaultScanConfig.targetCountries))
        .map(normalizeCountryCode)
    )
  );
  const maxConcurrent = input.maxConcurrent ?? defaultScanConfig.maxConcurrent;
  const timeoutMs = input.timeoutMs ?? defaultScanConfig.timeoutMs;

  return validateScanConfig({
    ...defaultScanConfig,
    ...input,
    targetCountries,
    countsPerCountry,
    maxConcurrent,
    timeoutMs,
    maxLatencyMs: input.maxLatencyMs ?? timeoutMs,
    batchSize: input.batchSize ?? maxConcurrent,
    ports: input.ports ?? defaultScanConfig.ports
  });
};
