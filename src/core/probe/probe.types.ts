export const UNKNOWN_COUNTRY = "UNKNOWN";

export type CountryCode = string;

/** An address to measure; `port` is set when the source line named one. */
export type Candidate = {
  address: string;
  port?: number;
};

export type ProbeFailureReason = "refused" | "timeout" | "unreachable" | "aborted" | "error";

export type ProbeMeasurement =
  | {
      ok: true;
      address: string;
      port: number;
      latencyMs: number;
    }
  | {
      ok: false;
      address: string;
      port: number;
      reason: ProbeFailureReason;
    };

export type ProbeResult = Readonly<{
  address: string;
  port: number;
  latencyMs: number;
  country: CountryCode;
  timestamp: Date;
}>;

export const normalizeCountryCode = (value: string): CountryCode => {
  const normalized = value.trim().toUpperCase();
  return normalized === "" ? UNKNOWN_COUNTRY : normalized;
};

export const createProbeResult = (
  measurement: Extract<ProbeMeasurement, { ok: true }>,
  country: CountryCode,
  timestamp: Date = new Date()
): ProbeResult =>
  Object.freeze({
    address: measurement.address,
    port: measurement.port,
    latencyMs: measurement.latencyMs,
    country,
    timestamp
  });
