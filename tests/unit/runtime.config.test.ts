import { loadRuntimeConfigFromEnv } from "../../src/shared/config/runtime.config";

describe("runtime config", () => {
  it("uses the defaults for an empty environment", () => {
    expect(loadRuntimeConfigFromEnv({})).toEqual({
      scanConfig: {
        targetCountries: ["US", "HK", "JP", "SG"],
        countsPerCountry: { US: 20, HK: 20, JP: 5, SG: 5 },
        maxConcurrent: 30,
        ports: [8443],
        timeoutMs: 5000,
        maxCandidatesScanned: 0,
        maxLatencyMs: 2000,
        portPolicy: "first-success",
        batchSize: 30,
        cancelInFlightOnStop: false
      },
      sources: ["official", "as13335", "as209242", "cm"],
      resolver: "ip-api",
      sink: "file",
      sourceTimeoutMs: 10000
    });
  });

  it("reads boundary values and lists", () => {
    const runtime = loadRuntimeConfigFromEnv({
      SCAN_COUNTRIES: " us, de ",
      SCAN_COUNTS: "10000,1",
      SCAN_CONCURRENCY: "1000",
      SCAN_PORTS: "443, 2053",
      SCAN_TIMEOUT_MS: "100",
      SCAN_MAX_LATENCY_MS: "60000",
      SCAN_MAX_CANDIDATES: "500",
      SCAN_PORT_POLICY: "all",
      SCAN_SOURCES: "as24429,cfip",
      SCAN_RESOLVER: "trace",
      RESULT_SINK: "mongo",
      SOURCE_TIMEOUT_MS: "30000"
    });

    expect(runtime.scanConfig).toMatchObject({
      targetCountries: ["US", "DE"],
      countsPerCountry: { US: 10000, DE: 1 },
      maxConcurrent: 1000,
      ports: [443, 2053],
      timeoutMs: 100,
      maxLatencyMs: 60000,
      maxCandidatesScanned: 500,
      portPolicy: "all",
      batchSize: 1000
    });
    expect(runtime.sources).toEqual(["as24429", "cfip"]);
    expect(runtime.resolver).toBe("trace");
    expect(runtime.sink).toBe("mongo");
    expect(runtime.sourceTimeoutMs).toBe(30000);
  });

  it("falls back to known per-country counts when only countries are given", () => {
    const runtime = loadRuntimeConfigFromEnv({ SCAN_COUNTRIES: "JP,FR" });
    expect(runtime.scanConfig.countsPerCountry).toEqual({ JP: 5, FR: 3 });
  });

  it.each([
    { env: { SCAN_CONCURRENCY: "1001" }, message: "SCAN_CONCURRENCY=1001 is out of allowed range [1..1000]" },
    { env: { SCAN_PORTS: "443,0" }, message: "SCAN_PORTS=0 is out of allowed range [1..65535]" },
    { env: { SCAN_TIMEOUT_MS: "99" }, message: "SCAN_TIMEOUT_MS=99 is out of allowed range [100..30000]" },
    { env: { SCAN_COUNTS: "20,x,5,5" }, message: "SCAN_COUNTS=x is out of allowed range [1..10000]" },
    { env: { SOURCE_TIMEOUT_MS: "999" }, message: "SOURCE_TIMEOUT_MS=999 is out of allowed range [1000..30000]" },
    {
      env: { SCAN_MAX_CANDIDATES: "-1" },
      message: `SCAN_MAX_CANDIDATES=-1 is out of allowed range [0..${Number.MAX_SAFE_INTEGER}]`
    },
    { env: { SCAN_PORT_POLICY: "any" }, message: "SCAN_PORT_POLICY=any must be one of: first-success, all" },
    { env: { RESULT_SINK: "s3" }, message: "RESULT_SINK=s3 must be one of: file, mongo" },
    { env: { SCAN_COUNTRIES: "US,us", SCAN_COUNTS: "5,3" }, message: "SCAN_COUNTRIES=US,us lists US more than once" },
    { env: { SCAN_COUNTRIES: "UNKNOWN" }, message: "UNKNOWN cannot be a target country" },
    {
      env: { SCAN_COUNTRIES: "US,HK", SCAN_COUNTS: "1" },
      message: "SCAN_COUNTRIES and SCAN_COUNTS must have the same length (got 2 and 1)"
    }
  ])("rejects invalid config: $message", ({ env, message }) => {
    expect(() => loadRuntimeConfigFromEnv(env)).toThrow(message);
  });
});
