import { normalizeCountryCode, UNKNOWN_COUNTRY, type CountryCode } from "../../core/probe/probe.types";
import type { CountryResolver } from "../../ports/CountryResolver";
import { fetchWithTimeout, logHttpAttempt, shouldRetryHttpError, toSafeUrl } from "../../shared/http/httpRequest";
import { retry } from "../../shared/retry/retry";

type IpApiPayload = {
  countryCode?: unknown;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Country lookup against an ip-api compatible endpoint:
 * GET {baseUrl}/json/{ip}?fields=countryCode -> { "countryCode": "US" }
 *
 * Lookups are cached per address for the lifetime of the resolver; failed lookups
 * are evicted so a later call can try again.
 */
export class IpApiCountryResolver implements CountryResolver {
  private readonly cache = new Map<string, Promise<CountryCode>>();

  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 3000,
    private readonly retries = 1
  ) {}

  resolve(address: string): Promise<CountryCode> {
    const cached = this.cache.get(address);
    if (cached) return cached;

    const lookup = this.lookup(address);
    this.cache.set(address, lookup);
    void lookup.catch(() => this.cache.delete(address));
    return lookup;
  }

  private async lookup(address: string): Promise<CountryCode> {
    const url = new URL(this.baseUrl);
    const basePath = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
    url.pathname = `${basePath}/json/${encodeURIComponent(address)}`;
    url.searchParams.set("fields", "countryCode");
    const safeRequestUrl = toSafeUrl(url.toString());

    const payload = await retry(
      async () => {
        const res = await fetchWithTimeout(url.toString(), this.timeoutMs, "Geo lookup");
        const body: unknown = await res.json();
        return body;
      },
      {
        retries: this.retries,
        minDelayMs: 100,
        maxDelayMs: 2000,
        onGiveUp: logHttpAttempt("http.give_up", safeRequestUrl),
        shouldRetry: shouldRetryHttpError
      }
    );

    if (!isRecord(payload)) {
      throw new Error("Geo lookup response is not an object");
    }
    const { countryCode }: IpApiPayload = payload;
    return typeof countryCode === "string" ? normalizeCountryCode(countryCode) : UNKNOWN_COUNTRY;
  }
}
