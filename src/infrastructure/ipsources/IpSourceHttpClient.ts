import type { IpSourceClient } from "../../ports/IpSourceClient";
import { fetchWithTimeout, logHttpAttempt, shouldRetryHttpError, toSafeUrl } from "../../shared/http/httpRequest";
import { retry } from "../../shared/retry/retry";

/**
 * Downloads plain-text IP lists (one IP or CIDR per line).
 */
export class IpSourceHttpClient implements IpSourceClient {
  constructor(
    private readonly timeoutMs = 10000,
    private readonly retries = 3
  ) {}

  async fetchList(url: string): Promise<string> {
    const safeRequestUrl = toSafeUrl(url);

    return retry(
      async () => {
        const res = await fetchWithTimeout(url, this.timeoutMs, "IP source", {
          headers: { "User-Agent": "relay-scout/0.1", Accept: "text/plain" }
        });
        return res.text();
      },
      {
        retries: this.retries,
        minDelayMs: 250,
        maxDelayMs: 5000,
        onRetry: logHttpAttempt("http.retry", safeRequestUrl),
        onGiveUp: logHttpAttempt("http.give_up", safeRequestUrl),
        shouldRetry: shouldRetryHttpError
      }
    );
  }
}
