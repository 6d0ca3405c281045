import { UNKNOWN_COUNTRY, type CountryCode } from "../../core/probe/probe.types";
import type { CountryResolver } from "../../ports/CountryResolver";
import { fetchWithTimeout } from "../../shared/http/httpRequest";
import coloCountries from "./colo-countries.json";

const coloTable: Record<string, string> = coloCountries;

export const parseTraceResponse = (text: string): Record<string, string> => {
  const fields: Record<string, string> = {};
  for (const line of text.split("\n")) {
    const trimmed = line.trim();
    const separator = trimmed.indexOf("=");
    if (separator <= 0) continue;
    fields[trimmed.slice(0, separator)] = trimmed.slice(separator + 1);
  }
  return fields;
};

export const countryFromColo = (colo: string | undefined): CountryCode => {
  if (!colo) return UNKNOWN_COUNTRY;
  return coloTable[colo.slice(0, 3).toUpperCase()] ?? UNKNOWN_COUNTRY;
};

/**
 * Resolves an edge address to the country of the data center answering it, read from
 * the `colo=` field of its `/cdn-cgi/trace` page.
 */
export class TraceCountryResolver implements CountryResolver {
  constructor(
    private readonly timeoutMs = 3000,
    private readonly port = 80
  ) {}

  async resolve(address: string): Promise<CountryCode> {
    const host = address.includes(":") ? `[${address}]` : address;
    const res = await fetchWithTimeout(`http://${host}:${this.port}/cdn-cgi/trace`, this.timeoutMs, "Trace");
    const fields = parseTraceResponse(await res.text());
    return countryFromColo(fields.colo);
  }
}
