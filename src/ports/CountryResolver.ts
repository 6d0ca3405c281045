import type { CountryCode } from "../core/probe/probe.types";

export interface CountryResolver {
  /** Resolves to a country code or UNKNOWN_COUNTRY; may reject on lookup failure. */
  resolve(address: string): Promise<CountryCode>;
}
