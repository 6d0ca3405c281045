import type { CountryCode } from "../probe/probe.types";

export type QuotaState = {
  target: number;
  accepted: number;
};

export type QuotaTracker = {
  isTracked(country: CountryCode): boolean;
  /**
   * Claims one slot for `country`. Check and increment happen in one synchronous
   * step, so among concurrent callers exactly one wins the last slot.
   */
  record(country: CountryCode): boolean;
  isCountrySatisfied(country: CountryCode): boolean;
  isAllSatisfied(): boolean;
  snapshot(): Record<CountryCode, QuotaState>;
};

export const createQuotaTracker = (targets: Record<CountryCode, number>): QuotaTracker => {
  const states = new Map<CountryCode, QuotaState>();
  for (const [country, target] of Object.entries(targets)) {
    if (!Number.isInteger(target) || target < 1) {
      throw new Error(`quota for ${country} must be an integer >= 1, got ${String(target)}`);
    }
    states.set(country, { target, accepted: 0 });
  }

  let unsatisfied = states.size;

  return {
    isTracked: (country) => states.has(country),
    record: (country) => {
      const state = states.get(country);
      if (!state || state.accepted >= state.target) return false;
      state.accepted += 1;
      if (state.accepted === state.target) unsatisfied -= 1;
      return true;
    },
    isCountrySatisfied: (country) => {
      const state = states.get(country);
      return state != null && state.accepted === state.target;
    },
    isAllSatisfied: () => unsatisfied === 0,
    snapshot: () => {
      const out: Record<CountryCode, QuotaState> = {};
      for (const [country, state] of states) out[country] = { ...state };
      return out;
    }
  };
};
