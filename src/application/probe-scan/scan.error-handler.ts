import type { ProbeFailureReason } from "../../core/probe/probe.types";

export type ScanFailureCode = "candidate_source_unavailable";
export type CandidateFailureCode = ProbeFailureReason | "too_slow";
export type DiscardCode = "unknown_country" | "untargeted_country";

export type ScanErrorContext = {
  scanned: number;
  accepted: number;
};

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export class ScanFatalError extends Error {
  readonly code: ScanFailureCode;
  readonly context: ScanErrorContext;

  constructor(args: { code: ScanFailureCode; message: string; context: ScanErrorContext; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "ScanFatalError";
    this.code = args.code;
    this.context = args.context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const wrapSourceUnavailable = (reason: unknown, context: ScanErrorContext): ScanFatalError => {
  const cause = reason instanceof Error ? reason.cause ?? reason : reason;
  return new ScanFatalError({
    code: "candidate_source_unavailable",
    message: `Candidate source unavailable before any candidate was produced: ${toErrorMessage(reason)}`,
    context,
    cause
  });
};

export type ScanRunSummary = {
  scanned: number;
  accepted: number;
  rejected: number;
  failed: number;
  discarded: number;
  resolverFailures: number;
  maxInFlight: number;
  failedByReason: Partial<Record<CandidateFailureCode, number>>;
  discardedByCode: Partial<Record<DiscardCode, number>>;
};

export const createScanRunSummaryTracker = () => {
  let scanned = 0;
  let accepted = 0;
  let rejected = 0;
  let resolverFailures = 0;
  let inFlight = 0;
  let maxInFlight = 0;
  const failedByReason: Partial<Record<CandidateFailureCode, number>> = {};
  const discardedByCode: Partial<Record<DiscardCode, number>> = {};

  const sum = (counts: Partial<Record<string, number>>) =>
    Object.values(counts).reduce<number>((total, n) => total + (n ?? 0), 0);

  return {
    scanned: () => scanned,
    accepted: () => accepted,
    addScanned: () => {
      scanned += 1;
    },
    enterFlight: () => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
    },
    leaveFlight: () => {
      inFlight -= 1;
    },
    addAccepted: () => {
      accepted += 1;
    },
    addRejected: () => {
      rejected += 1;
    },
    addResolverFailure: () => {
      resolverFailures += 1;
    },
    addFailed: (code: CandidateFailureCode) => {
      failedByReason[code] = (failedByReason[code] ?? 0) + 1;
    },
    addDiscarded: (code: DiscardCode) => {
      discardedByCode[code] = (discardedByCode[code] ?? 0) + 1;
    },
    summary: (): ScanRunSummary => ({
      scanned,
      accepted,
      rejected,
      failed: sum(failedByReason),
      discarded: sum(discardedByCode),
      resolverFailures,
      maxInFlight,
      failedByReason: { ...failedByReason },
      discardedByCode: { ...discardedByCode }
    })
  };
};

export type ScanRunSummaryTracker = ReturnType<typeof createScanRunSummaryTracker>;
