type ErrorContext = Partial<{
  scanned: number;
  accepted: number;
}>;

export type CliErrorEnvelope = {
  event: string;
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  failedSources?: string[];
  stack?: string;
};

const allowedContextKeys: Array<keyof ErrorContext> = ["scanned", "accepted"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of allowedContextKeys) {
    const raw = value[key];
    if (typeof raw === "number" && Number.isFinite(raw)) {
      sanitizedContext[key] = raw;
    }
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

const extractFailedSources = (value: unknown): string[] | undefined => {
  if (!Array.isArray(value)) return undefined;
  const names = value.filter((item): item is string => typeof item === "string");
  return names.length > 0 ? names : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

/**
 * Reduces any thrown value to a loggable envelope. Only whitelisted numeric context
 * keys are copied; `cause` is never included.
 */
export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean, event = "scan.failed"): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event,
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  const causeRecord = isRecord(errorRecord.cause) ? errorRecord.cause : {};
  const failedSources = extractFailedSources(errorRecord.failedSources ?? causeRecord.failedSources);
  if (failedSources) {
    envelope.failedSources = failedSources;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};
