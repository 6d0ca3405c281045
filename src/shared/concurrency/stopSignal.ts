/**
 * First-wins stop flag shared by every worker of a run.
 * `stop()` returns true only for the call that performed the transition;
 * later calls are no-ops and keep the original reason.
 */
export type StopSignal<R extends string> = {
  stop(reason: R): boolean;
  isStopped(): boolean;
  reason(): R | undefined;
  stoppedAt(): number | undefined;
};

export const createStopSignal = <R extends string>(clock: () => number = Date.now): StopSignal<R> => {
  let state: { reason: R; at: number } | undefined;

  return {
    stop: (reason) => {
      if (state) return false;
      state = { reason, at: clock() };
      return true;
    },
    isStopped: () => state !== undefined,
    reason: () => state?.reason,
    stoppedAt: () => state?.at
  };
};
