import net from "net";
import { performance } from "perf_hooks";
import type { ProbeFailureReason, ProbeMeasurement } from "../../core/probe/probe.types";
import type { Prober } from "../../ports/Prober";

const classifySocketError = (err: NodeJS.ErrnoException): ProbeFailureReason => {
  switch (err.code) {
    case "ECONNREFUSED":
      return "refused";
    case "ETIMEDOUT":
      return "timeout";
    case "EHOSTUNREACH":
    case "ENETUNREACH":
    case "EHOSTDOWN":
    case "ENOTFOUND":
    case "EAI_AGAIN":
      return "unreachable";
    default:
      return "error";
  }
};

/**
 * TCP connect prober. Latency is measured from the connect call to the `connect`
 * event; nothing is written to the socket.
 */
export class TcpProber implements Prober {
  probe(address: string, port: number, timeoutMs: number, signal?: AbortSignal): Promise<ProbeMeasurement> {
    if (signal?.aborted) {
      return Promise.resolve({ ok: false, address, port, reason: "aborted" });
    }

    return new Promise<ProbeMeasurement>((resolve) => {
      const socket = new net.Socket();
      const startedAt = performance.now();
      let settled = false;

      const onAbort = () => finish({ ok: false, address, port, reason: "aborted" });
      const timer = setTimeout(() => finish({ ok: false, address, port, reason: "timeout" }), timeoutMs);

      function finish(outcome: ProbeMeasurement) {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        socket.destroy();
        resolve(outcome);
      }

      signal?.addEventListener("abort", onAbort, { once: true });

      socket.once("connect", () => {
        finish({ ok: true, address, port, latencyMs: Math.round(performance.now() - startedAt) });
      });
      socket.once("error", (err: NodeJS.ErrnoException) => {
        finish({ ok: false, address, port, reason: classifySocketError(err) });
      });

      socket.connect({ host: address, port });
    });
  }
}
