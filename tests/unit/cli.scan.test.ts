describe("scan CLI", () => {
  const envSnapshot = { ...process.env };

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
  });

  it("builds a controlled error envelope without stack by default", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/errorEnvelope");

    const error = Object.assign(new Error("no candidates"), {
      name: "ScanFatalError",
      code: "candidate_source_unavailable",
      context: {
        scanned: 0,
        accepted: 0,
        unsafe: "ignored"
      },
      cause: { failedSources: ["official", "cm"], raw: "secret payload" }
    });

    const envelope = buildCliErrorEnvelope(error, false);

    expect(envelope).toEqual({
      event: "scan.failed",
      name: "ScanFatalError",
      message: "no candidates",
      code: "candidate_source_unavailable",
      context: { scanned: 0, accepted: 0 },
      failedSources: ["official", "cm"]
    });
    expect(envelope).not.toHaveProperty("stack");
    expect(JSON.stringify(envelope)).not.toContain("secret payload");
  });

  it("wraps non-Error values", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/errorEnvelope");

    expect(buildCliErrorEnvelope("plain failure", false, "merge.failed")).toEqual({
      event: "merge.failed",
      name: "Error",
      message: "plain failure"
    });
  });

  it("includes stack only when debug mode is enabled", async () => {
    const { buildCliErrorEnvelope, isDebugMode } = await import("../../src/cli/errorEnvelope");

    const envelope = buildCliErrorEnvelope(new Error("boom"), true);
    expect(envelope.stack).toContain("Error: boom");
    expect(isDebugMode({ DEBUG: "true" })).toBe(true);
    expect(isDebugMode({ DEBUG: "0" })).toBe(false);
  });

  it("logs a sanitized envelope and exits with code 1 on failure", async () => {
    process.env = { ...envSnapshot, DEBUG: "0" };

    const runScan = jest.fn().mockRejectedValue(Object.assign(new Error("bad scan"), {
      name: "ScanFatalError",
      code: "candidate_source_unavailable",
      context: { scanned: 0, accepted: 0 },
      cause: { huge: "do-not-print-this" }
    }));

    jest.doMock("../../src/composition/root", () => ({ runScan }));

    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executeScanCli } = await import("../../src/cli/scan");
    await expect(executeScanCli()).rejects.toThrow("EXIT:1");

    expect(runScan).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);

    const logged = String(errorSpy.mock.calls[0]?.[0] ?? "");
    expect(logged).toContain("\"event\":\"scan.failed\"");
    expect(logged).toContain("\"code\":\"candidate_source_unavailable\"");
    expect(logged).not.toContain("do-not-print-this");
    expect(logged).not.toContain("\"cause\"");
    expect(logged).not.toContain("\"stack\"");

    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("reports merge failures under their own event", async () => {
    process.env = { ...envSnapshot, DEBUG: "0" };
    const runMerge = jest.fn().mockRejectedValue(new Error("ENOENT: no such file or directory"));
    jest.doMock("../../src/composition/root", () => ({ runMerge }));

    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executeMergeCli } = await import("../../src/cli/merge");
    await expect(executeMergeCli()).rejects.toThrow("EXIT:1");

    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toEqual({
      event: "merge.failed",
      name: "Error",
      message: "ENOENT: no such file or directory"
    });
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});
