describe("ingest CLI", () => {
  const envSnapshot = { ...process.env };

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
  });

  // loaded per test: resetModules gives the CLI a fresh copy of the error class
  const loadIngestFatalError = async () =>
    (await import("../../src/application/ingest-comments/ingest.error-handler")).IngestFatalError;

  const mockExit = () =>
    jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

  it("builds a controlled error envelope without stack by default", async () => {
    const IngestFatalError = await loadIngestFatalError();
    const { buildCliErrorEnvelope } = await import("../../src/cli/ingest");

    const context = { batch: 12, after: 1606780800, before: 1617148800, size: Number.NaN, unsafe: "ignored" };
    const error = new IngestFatalError({
      code: "repository_write_failed",
      message: "Repository write failed at batch=12: disk full",
      context,
      cause: { raw: "secret payload" }
    });

    const envelope = buildCliErrorEnvelope(error, false);

    expect(envelope).toEqual({
      event: "ingest.failed",
      name: "IngestFatalError",
      message: "Repository write failed at batch=12: disk full",
      code: "repository_write_failed",
      context: { batch: 12, after: 1606780800, before: 1617148800 }
    });
    expect(JSON.stringify(envelope)).not.toContain("secret payload");
  });

  it("carries no code or context for errors raised outside the ingest loop", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/ingest");

    const lookalike = Object.assign(new Error("INGEST_PAGE_SIZE=500 is out of allowed range [1..100]"), {
      code: "ECONFIG",
      context: { batch: 1 }
    });

    expect(buildCliErrorEnvelope(lookalike, false)).toEqual({
      event: "ingest.failed",
      name: "Error",
      message: "INGEST_PAGE_SIZE=500 is out of allowed range [1..100]"
    });
    expect(buildCliErrorEnvelope("plain failure", false)).toEqual({
      event: "ingest.failed",
      name: "Error",
      message: "plain failure"
    });
  });

  it("includes stack only when debug mode is enabled", async () => {
    const { buildCliErrorEnvelope, isDebugMode } = await import("../../src/cli/ingest");

    expect(buildCliErrorEnvelope(new Error("boom"), true).stack).toContain("Error: boom");
    expect(isDebugMode({ DEBUG: "TRUE" })).toBe(true);
    expect(isDebugMode({ DEBUG: "1" })).toBe(true);
    expect(isDebugMode({ DEBUG: "0" })).toBe(false);
    expect(isDebugMode({})).toBe(false);
  });

  it.each([
    ["end_boundary_reached", 0],
    ["source_exhausted", 0],
    ["source_unavailable", 2]
  ] as const)("maps outcome %s to exit code %d", async (outcome, code) => {
    const { exitCodeFor } = await import("../../src/cli/ingest");
    expect(exitCodeFor({ outcome })).toBe(code);
  });

  it("logs a sanitized envelope and exits with code 1 on failure", async () => {
    process.env = { ...envSnapshot, DEBUG: "0" };

    const IngestFatalError = await loadIngestFatalError();
    const runIngest = jest.fn().mockRejectedValue(
      new IngestFatalError({
        code: "decode_unexpected",
        message: "Unexpected decode failure at batch=3, after=1606780800: boom",
        context: { batch: 3, after: 1606780800, before: 1606867200, size: 2 },
        cause: { huge: "do-not-print-this" }
      })
    );
    jest.doMock("../../src/composition/root", () => ({ runIngest }));

    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = mockExit();

    const { executeIngestCli } = await import("../../src/cli/ingest");
    await expect(executeIngestCli()).rejects.toThrow("EXIT:1");

    expect(runIngest).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toEqual({
      event: "ingest.failed",
      name: "IngestFatalError",
      message: "Unexpected decode failure at batch=3, after=1606780800: boom",
      code: "decode_unexpected",
      context: { batch: 3, after: 1606780800, before: 1606867200, size: 2 }
    });
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("exits with code 2 when the archive stayed unavailable", async () => {
    const runIngest = jest.fn().mockResolvedValue({
      outcome: "source_unavailable",
      cursorDate: "2021-01-15",
      gaps: 3
    });
    jest.doMock("../../src/composition/root", () => ({ runIngest }));

    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = mockExit();

    const { executeIngestCli } = await import("../../src/cli/ingest");
    await expect(executeIngestCli()).rejects.toThrow("EXIT:2");

    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toEqual({
      event: "ingest.incomplete",
      outcome: "source_unavailable",
      cursorDate: "2021-01-15",
      gaps: 3
    });
    expect(exitSpy).toHaveBeenCalledWith(2);
  });

  it("does not exit when the run finishes", async () => {
    const runIngest = jest.fn().mockResolvedValue({ outcome: "end_boundary_reached", cursorDate: "2021-03-31", gaps: 0 });
    jest.doMock("../../src/composition/root", () => ({ runIngest }));
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = mockExit();

    const { executeIngestCli } = await import("../../src/cli/ingest");
    await executeIngestCli();

    expect(runIngest).toHaveBeenCalledTimes(1);
    expect(errorSpy).not.toHaveBeenCalled();
    expect(exitSpy).not.toHaveBeenCalled();
  });
});
