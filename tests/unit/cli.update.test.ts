import { CommanderError } from "commander";

describe("update CLI", () => {
  const envSnapshot = { ...process.env };

  const mockExit = () =>
    jest.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`EXIT:${String(code)}`);
    });

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
  });

  it("builds a controlled error envelope without stack by default", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/update");

    const error = Object.assign(new Error("cannot open feed list"), {
      code: "ENOENT",
      status: 2,
      cause: { raw: "secret payload" }
    });

    const envelope = buildCliErrorEnvelope(error, false);

    expect(envelope).toEqual({
      event: "update.failed",
      name: "Error",
      message: "cannot open feed list",
      code: "ENOENT",
      status: 2
    });
    expect(JSON.stringify(envelope)).not.toContain("secret payload");
  });

  it("includes stack only when debug mode is enabled", async () => {
    const { buildCliErrorEnvelope, isDebugMode } = await import("../../src/cli/update");

    expect(buildCliErrorEnvelope(new Error("boom"), true).stack).toContain("Error: boom");
    expect(buildCliErrorEnvelope("boom", false)).toEqual({ event: "update.failed", name: "Error", message: "boom" });
    expect(isDebugMode({ DEBUG: "TRUE" })).toBe(true);
    expect(isDebugMode({ DEBUG: "0" })).toBe(false);
  });

  it("maps flags onto the config fields and leaves absent ones undefined", async () => {
    const { parseCliFlags } = await import("../../src/cli/update");

    expect(parseCliFlags([
      "--otp-base-dir", "/srv/otp",
      "--otp-command", "/opt/otp/otp.sh",
      "--force-rebuild",
      "--only-graph", "berlin",
      "--concurrency", "4",
      "--retries", "0"
    ])).toEqual({
      baseDir: "/srv/otp",
      otpCommand: "/opt/otp/otp.sh",
      forceRebuild: true,
      onlyGraph: "berlin",
      concurrency: 4,
      fetchRetries: 0
    });
    expect(parseCliFlags([])).toEqual({});
  });

  it("rejects non-integer numbers and unknown options", async () => {
    const { parseCliFlags } = await import("../../src/cli/update");

    expect(() => parseCliFlags(["--timeout-ms", "soon"])).toThrow(CommanderError);
    expect(() => parseCliFlags(["--timeout-ms", "soon"])).toThrow(
      expect.objectContaining({ code: "commander.invalidArgument" })
    );
    expect(() => parseCliFlags(["--frobnicate"])).toThrow(expect.objectContaining({ code: "commander.unknownOption" }));
  });

  it.each([
    [false, "EXIT:0"],
    [true, "EXIT:1"]
  ])("exits according to the run outcome (hadError=%p)", async (hadError, expected) => {
    const runUpdate = jest.fn().mockResolvedValue({ hadError });
    jest.doMock("../../src/composition/root", () => ({ runUpdate }));
    mockExit();

    const { executeUpdateCli } = await import("../../src/cli/update");
    await expect(executeUpdateCli(["--otp-command", "/opt/otp/otp.sh"])).rejects.toThrow(expected);

    expect(runUpdate).toHaveBeenCalledWith(expect.objectContaining({ otpCommand: "/opt/otp/otp.sh" }));
  });

  it("logs a sanitized envelope and exits with code 1 on failure", async () => {
    process.env = { ...envSnapshot, DEBUG: "0" };

    const runUpdate = jest.fn().mockRejectedValue(Object.assign(new Error("otpCommand is required (--otp-command or OTP_COMMAND)"), {
      cause: { huge: "do-not-print-this" }
    }));
    jest.doMock("../../src/composition/root", () => ({ runUpdate }));

    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = mockExit();

    const { executeUpdateCli } = await import("../../src/cli/update");
    await expect(executeUpdateCli([])).rejects.toThrow("EXIT:1");

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0] ?? ""))).toEqual({
      event: "update.failed",
      name: "Error",
      message: "otpCommand is required (--otp-command or OTP_COMMAND)"
    });
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("reports a bad flag through the envelope without running the update", async () => {
    const runUpdate = jest.fn();
    jest.doMock("../../src/composition/root", () => ({ runUpdate }));
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    mockExit();

    const { executeUpdateCli } = await import("../../src/cli/update");
    await expect(executeUpdateCli(["--concurrency", "lots"])).rejects.toThrow("EXIT:1");

    expect(runUpdate).not.toHaveBeenCalled();
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0] ?? ""))).toMatchObject({
      event: "update.failed",
      name: "CommanderError",
      code: "commander.invalidArgument"
    });
  });

  it("exits 0 after printing help", async () => {
    const runUpdate = jest.fn();
    jest.doMock("../../src/composition/root", () => ({ runUpdate }));
    const writeSpy = jest.spyOn(process.stdout, "write").mockImplementation(() => true);
    mockExit();

    const { executeUpdateCli } = await import("../../src/cli/update");
    await expect(executeUpdateCli(["--help"])).rejects.toThrow("EXIT:0");

    expect(runUpdate).not.toHaveBeenCalled();
    expect(String(writeSpy.mock.calls[0]?.[0] ?? "")).toContain("--otp-command <path>");
  });

  it.each([
    ["SIGINT", 130],
    ["SIGTERM", 143]
  ] as const)("logs update.cancelled and exits on %s", async (signal, exitCode) => {
    const { installInterruptHandlers } = await import("../../src/cli/update");
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = mockExit();
    const before = { SIGINT: process.listeners("SIGINT"), SIGTERM: process.listeners("SIGTERM") };

    installInterruptHandlers();

    try {
      const added = process.listeners(signal).filter((listener) => !before[signal].includes(listener));
      expect(added).toHaveLength(1);
      expect(() => added[0](signal)).toThrow(`EXIT:${exitCode}`);
      expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0] ?? ""))).toEqual({ event: "update.cancelled", signal });
      expect(exitSpy).toHaveBeenCalledWith(exitCode);
    } finally {
      for (const name of ["SIGINT", "SIGTERM"] as const) {
        for (const listener of process.listeners(name)) {
          if (!before[name].includes(listener)) process.removeListener(name, listener);
        }
      }
    }
  });
});
