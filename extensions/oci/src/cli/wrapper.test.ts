import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockExecFile } = vi.hoisted(() => ({ mockExecFile: vi.fn() }));

vi.mock("node:child_process", () => ({ execFile: mockExecFile }));
vi.mock("node:util", () => ({ promisify: (_fn: unknown) => mockExecFile }));

import { OciCLIWrapper, createCLIWrapper } from "./wrapper.js";

beforeEach(() => {
  mockExecFile.mockReset();
});

describe("OciCLIWrapper", () => {
  it("appends output, profile and config-file arguments", async () => {
    mockExecFile.mockResolvedValueOnce({ stdout: '{"data":[]}', stderr: "" });
    const cli = new OciCLIWrapper({ profile: "DEFAULT", configFile: "/cfg" });

    const result = await cli.execute(["compute", "instance", "list"]);

    expect(mockExecFile).toHaveBeenCalledWith(
      "oci",
      ["compute", "instance", "list", "--output", "json", "--profile", "DEFAULT", "--config-file", "/cfg"],
      expect.objectContaining({ timeout: 60_000, maxBuffer: 64 * 1024 * 1024 }),
    );
    expect(result).toEqual({
      success: true,
      stdout: '{"data":[]}',
      stderr: "",
      exitCode: 0,
      parsed: { data: [] },
      timedOut: false,
      cancelled: false,
    });
  });

  it("uses a custom binary path and timeout", async () => {
    mockExecFile.mockResolvedValueOnce({ stdout: "", stderr: "" });
    const cli = createCLIWrapper({ ociPath: "/opt/oci/bin/oci", timeoutMs: 5_000 });

    await cli.execute(["iam", "region", "list"]);

    expect(cli.timeoutMs).toBe(5_000);
    expect(mockExecFile).toHaveBeenCalledWith(
      "/opt/oci/bin/oci",
      ["iam", "region", "list", "--output", "json"],
      expect.objectContaining({ timeout: 5_000 }),
    );
  });

  it("suppresses label warnings unless told otherwise", async () => {
    mockExecFile.mockResolvedValue({ stdout: "", stderr: "" });

    await new OciCLIWrapper().execute(["--version"]);
    await new OciCLIWrapper({ suppressWarnings: false }).execute(["--version"]);

    expect(mockExecFile.mock.calls[0]?.[2].env.SUPPRESS_LABEL_WARNING).toBe("True");
    expect(mockExecFile.mock.calls[1]?.[2].env).toBe(process.env);
  });

  it("leaves parsed undefined for plain text output", async () => {
    mockExecFile.mockResolvedValueOnce({ stdout: "3.37.0\n", stderr: "" });
    const result = await new OciCLIWrapper().execute(["--version"]);
    expect(result.success).toBe(true);
    expect(result.parsed).toBeUndefined();
  });

  it("reports exit code and stderr of a failed command", async () => {
    mockExecFile.mockRejectedValueOnce(
      Object.assign(new Error("Command failed"), { code: 2, stdout: "", stderr: "Error: Missing option(s) --compartment-id." }),
    );

    const result = await new OciCLIWrapper().execute(["compute", "instance", "list"]);

    expect(result).toEqual({
      success: false,
      stdout: "",
      stderr: "Error: Missing option(s) --compartment-id.",
      exitCode: 2,
      errorCode: undefined,
      timedOut: false,
      cancelled: false,
    });
  });

  it("reports a missing binary as ENOENT", async () => {
    mockExecFile.mockRejectedValueOnce(Object.assign(new Error("spawn oci ENOENT"), { code: "ENOENT" }));

    const result = await new OciCLIWrapper().execute(["--version"]);

    expect(result.exitCode).toBe(1);
    expect(result.errorCode).toBe("ENOENT");
    expect(result.stderr).toBe("spawn oci ENOENT");
  });

  it("flags a killed process as timed out", async () => {
    mockExecFile.mockRejectedValueOnce(Object.assign(new Error("Command failed"), { killed: true, signal: "SIGTERM" }));
    const result = await new OciCLIWrapper().execute(["db", "system", "list"]);
    expect(result.timedOut).toBe(true);
    expect(result.cancelled).toBe(false);
  });

  it("flags an aborted call as cancelled rather than timed out", async () => {
    const controller = new AbortController();
    mockExecFile.mockImplementationOnce(async () => {
      controller.abort();
      throw Object.assign(new Error("The operation was aborted"), { name: "AbortError", killed: true });
    });

    const result = await new OciCLIWrapper().execute(["db", "system", "list"], controller.signal);

    expect(mockExecFile.mock.calls[0]?.[2].signal).toBe(controller.signal);
    expect(result.cancelled).toBe(true);
    expect(result.timedOut).toBe(false);
  });
});
