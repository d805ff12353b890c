/**
 * OCI CLI Wrapper
 *
 * Wraps the `oci` CLI tool; used by the fallback execution backend.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

// =============================================================================
// Types
// =============================================================================

export type OciCLIOptions = {
  /** Path to the oci CLI binary. */
  ociPath?: string;
  /** Timeout in ms. */
  timeoutMs?: number;
  profile?: string;
  configFile?: string;
  /** Exported to the CLI as SUPPRESS_LABEL_WARNING. */
  suppressWarnings?: boolean;
};

export type OciCLIResult = {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  parsed?: unknown;
  /** Spawn-level error code such as ENOENT. */
  errorCode?: string;
  timedOut: boolean;
  cancelled: boolean;
};

export type OciCLIConfig = {
  ociPath: string;
  defaultArgs: string[];
  timeoutMs: number;
  env: NodeJS.ProcessEnv;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Commands such as `--version` print plain text; that output has no parsed form. */
function parseJsonOutput(stdout: string): unknown {
  if (!stdout.trim()) return undefined;
  try {
    return JSON.parse(stdout);
  } catch {
    return undefined;
  }
}

// =============================================================================
// OciCLIWrapper
// =============================================================================

export class OciCLIWrapper {
  private config: OciCLIConfig;

  constructor(options?: OciCLIOptions) {
    const defaultArgs = ["--output", "json"];
    if (options?.profile) defaultArgs.push("--profile", options.profile);
    if (options?.configFile) defaultArgs.push("--config-file", options.configFile);

    this.config = {
      ociPath: options?.ociPath ?? "oci",
      defaultArgs,
      timeoutMs: options?.timeoutMs ?? 60_000,
      env: options?.suppressWarnings === false ? process.env : { ...process.env, SUPPRESS_LABEL_WARNING: "True" },
    };
  }

  get timeoutMs(): number {
    return this.config.timeoutMs;
  }

  /**
   * Execute an oci CLI command. Never throws; failures are described by the result.
   */
  async execute(args: string[], signal?: AbortSignal): Promise<OciCLIResult> {
    const fullArgs = [...args, ...this.config.defaultArgs];

    try {
      const { stdout, stderr } = await execFileAsync(this.config.ociPath, fullArgs, {
        timeout: this.config.timeoutMs,
        env: this.config.env,
        maxBuffer: 64 * 1024 * 1024,
        signal,
      });

      return {
        success: true,
        stdout,
        stderr,
        exitCode: 0,
        parsed: parseJsonOutput(stdout),
        timedOut: false,
        cancelled: false,
      };
    } catch (error) {
      const err: Record<string, unknown> = isRecord(error) ? error : {};
      const code = err.code;
      const stderr = typeof err.stderr === "string" && err.stderr ? err.stderr : undefined;
      const message = typeof err.message === "string" ? err.message : undefined;
      const cancelled = signal?.aborted === true || err.name === "AbortError";

      return {
        success: false,
        stdout: typeof err.stdout === "string" ? err.stdout : "",
        stderr: stderr ?? message ?? "Unknown error",
        exitCode: typeof code === "number" ? code : 1,
        errorCode: typeof code === "string" ? code : undefined,
        timedOut: !cancelled && err.killed === true,
        cancelled,
      };
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCLIWrapper(options?: OciCLIOptions): OciCLIWrapper {
  return new OciCLIWrapper(options);
}
