/**
 * OCI extension configuration schema (TypeBox), defaults and environment
 * overrides.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { homedir } from "node:os";
import { join } from "node:path";
import { InvalidRequestError } from "./errors.js";
import { isLogLevel, type OciLogLevel } from "./logging/index.js";
import { OCI_RETRY_DEFAULTS, type RetryConfig } from "./retry.js";
import type { WorkRequestTrackerOptions } from "./types.js";

export const configSchema = Type.Object({
  defaultCompartmentId: Type.Optional(Type.String({ description: "Default compartment OCID" })),
  defaultRegion: Type.Optional(Type.String({ description: "Default region (e.g. us-ashburn-1)" })),
  configFile: Type.Optional(Type.String({ description: "Path to the OCI config file" })),
  profile: Type.Optional(Type.String({ description: "Profile name inside the OCI config file" })),
  suppressWarnings: Type.Optional(
    Type.Boolean({ description: "Suppress non-fatal CLI banners (SUPPRESS_LABEL_WARNING)" }),
  ),
  cliPath: Type.Optional(Type.String({ description: "Path to the oci CLI executable" })),
  requestTimeoutMs: Type.Optional(Type.Number({ minimum: 1 })),
  cliTimeoutMs: Type.Optional(Type.Number({ minimum: 1 })),
  retry: Type.Optional(
    Type.Object({
      maxAttempts: Type.Optional(Type.Number({ minimum: 1 })),
      minDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
      maxDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
      jitterFactor: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
    }),
  ),
  workRequests: Type.Optional(
    Type.Object({
      maxPolls: Type.Optional(Type.Integer({ minimum: 1 })),
      initialDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
      maxDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
      backoffFactor: Type.Optional(Type.Number({ minimum: 1 })),
    }),
  ),
  logLevel: Type.Optional(
    Type.Union([
      Type.Literal("trace"),
      Type.Literal("debug"),
      Type.Literal("info"),
      Type.Literal("warn"),
      Type.Literal("error"),
      Type.Literal("fatal"),
    ]),
  ),
});

export type OciPluginConfig = Static<typeof configSchema>;

export const DEFAULT_REGION = "us-ashburn-1";

export const DEFAULT_WORK_REQUEST_OPTIONS: WorkRequestTrackerOptions = {
  maxPolls: 10,
  initialDelayMs: 2_000,
  maxDelayMs: 30_000,
  backoffFactor: 2,
};

export function getDefaultConfig(): OciPluginConfig {
  return {
    configFile: join(homedir(), ".oci", "config"),
    profile: "DEFAULT",
    suppressWarnings: true,
    cliPath: "oci",
    requestTimeoutMs: 30_000,
    cliTimeoutMs: 60_000,
    retry: { ...OCI_RETRY_DEFAULTS },
    workRequests: { ...DEFAULT_WORK_REQUEST_OPTIONS },
    logLevel: "info",
  };
}

// =============================================================================
// Environment
// =============================================================================

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

/** Read the environment variables the server honours. Unset variables are omitted. */
export function configFromEnv(env: NodeJS.ProcessEnv): OciPluginConfig {
  const config: OciPluginConfig = {};
  if (env.OCI_COMPARTMENT_ID) config.defaultCompartmentId = env.OCI_COMPARTMENT_ID;
  if (env.OCI_REGION) config.defaultRegion = env.OCI_REGION;
  if (env.OCI_CONFIG_FILE) config.configFile = env.OCI_CONFIG_FILE;
  if (env.OCI_CLI_PROFILE) config.profile = env.OCI_CLI_PROFILE;

  const suppress = parseFlag(env.SUPPRESS_LABEL_WARNING);
  if (suppress !== undefined) config.suppressWarnings = suppress;

  const level = env.OCI_OPS_LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) config.logLevel = level;

  return config;
}

// =============================================================================
// Validation & Merge
// =============================================================================

export function validateConfig(value: unknown): OciPluginConfig {
  if (Value.Check(configSchema, value)) return value;

  const problems = [...Value.Errors(configSchema, value)].map(
    (e) => `${e.path || "/"}: ${e.message}`,
  );
  throw new InvalidRequestError(`Invalid OCI configuration: ${problems.join("; ")}`);
}

/** Later layers win; nested option groups are merged field by field. */
export function mergeConfig(...layers: OciPluginConfig[]): OciPluginConfig {
  let merged: OciPluginConfig = {};
  for (const layer of layers) {
    merged = {
      ...merged,
      ...layer,
      retry: { ...merged.retry, ...layer.retry },
      workRequests: { ...merged.workRequests, ...layer.workRequests },
    };
  }
  return merged;
}

// =============================================================================
// Runtime Config
// =============================================================================

export type OciRuntimeConfig = Readonly<{
  compartmentId?: string;
  region: string;
  configFile: string;
  profile: string;
  suppressWarnings: boolean;
  cliPath: string;
  requestTimeoutMs: number;
  cliTimeoutMs: number;
  retry: Readonly<RetryConfig>;
  workRequests: Readonly<WorkRequestTrackerOptions>;
  logLevel: OciLogLevel;
}>;

/**
 * Resolve a validated config into the frozen runtime view. The profile's
 * tenancy stands in for a missing default compartment; its region for a
 * missing default region.
 */
export function resolveRuntimeConfig(
  config: OciPluginConfig,
  profile?: { tenancy?: string; region?: string },
): OciRuntimeConfig {
  const defaults = getDefaultConfig();
  const merged = mergeConfig(defaults, config);

  return Object.freeze({
    compartmentId: merged.defaultCompartmentId ?? profile?.tenancy,
    region: merged.defaultRegion ?? profile?.region ?? DEFAULT_REGION,
    configFile: expandHome(merged.configFile ?? join(homedir(), ".oci", "config")),
    profile: merged.profile ?? "DEFAULT",
    suppressWarnings: merged.suppressWarnings ?? true,
    cliPath: merged.cliPath ?? "oci",
    requestTimeoutMs: merged.requestTimeoutMs ?? 30_000,
    cliTimeoutMs: merged.cliTimeoutMs ?? 60_000,
    retry: Object.freeze({ ...OCI_RETRY_DEFAULTS, ...merged.retry }),
    workRequests: Object.freeze({ ...DEFAULT_WORK_REQUEST_OPTIONS, ...merged.workRequests }),
    logLevel: merged.logLevel ?? "info",
  });
}

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}
