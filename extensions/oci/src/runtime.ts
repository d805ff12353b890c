/**
 * OCI Extension — Runtime Assembly
 *
 * Builds the immutable runtime (config, logger, backends, selector,
 * dispatcher, tracker) once at start-up. Components receive it explicitly.
 */

import { signRequest } from "./api/signer.js";
import { ApiBackend } from "./backends/api-backend.js";
import { CliBackend } from "./backends/cli-backend.js";
import type { ExecutionBackend } from "./backends/types.js";
import { createCLIWrapper } from "./cli/wrapper.js";
import {
  configFromEnv,
  getDefaultConfig,
  mergeConfig,
  resolveRuntimeConfig,
  validateConfig,
  type OciPluginConfig,
  type OciRuntimeConfig,
} from "./config.js";
import { loadOciProfile, loadSigningCredentials, type OciProfile } from "./credentials.js";
import { BackendUnavailableError, errorMessage } from "./errors.js";
import { LifecycleDispatcher } from "./lifecycle/dispatcher.js";
import { createOciLogger, type LogTransport, type OciLogger } from "./logging/index.js";
import { BackendSelector } from "./selector.js";
import { WorkRequestTracker } from "./work-requests/tracker.js";

export type OciRuntime = Readonly<{
  config: OciRuntimeConfig;
  logger: OciLogger;
  primary: ExecutionBackend;
  fallback: ExecutionBackend;
  selector: BackendSelector;
  dispatcher: LifecycleDispatcher;
  tracker: WorkRequestTracker;
  /** Profile read from the OCI config file, when it could be read. */
  profile?: OciProfile;
  profileError?: string;
  now: () => Date;
}>;

export type AssembleOptions = {
  config: OciRuntimeConfig;
  logger: OciLogger;
  primary: ExecutionBackend;
  fallback: ExecutionBackend;
  profile?: OciProfile;
  profileError?: string;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

/** Wire the execution layer around a pair of backends. */
export function assembleRuntime(options: AssembleOptions): OciRuntime {
  const now = options.now ?? (() => new Date());
  const selector = new BackendSelector(options.primary, options.fallback, options.logger);

  return Object.freeze({
    config: options.config,
    logger: options.logger,
    primary: options.primary,
    fallback: options.fallback,
    selector,
    dispatcher: new LifecycleDispatcher(selector, options.logger, now),
    tracker: new WorkRequestTracker(
      { selector, logger: options.logger, sleep: options.sleep, now },
      options.config.workRequests,
    ),
    profile: options.profile,
    profileError: options.profileError,
    now,
  });
}

export type CreateRuntimeOptions = {
  env?: NodeJS.ProcessEnv;
  /** Explicit settings; win over the environment. */
  overrides?: OciPluginConfig;
  transports?: LogTransport[];
};

/**
 * Resolve configuration (defaults, environment, overrides), read the OCI
 * profile and build both backends. A missing profile does not fail start-up:
 * the REST backend reports itself unavailable and the CLI takes over.
 */
export async function createOciRuntime(options?: CreateRuntimeOptions): Promise<OciRuntime> {
  const pluginConfig = validateConfig(
    mergeConfig(getDefaultConfig(), configFromEnv(options?.env ?? process.env), options?.overrides ?? {}),
  );
  const preliminary = resolveRuntimeConfig(pluginConfig);

  const { profile, profileError } = await readProfile(preliminary);

  const config = resolveRuntimeConfig(pluginConfig, profile);
  const logger = createOciLogger("core", { level: config.logLevel, transports: options?.transports });
  if (profileError) logger.warn(`OCI profile unavailable, REST backend disabled: ${profileError}`);

  const primary = new ApiBackend({
    signer: async () => {
      if (!profile) throw new BackendUnavailableError(profileError ?? "OCI profile not loaded");
      const credentials = await loadSigningCredentials(profile);
      return (request) => signRequest(request, credentials);
    },
    logger,
    tenancyId: profile?.tenancy,
    requestTimeoutMs: config.requestTimeoutMs,
    retry: config.retry,
  });

  const fallback = new CliBackend(
    createCLIWrapper({
      ociPath: config.cliPath,
      timeoutMs: config.cliTimeoutMs,
      profile: config.profile,
      configFile: config.configFile,
      suppressWarnings: config.suppressWarnings,
    }),
    logger,
  );

  logger.info(`Runtime ready (region ${config.region}, compartment ${config.compartmentId ?? "not set"})`);
  return assembleRuntime({ config, logger, primary, fallback, profile, profileError });
}

async function readProfile(config: OciRuntimeConfig): Promise<{ profile?: OciProfile; profileError?: string }> {
  try {
    return { profile: await loadOciProfile(config.configFile, config.profile) };
  } catch (error) {
    return { profileError: errorMessage(error) };
  }
}
