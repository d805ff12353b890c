/**
 * OCI Extension — CLI Execution Backend (fallback)
 *
 * Runs the `oci` CLI and maps its kebab-case JSON onto the same shapes the
 * REST backend returns.
 */

import type { OciCLIResult, OciCLIWrapper } from "../cli/wrapper.js";
import {
  BackendRejectedError,
  BackendUnavailableError,
  OciError,
  OperationCancelledError,
  ResourceNotFoundError,
  errorMessage,
} from "../errors.js";
import type { OciLogger } from "../logging/index.js";
import type { Action, ResourceHandle, ResourceKind } from "../types.js";
import {
  actionEachNode,
  deriveDbSystemState,
  field,
  filterByState,
  isRecord,
  mapResource,
  mapResources,
  mapVnic,
  normalizeWorkRequestStatus,
  num,
  providerAction,
  sortInterfaces,
  str,
} from "./mapping.js";
import type {
  DescribeOptions,
  ExecutionBackend,
  ListQuery,
  MutationResult,
  NetworkInterface,
  ResourceDetail,
  ResourceSummary,
  StateSnapshot,
  WorkRequestPoll,
} from "./types.js";

// =============================================================================
// Command Tables
// =============================================================================

const COMMANDS: Record<ResourceKind, { group: string[]; idFlag: string }> = {
  Instance: { group: ["compute", "instance"], idFlag: "--instance-id" },
  DatabaseSystem: { group: ["db", "system"], idFlag: "--db-system-id" },
  AutonomousDatabase: { group: ["db", "autonomous-database"], idFlag: "--autonomous-database-id" },
};

const DB_NODE_SUBCOMMANDS: Record<string, string> = {
  START: "start",
  STOP: "stop",
  RESET: "reset",
  SOFTRESET: "soft-reset",
};

// =============================================================================
// Error Classification
// =============================================================================

export type CliServiceError = {
  status?: number;
  code?: string;
  message?: string;
};

/** Extract the JSON body the CLI prints after `ServiceError:` on stderr. */
export function parseServiceError(stderr: string): CliServiceError | undefined {
  const marker = stderr.indexOf("ServiceError:");
  if (marker === -1) return undefined;
  const start = stderr.indexOf("{", marker);
  const end = stderr.lastIndexOf("}");
  if (start === -1 || end < start) return {};

  try {
    const parsed: unknown = JSON.parse(stderr.slice(start, end + 1));
    if (!isRecord(parsed)) return {};
    return { status: num(parsed, "status"), code: str(parsed, "code"), message: str(parsed, "message") };
  } catch {
    return {};
  }
}

/** Map a failed CLI invocation onto the error taxonomy. */
export function classifyCliFailure(result: OciCLIResult, operation: string, subject?: string): OciError {
  if (result.cancelled) return new OperationCancelledError(operation);
  if (result.errorCode === "ENOENT") {
    return new BackendUnavailableError("oci CLI not found on PATH");
  }
  if (result.timedOut) return new BackendUnavailableError(`oci CLI timed out during ${operation}`);

  const service = parseServiceError(result.stderr);
  if (service) {
    const status = service.status;
    const detail = [service.code, service.message].filter(Boolean).join(": ") || firstLine(result.stderr);
    const options = { statusCode: status };
    if (status === 404) return new ResourceNotFoundError(subject ?? "unknown", options);
    if (status === 401) return new BackendUnavailableError(`Authentication failed (${detail})`, options);
    if (status !== undefined && (status === 429 || status >= 500)) return new BackendUnavailableError(detail, options);
    return new BackendRejectedError(detail, options);
  }

  // exit code 2 is a usage error: the CLI understood nothing of the request
  if (result.exitCode === 2) return new BackendRejectedError(`oci CLI rejected ${operation}: ${firstLine(result.stderr)}`);
  return new BackendUnavailableError(`oci CLI failed during ${operation}: ${firstLine(result.stderr)}`);
}

function firstLine(text: string): string {
  return text.trim().split("\n")[0] ?? "";
}

// =============================================================================
// Backend
// =============================================================================

export class CliBackend implements ExecutionBackend {
  readonly name = "OCI CLI";
  private logger: OciLogger;

  constructor(
    private cli: OciCLIWrapper,
    logger: OciLogger,
  ) {
    this.logger = logger.child("cli");
  }

  async list(query: ListQuery, signal?: AbortSignal): Promise<ResourceSummary[]> {
    const { group } = COMMANDS[query.kind];
    const data = await this.run(
      [...group, "list", "--compartment-id", query.compartmentId, "--all", "--region", query.region],
      `list ${query.kind}`,
      query.compartmentId,
      signal,
    );
    const resources = mapResources(Array.isArray(data) ? data : [], query.kind, query.region);
    return filterByState(resources, query.lifecycleState);
  }

  async describe(handle: ResourceHandle, options?: DescribeOptions): Promise<ResourceDetail> {
    const signal = options?.signal;
    const raw = await this.get(handle, signal);
    const resource = this.toSummary(raw, handle);

    if (handle.kind === "DatabaseSystem") {
      const derived = await this.dbSystemState(raw, handle, signal);
      resource.lifecycleState = derived.state;
      resource.nativeState = derived.nativeState;
    }

    const includeNetwork = (options?.includeNetwork ?? true) && handle.kind === "Instance";
    const networkInterfaces = includeNetwork ? await this.networkInterfaces(handle, signal) : [];
    return { ...resource, networkInterfaces, networkInfoIncluded: includeNetwork };
  }

  async currentState(handle: ResourceHandle, signal?: AbortSignal): Promise<StateSnapshot> {
    const raw = await this.get(handle, signal);
    const resource = this.toSummary(raw, handle);
    if (handle.kind === "DatabaseSystem") {
      return { ...(await this.dbSystemState(raw, handle, signal)), resourceName: resource.name };
    }
    return { state: resource.lifecycleState, nativeState: resource.nativeState, resourceName: resource.name };
  }

  async mutate(handle: ResourceHandle, action: Action, signal?: AbortSignal): Promise<MutationResult> {
    const provider = providerAction(handle.kind, action.kind, action.softVariant);
    const region = ["--region", handle.region];

    switch (handle.kind) {
      case "Instance": {
        const result = await this.exec(
          ["compute", "instance", "action", "--instance-id", handle.id, "--action", provider, ...region],
          `${provider} instance`,
          handle.id,
          signal,
        );
        return this.mutationResult(provider, result.parsed);
      }

      case "DatabaseSystem": {
        const nodes = await this.dbNodes(handle, undefined, signal);
        if (nodes.length === 0) {
          throw new BackendRejectedError(`DB system ${handle.id} has no DB nodes to ${action.kind.toLowerCase()}`);
        }
        const subcommand = DB_NODE_SUBCOMMANDS[provider] ?? provider.toLowerCase();
        return actionEachNode(handle.id, nodes.map((n) => n.id), provider, async (nodeId) => {
          const result = await this.exec(
            ["db", "node", subcommand, "--db-node-id", nodeId, ...region],
            `${provider} DB node`,
            handle.id,
            signal,
          );
          return this.mutationResult(provider, result.parsed);
        });
      }

      case "AutonomousDatabase": {
        const base = ["db", "autonomous-database"];
        const idArgs = ["--autonomous-database-id", handle.id, ...region];
        if (action.kind === "SCALE") {
          const result = await this.exec(
            [...base, "update", ...idArgs, ...scaleArgs(action.scaling ?? {}), "--force"],
            "scale autonomous database",
            handle.id,
            signal,
          );
          return this.mutationResult(provider, result.parsed);
        }
        const result = await this.exec([...base, provider.toLowerCase(), ...idArgs], `${provider} autonomous database`, handle.id, signal);
        return this.mutationResult(provider, result.parsed);
      }
    }
  }

  async getWorkRequest(workRequestId: string, region: string, signal?: AbortSignal): Promise<WorkRequestPoll> {
    const data = await this.run(
      ["work-requests", "work-request", "get", "--work-request-id", workRequestId, "--region", region],
      "get work request",
      workRequestId,
      signal,
    );
    const record = isRecord(data) ? data : {};
    return {
      status: normalizeWorkRequestStatus(str(record, "status")),
      percentComplete: num(record, "percentComplete"),
      timeAccepted: str(record, "timeAccepted"),
    };
  }

  async ping(region: string, signal?: AbortSignal): Promise<void> {
    await this.exec(["iam", "region", "list", "--region", region], "ping", undefined, signal);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async exec(args: string[], operation: string, subject: string | undefined, signal?: AbortSignal) {
    this.logger.debug(`oci ${args.join(" ")}`);
    const result = await this.cli.execute(args, signal);
    if (!result.success) throw classifyCliFailure(result, operation, subject);
    return result;
  }

  /** Runs a command and unwraps its `data` member; empty output reads as an empty list. */
  private async run(args: string[], operation: string, subject: string | undefined, signal?: AbortSignal): Promise<unknown> {
    const result = await this.exec(args, operation, subject, signal);
    if (result.parsed === undefined) return [];
    return isRecord(result.parsed) && "data" in result.parsed ? result.parsed.data : result.parsed;
  }

  private get(handle: ResourceHandle, signal?: AbortSignal): Promise<unknown> {
    const { group, idFlag } = COMMANDS[handle.kind];
    return this.run([...group, "get", idFlag, handle.id, "--region", handle.region], `get ${handle.kind}`, handle.id, signal);
  }

  private toSummary(raw: unknown, handle: ResourceHandle): ResourceSummary {
    const resource = mapResource(raw, handle.kind, handle.region);
    if (!resource) throw new BackendRejectedError(`Unexpected CLI output for ${handle.id}`);
    return resource;
  }

  private mutationResult(provider: string, parsed: unknown): MutationResult {
    const record = isRecord(parsed) ? parsed : {};
    const workRequestId = field(record, "opcWorkRequestId");
    const requestId = field(record, "opcRequestId");
    return {
      providerAction: provider,
      workRequestId: typeof workRequestId === "string" ? workRequestId : undefined,
      requestId: typeof requestId === "string" ? requestId : undefined,
    };
  }

  private async dbNodes(handle: ResourceHandle, compartmentId: string | undefined, signal?: AbortSignal) {
    let compartment = compartmentId ?? handle.compartmentId;
    if (!compartment) {
      const system = await this.get(handle, signal);
      compartment = isRecord(system) ? str(system, "compartmentId") : undefined;
    }
    if (!compartment) throw new BackendRejectedError(`Cannot resolve compartment of DB system ${handle.id}`);

    const data = await this.run(
      ["db", "node", "list", "--compartment-id", compartment, "--db-system-id", handle.id, "--all", "--region", handle.region],
      "list DB nodes",
      handle.id,
      signal,
    );
    const nodes: Array<{ id: string; state: string }> = [];
    for (const entry of Array.isArray(data) ? data : []) {
      if (!isRecord(entry)) continue;
      const id = str(entry, "id");
      if (id) nodes.push({ id, state: str(entry, "lifecycleState") ?? "UNKNOWN" });
    }
    return nodes;
  }

  private async dbSystemState(raw: unknown, handle: ResourceHandle, signal?: AbortSignal) {
    const record = isRecord(raw) ? raw : {};
    const nodes = await this.dbNodes(handle, str(record, "compartmentId"), signal);
    return deriveDbSystemState(str(record, "lifecycleState") ?? "UNKNOWN", nodes.map((n) => n.state));
  }

  private async networkInterfaces(handle: ResourceHandle, signal?: AbortSignal): Promise<NetworkInterface[]> {
    try {
      const data = await this.run(
        ["compute", "instance", "list-vnics", "--instance-id", handle.id, "--all", "--region", handle.region],
        "list VNICs",
        handle.id,
        signal,
      );
      const interfaces: NetworkInterface[] = [];
      for (const entry of Array.isArray(data) ? data : []) {
        const vnic = mapVnic(entry);
        if (vnic) interfaces.push(vnic);
      }
      return sortInterfaces(interfaces);
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      this.logger.warn(`Failed to get network info for ${handle.id}: ${errorMessage(error)}`);
      return [];
    }
  }
}

export function scaleArgs(scaling: NonNullable<Action["scaling"]>): string[] {
  const args: string[] = [];
  if (scaling.computeCount !== undefined) args.push("--compute-count", String(scaling.computeCount));
  if (scaling.dataStorageSizeInTBs !== undefined) {
    args.push("--data-storage-size-in-tbs", String(scaling.dataStorageSizeInTBs));
  }
  if (scaling.isAutoScalingEnabled !== undefined) {
    args.push("--is-auto-scaling-enabled", String(scaling.isAutoScalingEnabled));
  }
  if (scaling.isAutoScalingForStorageEnabled !== undefined) {
    args.push("--is-auto-scaling-for-storage-enabled", String(scaling.isAutoScalingForStorageEnabled));
  }
  return args;
}
