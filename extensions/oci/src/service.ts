/**
 * OCI Extension — Core Services
 *
 * Tool-level operations. Every method resolves to a response envelope; errors
 * raised anywhere below are converted here and never escape.
 */

import type { NetworkInterface, ResourceDetail, ResourceSummary } from "./backends/types.js";
import {
  failureEnvelope,
  kindLabel,
  successEnvelope,
  summarizeAction,
  summarizeCompletion,
  summarizeDescribe,
  summarizeList,
  summarizeState,
  summarizeWorkRequest,
  type ResponseEnvelope,
} from "./envelope.js";
import {
  InvalidRequestError,
  OperationCancelledError,
  WorkRequestFailedError,
  errorMessage,
} from "./errors.js";
import { createAction, type ActionDetails } from "./lifecycle/dispatcher.js";
import type { OciLogger } from "./logging/index.js";
import { createHandle, inferKind } from "./resources.js";
import type { OciRuntime } from "./runtime.js";
import type {
  ActionKind,
  BackendMethod,
  LifecycleState,
  ResourceHandle,
  ResourceKind,
  ScalingParams,
  WorkRequest,
} from "./types.js";

// =============================================================================
// Inputs
// =============================================================================

export type ListResourcesInput = {
  kind: ResourceKind;
  compartmentId?: string;
  lifecycleState?: LifecycleState;
  region?: string;
};

export type ListInstancesWithNetworkInput = {
  compartmentId?: string;
  lifecycleState?: LifecycleState;
  region?: string;
};

export type DescribeResourceInput = {
  resourceId: string;
  kind?: ResourceKind;
  compartmentId?: string;
  includeNetwork?: boolean;
  region?: string;
};

export type ResourceStateInput = {
  resourceId: string;
  kind?: ResourceKind;
  region?: string;
};

export type LifecycleActionInput = {
  resourceId: string;
  kind?: ResourceKind;
  compartmentId?: string;
  softVariant?: boolean;
  waitForCompletion?: boolean;
  region?: string;
};

export type ScaleAutonomousDatabaseInput = ScalingParams & {
  resourceId: string;
  waitForCompletion?: boolean;
  region?: string;
};

export type WorkRequestInput = {
  workRequestId: string;
  region?: string;
  wait?: boolean;
};

// =============================================================================
// Results
// =============================================================================

export type ListFilters = {
  kind: ResourceKind;
  compartmentId: string;
  lifecycleState: LifecycleState | null;
  region: string;
};

export type ListResourcesData = {
  count: number;
  filters: ListFilters;
  resources: ResourceSummary[];
};

export type InstanceWithNetwork = ResourceSummary & {
  primaryPrivateIp?: string;
  primaryPublicIp?: string;
  networkInterfaces: NetworkInterface[];
};

export type ListInstancesWithNetworkData = {
  count: number;
  filters: ListFilters;
  instances: InstanceWithNetwork[];
};

export type DescribeResourceData = {
  resource: ResourceSummary;
  networkInterfaces: NetworkInterface[];
  networkInfoIncluded: boolean;
};

export type StateInfo = {
  resourceId: string;
  resourceName: string;
  kind: ResourceKind;
  lifecycleState: LifecycleState;
  nativeState: string;
  region: string;
};

export type ResourceStateData = { stateInfo: StateInfo };

export type ActionData = {
  actionDetails: ActionDetails;
  workRequest?: WorkRequest;
  currentState?: LifecycleState;
};

export type WorkRequestData = { workRequest: WorkRequest };

export type ConnectionCheck = {
  name: "config" | "apiBackend" | "cliBackend" | "compute" | "database";
  status: "ok" | "failed" | "skipped";
  detail: string;
};

export type ConnectionReport = {
  region: string;
  compartmentId: string | null;
  checks: ConnectionCheck[];
  passed: number;
  failed: number;
};

// =============================================================================
// Service
// =============================================================================

const ACTION_VERBS: Record<ActionKind, string> = {
  START: "start",
  STOP: "stop",
  RESTART: "restart",
  SCALE: "scale",
};

export class OciCoreService {
  private logger: OciLogger;

  constructor(private runtime: OciRuntime) {
    this.logger = runtime.logger.child("service");
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  async listResources(input: ListResourcesInput, signal?: AbortSignal): Promise<ResponseEnvelope<ListResourcesData>> {
    const operation = `list ${kindLabel(input.kind, 2)}`;
    try {
      const filters = this.listFilters(input.kind, input);
      const { value: resources, method } = await this.runtime.selector.execute(
        operation,
        (backend, s) =>
          backend.list(
            {
              kind: input.kind,
              compartmentId: filters.compartmentId,
              region: filters.region,
              lifecycleState: input.lifecycleState,
            },
            s,
          ),
        signal,
      );

      return successEnvelope(
        summarizeList(resources.length, input.kind, filters.region, input.lifecycleState),
        { count: resources.length, filters, resources },
        method,
        this.timestamp(),
      );
    } catch (error) {
      return this.fail(operation, error);
    }
  }

  async listInstancesWithNetwork(
    input: ListInstancesWithNetworkInput,
    signal?: AbortSignal,
  ): Promise<ResponseEnvelope<ListInstancesWithNetworkData>> {
    const operation = "list instances with network info";
    const lifecycleState = input.lifecycleState ?? "RUNNING";
    try {
      const filters = this.listFilters("Instance", { ...input, lifecycleState });
      const { value: resources, method } = await this.runtime.selector.execute(
        operation,
        (backend, s) =>
          backend.list({ kind: "Instance", compartmentId: filters.compartmentId, region: filters.region, lifecycleState }, s),
        signal,
      );

      const instances: InstanceWithNetwork[] = [];
      for (const resource of resources) {
        const networkInterfaces = await this.networkFor(resource, signal);
        const primary = networkInterfaces.find((n) => n.isPrimary) ?? networkInterfaces[0];
        instances.push({
          ...resource,
          primaryPrivateIp: primary?.privateIp,
          primaryPublicIp: primary?.publicIp,
          networkInterfaces,
        });
      }

      const summary = summarizeList(instances.length, "Instance", filters.region, lifecycleState).replace(
        /\.$/,
        " with network details.",
      );
      return successEnvelope(summary, { count: instances.length, filters, instances }, method, this.timestamp());
    } catch (error) {
      return this.fail(operation, error);
    }
  }

  async describeResource(input: DescribeResourceInput, signal?: AbortSignal): Promise<ResponseEnvelope<DescribeResourceData>> {
    const operation = this.operationLabel("describe", input);
    try {
      const handle = createHandle(input, this.runtime.config.region);
      const includeNetwork = input.includeNetwork ?? true;
      const { value: detail, method } = await this.runtime.selector.execute(
        operation,
        (backend, s) => backend.describe(handle, { includeNetwork, signal: s }),
        signal,
      );

      const { networkInterfaces, networkInfoIncluded, ...resource } = detail;
      return successEnvelope(
        summarizeDescribe(detail),
        { resource, networkInterfaces, networkInfoIncluded },
        method,
        this.timestamp(),
      );
    } catch (error) {
      return this.fail(operation, error);
    }
  }

  async getResourceState(input: ResourceStateInput, signal?: AbortSignal): Promise<ResponseEnvelope<ResourceStateData>> {
    const operation = this.operationLabel("get state of", input);
    try {
      const handle = createHandle(input, this.runtime.config.region);
      const { value: snapshot, method } = await this.runtime.selector.execute(
        operation,
        (backend, s) => backend.currentState(handle, s),
        signal,
      );

      const stateInfo: StateInfo = {
        resourceId: handle.id,
        resourceName: snapshot.resourceName,
        kind: handle.kind,
        lifecycleState: snapshot.state,
        nativeState: snapshot.nativeState,
        region: handle.region,
      };
      return successEnvelope(
        summarizeState(handle.kind, snapshot.resourceName, snapshot.state),
        { stateInfo },
        method,
        this.timestamp(),
      );
    } catch (error) {
      return this.fail(operation, error);
    }
  }

  async getWorkRequest(input: WorkRequestInput, signal?: AbortSignal): Promise<ResponseEnvelope<WorkRequestData>> {
    const operation = `get work request ${input.workRequestId}`;
    try {
      if (!input.workRequestId.trim()) throw new InvalidRequestError("workRequestId is required");
      const region = input.region ?? this.runtime.config.region;

      if (input.wait) {
        const { workRequest, method } = await this.runtime.tracker.track(input.workRequestId, region, { signal });
        return successEnvelope(summarizeWorkRequest(workRequest), { workRequest }, method, this.timestamp());
      }

      const { value: poll, method } = await this.runtime.selector.execute(
        operation,
        (backend, s) => backend.getWorkRequest(input.workRequestId, region, s),
        signal,
      );
      const polledAt = this.timestamp();
      const workRequest: WorkRequest = {
        workRequestId: input.workRequestId,
        status: poll.status,
        issuedAt: poll.timeAccepted ?? polledAt,
        lastPolledAt: polledAt,
        percentComplete: poll.percentComplete,
        polls: 1,
      };
      return successEnvelope(summarizeWorkRequest(workRequest), { workRequest }, method, polledAt);
    } catch (error) {
      return this.fail(operation, error);
    }
  }

  // ---------------------------------------------------------------------------
  // Lifecycle Actions
  // ---------------------------------------------------------------------------

  startResource(input: LifecycleActionInput, signal?: AbortSignal): Promise<ResponseEnvelope<ActionData>> {
    return this.runAction("START", input, undefined, signal);
  }

  stopResource(input: LifecycleActionInput, signal?: AbortSignal): Promise<ResponseEnvelope<ActionData>> {
    return this.runAction("STOP", input, undefined, signal);
  }

  restartResource(input: LifecycleActionInput, signal?: AbortSignal): Promise<ResponseEnvelope<ActionData>> {
    return this.runAction("RESTART", input, undefined, signal);
  }

  scaleAutonomousDatabase(
    input: ScaleAutonomousDatabaseInput,
    signal?: AbortSignal,
  ): Promise<ResponseEnvelope<ActionData>> {
    const scaling: ScalingParams = {
      computeCount: input.computeCount,
      dataStorageSizeInTBs: input.dataStorageSizeInTBs,
      isAutoScalingEnabled: input.isAutoScalingEnabled,
      isAutoScalingForStorageEnabled: input.isAutoScalingForStorageEnabled,
    };
    return this.runAction(
      "SCALE",
      { resourceId: input.resourceId, kind: "AutonomousDatabase", waitForCompletion: input.waitForCompletion, region: input.region },
      scaling,
      signal,
    );
  }

  private async runAction(
    kind: ActionKind,
    input: LifecycleActionInput,
    scaling: ScalingParams | undefined,
    signal?: AbortSignal,
  ): Promise<ResponseEnvelope<ActionData>> {
    const operation = this.operationLabel(ACTION_VERBS[kind], input);
    let method: BackendMethod | undefined;
    try {
      const handle = createHandle(input, this.runtime.config.region);
      const action = createAction({ kind, resourceId: handle.id, softVariant: input.softVariant, scaling });

      const dispatched = await this.runtime.dispatcher.dispatch(handle, action, signal);
      method = dispatched.method;
      const details = dispatched.details;
      const data: ActionData = { actionDetails: details };
      let summary = summarizeAction(details);

      if (input.waitForCompletion && details.workRequestId) {
        const { workRequest } = await this.runtime.tracker.track(details.workRequestId, handle.region, {
          signal,
          issuedAt: details.initiatedAt,
        });
        data.workRequest = workRequest;

        if (workRequest.status === "FAILED") throw new WorkRequestFailedError(workRequest.workRequestId);
        if (workRequest.status === "SUCCEEDED") {
          data.currentState = await this.freshState(handle, signal);
        }
        summary = `${summary} ${summarizeCompletion(workRequest, data.currentState)}`;
      } else if (input.waitForCompletion) {
        this.logger.info(`No work request returned for ${kind} on ${handle.id}; nothing to wait for`);
      }

      return successEnvelope(summary, data, method, this.timestamp());
    } catch (error) {
      return this.fail(operation, error, method);
    }
  }

  // ---------------------------------------------------------------------------
  // Connection Test
  // ---------------------------------------------------------------------------

  async testConnection(signal?: AbortSignal): Promise<ResponseEnvelope<ConnectionReport>> {
    const operation = "test OCI connection";
    try {
      const { config, profile, profileError } = this.runtime;
      const checks: ConnectionCheck[] = [];

      checks.push(
        profile
          ? { name: "config", status: "ok", detail: `Profile ${profile.name} loaded from ${config.configFile}` }
          : { name: "config", status: "failed", detail: profileError ?? "OCI profile not loaded" },
      );
      for (const [name, backend] of [
        ["apiBackend", this.runtime.primary],
        ["cliBackend", this.runtime.fallback],
      ] as const) {
        checks.push(
          await this.probe(name, async () => {
            await backend.ping(config.region, signal);
            return `${backend.name} reachable`;
          }),
        );
      }

      const compartmentId = config.compartmentId;
      for (const [name, kind] of [
        ["compute", "Instance"],
        ["database", "DatabaseSystem"],
      ] as const) {
        if (!compartmentId) {
          checks.push({ name, status: "skipped", detail: "No compartment configured" });
          continue;
        }
        checks.push(
          await this.probe(name, async () => {
            const { value, method } = await this.runtime.selector.execute(
              `list ${kindLabel(kind, 2)}`,
              (backend, s) => backend.list({ kind, compartmentId, region: config.region }, s),
              signal,
            );
            return `${value.length} ${kindLabel(kind, value.length)} visible via ${method}`;
          }),
        );
      }

      const failed = checks.filter((c) => c.status === "failed").length;
      const run = checks.filter((c) => c.status !== "skipped").length;
      const summary = failed === 0 ? "All OCI Core Services accessible." : `${failed} out of ${run} tests failed.`;

      return successEnvelope(
        summary,
        { region: config.region, compartmentId: compartmentId ?? null, checks, passed: run - failed, failed },
        null,
        this.timestamp(),
      );
    } catch (error) {
      return this.fail(operation, error, null);
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private timestamp(): string {
    return this.runtime.now().toISOString();
  }

  private fail(operation: string, error: unknown, method?: BackendMethod | null) {
    const envelope = failureEnvelope(operation, error, this.timestamp(), method);
    this.logger.error(envelope.summary, { errorCode: envelope.errorCode, method: envelope.method });
    return envelope;
  }

  private compartment(explicit?: string): string {
    const compartmentId = explicit ?? this.runtime.config.compartmentId;
    if (!compartmentId) {
      throw new InvalidRequestError("No compartment specified; pass compartmentId or set OCI_COMPARTMENT_ID");
    }
    return compartmentId;
  }

  private listFilters(
    kind: ResourceKind,
    input: { compartmentId?: string; lifecycleState?: LifecycleState; region?: string },
  ): ListFilters {
    return {
      kind,
      compartmentId: this.compartment(input.compartmentId),
      lifecycleState: input.lifecycleState ?? null,
      region: input.region ?? this.runtime.config.region,
    };
  }

  /** "stop instance", or "stop resource" when the kind is not known yet. */
  private operationLabel(verb: string, input: { resourceId: string; kind?: ResourceKind }): string {
    const kind = input.kind ?? inferKind(input.resourceId.trim());
    return `${verb} ${kind ? kindLabel(kind) : "resource"}`;
  }

  private async networkFor(resource: ResourceSummary, signal?: AbortSignal): Promise<NetworkInterface[]> {
    const handle = createHandle(
      { resourceId: resource.id, kind: "Instance", compartmentId: resource.compartmentId, region: resource.region },
      resource.region,
    );
    try {
      const { value } = await this.runtime.selector.execute(
        `describe instance ${resource.id}`,
        (backend, s): Promise<ResourceDetail> => backend.describe(handle, { includeNetwork: true, signal: s }),
        signal,
      );
      return value.networkInterfaces;
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      this.logger.warn(`Failed to get network info for instance ${resource.id}: ${errorMessage(error)}`);
      return [];
    }
  }

  /** State read after a successful work request; a failed read leaves it unset. */
  private async freshState(
    handle: ResourceHandle,
    signal?: AbortSignal,
  ): Promise<LifecycleState | undefined> {
    try {
      const { value } = await this.runtime.selector.execute(
        `read state of ${handle.id}`,
        (backend, s) => backend.currentState(handle, s),
        signal,
      );
      return value.state;
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      this.logger.warn(`Could not re-read state of ${handle.id}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async probe(name: ConnectionCheck["name"], fn: () => Promise<string>): Promise<ConnectionCheck> {
    try {
      return { name, status: "ok", detail: await fn() };
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      return { name, status: "failed", detail: errorMessage(error) };
    }
  }
}

export function createOciCoreService(runtime: OciRuntime): OciCoreService {
  return new OciCoreService(runtime);
}
