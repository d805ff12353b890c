/**
 * OCI Extension — REST Execution Backend (primary)
 *
 * Talks to the Core Services (iaas), Database and Identity REST APIs with
 * signed requests. Transport failures are retried with backoff, then
 * classified into the execution-layer error taxonomy.
 */

import { randomUUID } from "node:crypto";
import { ociList, ociRequest, OciApiError, type OciResponse, type RequestSigner } from "../api/client.js";
import {
  BackendRejectedError,
  BackendUnavailableError,
  OciError,
  ResourceNotFoundError,
  errorMessage,
} from "../errors.js";
import type { OciLogger } from "../logging/index.js";
import { withOciRetry } from "../retry.js";
import type { Action, OciRetryOptions, ResourceHandle } from "../types.js";
import {
  actionEachNode,
  deriveDbSystemState,
  filterByState,
  isRecord,
  mapResource,
  mapResources,
  mapVnic,
  normalizeWorkRequestStatus,
  providerAction,
  scalePayload,
  sortInterfaces,
  str,
  num,
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
// Endpoints
// =============================================================================

const API_VERSION = "20160918";

export const endpoints = {
  core: (region: string) => `https://iaas.${region}.oraclecloud.com/${API_VERSION}`,
  database: (region: string) => `https://database.${region}.oraclecloud.com/${API_VERSION}`,
  identity: (region: string) => `https://identity.${region}.oraclecloud.com/${API_VERSION}`,
};

const LIST_PATHS = {
  Instance: (region: string) => `${endpoints.core(region)}/instances`,
  DatabaseSystem: (region: string) => `${endpoints.database(region)}/dbSystems`,
  AutonomousDatabase: (region: string) => `${endpoints.database(region)}/autonomousDatabases`,
} as const;

function resourceUrl(handle: ResourceHandle): string {
  return `${LIST_PATHS[handle.kind](handle.region)}/${encodeURIComponent(handle.id)}`;
}

// =============================================================================
// Error Classification
// =============================================================================

const REJECTED_STATUSES = new Set([400, 403, 409, 412, 422]);

/**
 * Map a raw REST failure onto the error taxonomy. `subject` names the
 * resource or work request a 404 refers to.
 */
export function classifyApiError(error: unknown, subject?: string): OciError {
  if (error instanceof OciError) return error;

  if (error instanceof OciApiError) {
    const detail = error.code ? `${error.code}: ${error.message}` : error.message;
    const options = { statusCode: error.statusCode, cause: error };
    if (error.statusCode === 404) return new ResourceNotFoundError(subject ?? "unknown", options);
    if (error.statusCode === 401) return new BackendUnavailableError(`Authentication failed (${detail})`, options);
    if (REJECTED_STATUSES.has(error.statusCode)) return new BackendRejectedError(detail, options);
    if (error.statusCode === 0 || error.statusCode === 429 || error.statusCode >= 500) {
      return new BackendUnavailableError(detail, options);
    }
    return new BackendRejectedError(detail, options);
  }

  return new BackendUnavailableError(`REST transport failure: ${errorMessage(error)}`, { cause: error });
}

// =============================================================================
// Backend
// =============================================================================

export type ApiBackendOptions = {
  /** Resolves the request signer; rejects with BackendUnavailable when credentials are unusable. */
  signer: () => Promise<RequestSigner>;
  logger: OciLogger;
  tenancyId?: string;
  requestTimeoutMs?: number;
  retry?: OciRetryOptions;
};

export class ApiBackend implements ExecutionBackend {
  readonly name = "OCI REST API";
  private signerPromise?: Promise<RequestSigner>;
  private logger: OciLogger;

  constructor(private options: ApiBackendOptions) {
    this.logger = options.logger.child("api");
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  async list(query: ListQuery, signal?: AbortSignal): Promise<ResourceSummary[]> {
    const raw = await this.listAll(LIST_PATHS[query.kind](query.region), { compartmentId: query.compartmentId }, signal);
    const resources = mapResources(raw, query.kind, query.region);
    this.logger.debug(`Listed ${resources.length} ${query.kind} resources`, { compartmentId: query.compartmentId });
    return filterByState(resources, query.lifecycleState);
  }

  async describe(handle: ResourceHandle, options?: DescribeOptions): Promise<ResourceDetail> {
    const signal = options?.signal;
    const raw = await this.get(resourceUrl(handle), handle.id, signal);
    const resource = this.toSummary(raw, handle);

    if (handle.kind === "DatabaseSystem") {
      const derived = await this.dbSystemState(raw, handle, signal);
      resource.lifecycleState = derived.state;
      resource.nativeState = derived.nativeState;
    }

    const includeNetwork = (options?.includeNetwork ?? true) && handle.kind === "Instance";
    const networkInterfaces = includeNetwork
      ? await this.networkInterfaces(handle, resource.compartmentId ?? handle.compartmentId, signal)
      : [];

    return { ...resource, networkInterfaces, networkInfoIncluded: includeNetwork };
  }

  async currentState(handle: ResourceHandle, signal?: AbortSignal): Promise<StateSnapshot> {
    const raw = await this.get(resourceUrl(handle), handle.id, signal);
    const resource = this.toSummary(raw, handle);

    if (handle.kind === "DatabaseSystem") {
      const derived = await this.dbSystemState(raw, handle, signal);
      return { ...derived, resourceName: resource.name };
    }
    return { state: resource.lifecycleState, nativeState: resource.nativeState, resourceName: resource.name };
  }

  async getWorkRequest(workRequestId: string, region: string, signal?: AbortSignal): Promise<WorkRequestPoll> {
    const raw = await this.get(`${endpoints.core(region)}/workRequests/${encodeURIComponent(workRequestId)}`, workRequestId, signal);
    const record = isRecord(raw) ? raw : {};
    return {
      status: normalizeWorkRequestStatus(str(record, "status")),
      percentComplete: num(record, "percentComplete"),
      timeAccepted: str(record, "timeAccepted"),
    };
  }

  async ping(region: string, signal?: AbortSignal): Promise<void> {
    const url = this.options.tenancyId
      ? `${endpoints.identity(region)}/tenancies/${encodeURIComponent(this.options.tenancyId)}/regionSubscriptions`
      : `${endpoints.identity(region)}/regions`;
    await this.send(url, undefined, { signal });
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  async mutate(handle: ResourceHandle, action: Action, signal?: AbortSignal): Promise<MutationResult> {
    const provider = providerAction(handle.kind, action.kind, action.softVariant);

    switch (handle.kind) {
      case "Instance": {
        const res = await this.send(resourceUrl(handle), handle.id, {
          method: "POST",
          query: { action: provider },
          signal,
        });
        return this.mutationResult(provider, res);
      }

      case "DatabaseSystem": {
        const nodes = await this.dbNodes(handle, undefined, signal);
        if (nodes.length === 0) {
          throw new BackendRejectedError(`DB system ${handle.id} has no DB nodes to ${action.kind.toLowerCase()}`);
        }
        const result = await actionEachNode(handle.id, nodes.map((n) => n.id), provider, async (nodeId) => {
          const res = await this.send(`${endpoints.database(handle.region)}/dbNodes/${encodeURIComponent(nodeId)}`, handle.id, {
            method: "POST",
            query: { action: provider },
            signal,
          });
          return this.mutationResult(provider, res);
        });
        if (nodes.length > 1) this.logger.info(`Issued ${provider} to ${nodes.length} DB nodes`, { dbSystemId: handle.id });
        return result;
      }

      case "AutonomousDatabase": {
        if (action.kind === "SCALE") {
          const body = scalePayload(action.scaling ?? {});
          const res = await this.send(resourceUrl(handle), handle.id, { method: "PUT", body, signal });
          return this.mutationResult(provider, res);
        }
        const res = await this.send(`${resourceUrl(handle)}/actions/${provider.toLowerCase()}`, handle.id, {
          method: "POST",
          signal,
        });
        return this.mutationResult(provider, res);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async signer(): Promise<RequestSigner> {
    this.signerPromise ??= this.options.signer();
    try {
      return await this.signerPromise;
    } catch (error) {
      // a failed credential load is retried on the next call
      this.signerPromise = undefined;
      throw error;
    }
  }

  private async send(
    url: string,
    subject: string | undefined,
    opts: { method?: string; body?: unknown; query?: Record<string, string>; signal?: AbortSignal },
  ): Promise<OciResponse> {
    // same token on every attempt of one mutation
    const headers = opts.method && opts.method !== "GET" ? { "opc-retry-token": randomUUID() } : undefined;
    try {
      const sign = await this.signer();
      return await withOciRetry(
        () => ociRequest(url, sign, { ...opts, headers, timeoutMs: this.options.requestTimeoutMs }),
        this.options.retry,
        opts.signal,
      );
    } catch (error) {
      throw classifyApiError(error, subject);
    }
  }

  private async get(url: string, subject: string, signal?: AbortSignal): Promise<unknown> {
    const res = await this.send(url, subject, { signal });
    return res.data;
  }

  private async listAll(url: string, query: Record<string, string>, signal?: AbortSignal): Promise<unknown[]> {
    try {
      const sign = await this.signer();
      return await withOciRetry(
        () => ociList(url, sign, { query, signal, timeoutMs: this.options.requestTimeoutMs }),
        this.options.retry,
        signal,
      );
    } catch (error) {
      throw classifyApiError(error, query.compartmentId);
    }
  }

  private mutationResult(provider: string, res: OciResponse): MutationResult {
    return {
      providerAction: provider,
      workRequestId: res.opcWorkRequestId,
      requestId: res.opcRequestId,
    };
  }

  private toSummary(raw: unknown, handle: ResourceHandle): ResourceSummary {
    const resource = mapResource(raw, handle.kind, handle.region);
    if (!resource) throw new BackendRejectedError(`Unexpected response for ${handle.id}`);
    return resource;
  }

  private async dbNodes(
    handle: ResourceHandle,
    compartmentId: string | undefined,
    signal?: AbortSignal,
  ): Promise<Array<{ id: string; state: string }>> {
    let compartment = compartmentId ?? handle.compartmentId;
    if (!compartment) {
      const system = await this.get(resourceUrl(handle), handle.id, signal);
      compartment = isRecord(system) ? str(system, "compartmentId") : undefined;
    }
    if (!compartment) throw new BackendRejectedError(`Cannot resolve compartment of DB system ${handle.id}`);

    const raw = await this.listAll(`${endpoints.database(handle.region)}/dbNodes`, { compartmentId: compartment, dbSystemId: handle.id }, signal);
    const nodes: Array<{ id: string; state: string }> = [];
    for (const entry of raw) {
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

  /** VNICs that cannot be read are skipped; a failed lookup yields an empty list. */
  private async networkInterfaces(
    handle: ResourceHandle,
    compartmentId: string | undefined,
    signal?: AbortSignal,
  ): Promise<NetworkInterface[]> {
    if (!compartmentId) return [];

    let attachments: unknown[];
    try {
      attachments = await this.listAll(
        `${endpoints.core(handle.region)}/vnicAttachments`,
        { compartmentId, instanceId: handle.id },
        signal,
      );
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.warn(`Failed to get network info for ${handle.id}: ${errorMessage(error)}`);
      return [];
    }

    const interfaces: NetworkInterface[] = [];
    for (const attachment of attachments) {
      const vnicId = isRecord(attachment) ? str(attachment, "vnicId") : undefined;
      if (!vnicId) continue;
      try {
        const vnic = mapVnic(await this.get(`${endpoints.core(handle.region)}/vnics/${encodeURIComponent(vnicId)}`, vnicId, signal));
        if (vnic) interfaces.push(vnic);
      } catch (error) {
        if (signal?.aborted) throw error;
        this.logger.warn(`Failed to get VNIC details for ${vnicId}: ${errorMessage(error)}`);
      }
    }
    return sortInterfaces(interfaces);
  }
}
