/**
 * OCI Extension — Execution Backend Contract
 *
 * Both the signed REST backend (primary) and the CLI backend (fallback)
 * implement `ExecutionBackend` and return the same normalized shapes.
 */

import type {
  Action,
  LifecycleState,
  ResourceHandle,
  ResourceKind,
  WorkRequestStatus,
} from "../types.js";

// =============================================================================
// Query & Result Types
// =============================================================================

export type ListQuery = {
  kind: ResourceKind;
  compartmentId: string;
  region: string;
  lifecycleState?: LifecycleState;
};

export type AttributeValue = string | number | boolean | null;

export type ResourceSummary = {
  id: string;
  name: string;
  kind: ResourceKind;
  lifecycleState: LifecycleState;
  nativeState: string;
  region: string;
  compartmentId?: string;
  availabilityDomain?: string;
  timeCreated?: string;
  /** Kind-specific fields (shape, node count, compute count, ...). */
  attributes: Record<string, AttributeValue>;
  freeformTags: Record<string, string>;
};

export type NetworkInterface = {
  vnicId: string;
  displayName?: string;
  privateIp?: string;
  publicIp?: string;
  subnetId?: string;
  hostnameLabel?: string;
  macAddress?: string;
  isPrimary: boolean;
};

export type ResourceDetail = ResourceSummary & {
  networkInterfaces: NetworkInterface[];
  networkInfoIncluded: boolean;
};

export type StateSnapshot = {
  state: LifecycleState;
  nativeState: string;
  resourceName: string;
};

export type MutationResult = {
  providerAction: string;
  workRequestId?: string;
  requestId?: string;
};

export type WorkRequestPoll = {
  status: WorkRequestStatus;
  percentComplete?: number;
  timeAccepted?: string;
};

export type DescribeOptions = {
  includeNetwork?: boolean;
  signal?: AbortSignal;
};

// =============================================================================
// Backend Interface
// =============================================================================

export interface ExecutionBackend {
  readonly name: string;

  list(query: ListQuery, signal?: AbortSignal): Promise<ResourceSummary[]>;
  describe(handle: ResourceHandle, options?: DescribeOptions): Promise<ResourceDetail>;
  /** Always a fresh read; never cached. */
  currentState(handle: ResourceHandle, signal?: AbortSignal): Promise<StateSnapshot>;
  mutate(handle: ResourceHandle, action: Action, signal?: AbortSignal): Promise<MutationResult>;
  getWorkRequest(workRequestId: string, region: string, signal?: AbortSignal): Promise<WorkRequestPoll>;
  /** Cheap reachability probe; resolves when the backend can serve calls. */
  ping(region: string, signal?: AbortSignal): Promise<void>;
}
