/**
 * OCI Extension — Response Mapping
 *
 * Converts raw REST (camelCase) and CLI (kebab-case) payloads into the
 * normalized shapes shared by both backends.
 */

import { InvalidRequestError, OperationCancelledError, PartiallyAppliedError } from "../errors.js";
import type { ActionKind, LifecycleState, ResourceKind, WorkRequestStatus } from "../types.js";
import { LIFECYCLE_STATES } from "../types.js";
import type { AttributeValue, MutationResult, NetworkInterface, ResourceSummary } from "./types.js";

// =============================================================================
// Field Access
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** `availabilityDomain` → `availability-domain` */
export function kebabCase(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, "$1-$2").toLowerCase();
}

/** Read a field under its REST (camelCase) or CLI (kebab-case) name. */
export function field(record: Record<string, unknown>, name: string): unknown {
  if (name in record) return record[name];
  return record[kebabCase(name)];
}

export function str(record: Record<string, unknown>, name: string): string | undefined {
  const value = field(record, name);
  return typeof value === "string" ? value : undefined;
}

export function num(record: Record<string, unknown>, name: string): number | undefined {
  const value = field(record, name);
  return typeof value === "number" ? value : undefined;
}

export function bool(record: Record<string, unknown>, name: string): boolean | undefined {
  const value = field(record, name);
  return typeof value === "boolean" ? value : undefined;
}

// =============================================================================
// State Normalization
// =============================================================================

const STATE_ALIASES: Record<string, LifecycleState> = {
  SCALE_IN_PROGRESS: "SCALING",
  MAINTENANCE_IN_PROGRESS: "MAINTENANCE",
  CREATING_IMAGE: "UPDATING",
  MOVING: "UPDATING",
  UPGRADING: "UPDATING",
  BACKUP_IN_PROGRESS: "UPDATING",
  RESTORE_IN_PROGRESS: "UPDATING",
  AVAILABLE_NEEDS_ATTENTION: "AVAILABLE",
  NEEDS_ATTENTION: "AVAILABLE",
};

function isLifecycleState(value: string): value is LifecycleState {
  return LIFECYCLE_STATES.some((state) => state === value);
}

export function normalizeState(native: string | undefined): LifecycleState {
  if (!native) return "UNKNOWN";
  const upper = native.toUpperCase();
  if (isLifecycleState(upper)) return upper;
  return STATE_ALIASES[upper] ?? "UNKNOWN";
}

export function normalizeWorkRequestStatus(native: string | undefined): WorkRequestStatus {
  switch (native?.toUpperCase()) {
    case "ACCEPTED":
      return "ACCEPTED";
    case "IN_PROGRESS":
    case "CANCELING":
      return "IN_PROGRESS";
    case "SUCCEEDED":
      return "SUCCEEDED";
    case "FAILED":
    case "CANCELED":
      return "FAILED";
    default:
      return "UNKNOWN";
  }
}

/**
 * A DB system reports AVAILABLE while its nodes are powered off, so the
 * node states take precedence.
 */
export function deriveDbSystemState(
  systemNative: string,
  nodeNatives: string[],
): { state: LifecycleState; nativeState: string } {
  const nodes = nodeNatives.map((s) => s.toUpperCase());
  if (nodes.length > 0 && nodes.every((s) => s === "STOPPED")) {
    return { state: "STOPPED", nativeState: "STOPPED" };
  }
  for (const transitional of ["STOPPING", "STARTING"] as const) {
    if (nodes.includes(transitional)) return { state: transitional, nativeState: transitional };
  }
  return { state: normalizeState(systemNative), nativeState: systemNative };
}

// =============================================================================
// Provider Actions
// =============================================================================

/**
 * Issue a DB system action node by node. The first node's result stands for
 * the system. Once a node has accepted, a later failure becomes a
 * `PartiallyAppliedError` so the selector does not replay it on the fallback.
 */
export async function actionEachNode(
  dbSystemId: string,
  nodeIds: string[],
  provider: string,
  issue: (nodeId: string) => Promise<MutationResult>,
): Promise<MutationResult> {
  const actioned: string[] = [];
  let first: MutationResult | undefined;
  for (const nodeId of nodeIds) {
    try {
      const result = await issue(nodeId);
      first ??= result;
      actioned.push(nodeId);
    } catch (error) {
      if (actioned.length === 0 || error instanceof OperationCancelledError) throw error;
      throw new PartiallyAppliedError(dbSystemId, provider, actioned, first?.workRequestId, error);
    }
  }
  return first ?? { providerAction: provider };
}

/** Map a lifecycle action onto the provider's action name. */
export function providerAction(kind: ResourceKind, action: ActionKind, softVariant: boolean): string {
  if (action === "SCALE") {
    if (kind !== "AutonomousDatabase") throw new InvalidRequestError(`SCALE is not supported for ${kind}`);
    return "UPDATE";
  }
  if (action === "START") return "START";

  switch (kind) {
    case "Instance":
      if (action === "STOP") return softVariant ? "SOFTSTOP" : "STOP";
      return softVariant ? "SOFTRESET" : "RESET";
    case "DatabaseSystem":
      if (action === "STOP") return "STOP";
      return softVariant ? "SOFTRESET" : "RESET";
    case "AutonomousDatabase":
      return action;
  }
}

/** Whether the action has distinct graceful and forced provider variants. */
export function hasSoftVariant(kind: ResourceKind, action: ActionKind): boolean {
  if (kind === "Instance") return action === "STOP" || action === "RESTART";
  if (kind === "DatabaseSystem") return action === "RESTART";
  return false;
}

// =============================================================================
// Resource Mapping
// =============================================================================

function compact(entries: Record<string, AttributeValue | undefined>): Record<string, AttributeValue> {
  const result: Record<string, AttributeValue> = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

function stringMap(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isRecord(value)) return result;
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") result[key] = entry;
  }
  return result;
}

function kindAttributes(kind: ResourceKind, raw: Record<string, unknown>): Record<string, AttributeValue> {
  switch (kind) {
    case "Instance": {
      const shapeConfig = field(raw, "shapeConfig");
      const shape = isRecord(shapeConfig) ? shapeConfig : {};
      return compact({
        shape: str(raw, "shape"),
        faultDomain: str(raw, "faultDomain"),
        imageId: str(raw, "imageId"),
        ocpus: num(shape, "ocpus"),
        memoryInGBs: num(shape, "memoryInGBs"),
      });
    }
    case "DatabaseSystem":
      return compact({
        shape: str(raw, "shape"),
        databaseEdition: str(raw, "databaseEdition"),
        nodeCount: num(raw, "nodeCount"),
        cpuCoreCount: num(raw, "cpuCoreCount"),
        dataStorageSizeInGBs: num(raw, "dataStorageSizeInGBs"),
        hostname: str(raw, "hostname"),
        domain: str(raw, "domain"),
        version: str(raw, "version"),
      });
    case "AutonomousDatabase":
      return compact({
        dbName: str(raw, "dbName"),
        dbWorkload: str(raw, "dbWorkload"),
        dbVersion: str(raw, "dbVersion"),
        computeModel: str(raw, "computeModel"),
        computeCount: num(raw, "computeCount") ?? num(raw, "cpuCoreCount"),
        dataStorageSizeInTBs: num(raw, "dataStorageSizeInTBs"),
        isAutoScalingEnabled: bool(raw, "isAutoScalingEnabled"),
        isAutoScalingForStorageEnabled: bool(raw, "isAutoScalingForStorageEnabled"),
        isFreeTier: bool(raw, "isFreeTier"),
      });
  }
}

/** Returns undefined for payload entries without an id. */
export function mapResource(raw: unknown, kind: ResourceKind, region: string): ResourceSummary | undefined {
  if (!isRecord(raw)) return undefined;
  const id = str(raw, "id");
  if (!id) return undefined;

  const nativeState = str(raw, "lifecycleState") ?? "UNKNOWN";
  return {
    id,
    name: str(raw, "displayName") ?? str(raw, "dbName") ?? id,
    kind,
    lifecycleState: normalizeState(nativeState),
    nativeState,
    region,
    compartmentId: str(raw, "compartmentId"),
    availabilityDomain: str(raw, "availabilityDomain"),
    timeCreated: str(raw, "timeCreated"),
    attributes: kindAttributes(kind, raw),
    freeformTags: stringMap(field(raw, "freeformTags")),
  };
}

export function mapResources(raw: unknown[], kind: ResourceKind, region: string): ResourceSummary[] {
  const result: ResourceSummary[] = [];
  for (const entry of raw) {
    const mapped = mapResource(entry, kind, region);
    if (mapped) result.push(mapped);
  }
  return result;
}

export function filterByState(resources: ResourceSummary[], state?: LifecycleState): ResourceSummary[] {
  return state ? resources.filter((r) => r.lifecycleState === state) : resources;
}

export function mapVnic(raw: unknown): NetworkInterface | undefined {
  if (!isRecord(raw)) return undefined;
  const vnicId = str(raw, "id");
  if (!vnicId) return undefined;
  return {
    vnicId,
    displayName: str(raw, "displayName"),
    privateIp: str(raw, "privateIp"),
    publicIp: str(raw, "publicIp"),
    subnetId: str(raw, "subnetId"),
    hostnameLabel: str(raw, "hostnameLabel"),
    macAddress: str(raw, "macAddress"),
    isPrimary: bool(raw, "isPrimary") ?? false,
  };
}

/** Primary interface first, the rest in their original order. */
export function sortInterfaces(interfaces: NetworkInterface[]): NetworkInterface[] {
  return [...interfaces.filter((n) => n.isPrimary), ...interfaces.filter((n) => !n.isPrimary)];
}

// =============================================================================
// Scale Payload
// =============================================================================

export function scalePayload(scaling: {
  computeCount?: number;
  dataStorageSizeInTBs?: number;
  isAutoScalingEnabled?: boolean;
  isAutoScalingForStorageEnabled?: boolean;
}): Record<string, number | boolean> {
  const payload: Record<string, number | boolean> = {};
  if (scaling.computeCount !== undefined) payload.computeCount = scaling.computeCount;
  if (scaling.dataStorageSizeInTBs !== undefined) payload.dataStorageSizeInTBs = scaling.dataStorageSizeInTBs;
  if (scaling.isAutoScalingEnabled !== undefined) payload.isAutoScalingEnabled = scaling.isAutoScalingEnabled;
  if (scaling.isAutoScalingForStorageEnabled !== undefined) {
    payload.isAutoScalingForStorageEnabled = scaling.isAutoScalingForStorageEnabled;
  }
  return payload;
}
