/**
 * OCI Extension — Resource Handles
 *
 * Builds `ResourceHandle`s from caller input. The kind comes from the OCID
 * resource-type segment unless the caller names it.
 */

import { InvalidRequestError } from "./errors.js";
import { LIFECYCLE_STATES, RESOURCE_KINDS, type LifecycleState, type ResourceHandle, type ResourceKind } from "./types.js";

const OCID_KINDS: Record<string, ResourceKind> = {
  instance: "Instance",
  dbsystem: "DatabaseSystem",
  autonomousdatabase: "AutonomousDatabase",
};

const KIND_ALIASES: Record<string, ResourceKind> = {
  instance: "Instance",
  instances: "Instance",
  compute: "Instance",
  databasesystem: "DatabaseSystem",
  dbsystem: "DatabaseSystem",
  dbsystems: "DatabaseSystem",
  database: "DatabaseSystem",
  autonomousdatabase: "AutonomousDatabase",
  autonomousdatabases: "AutonomousDatabase",
  adb: "AutonomousDatabase",
};

/** `ocid1.instance.oc1.iad.xxx` → `Instance`; undefined when not recognized. */
export function inferKind(ocid: string): ResourceKind | undefined {
  const [prefix, type] = ocid.split(".");
  if (prefix !== "ocid1" || !type) return undefined;
  return OCID_KINDS[type.toLowerCase()];
}

export function parseResourceKind(value: string): ResourceKind {
  const exact = RESOURCE_KINDS.find((kind) => kind === value);
  if (exact) return exact;
  const alias = KIND_ALIASES[value.toLowerCase().replace(/[\s_-]/g, "")];
  if (alias) return alias;
  throw new InvalidRequestError(`Unknown resource kind '${value}'. Expected one of: ${RESOURCE_KINDS.join(", ")}`);
}

/** Case-insensitive; `running` → `RUNNING`. */
export function parseLifecycleState(value: string): LifecycleState {
  const upper = value.trim().toUpperCase();
  const state = LIFECYCLE_STATES.find((s) => s === upper);
  if (!state) throw new InvalidRequestError(`Unknown lifecycle state '${value}'`);
  return state;
}

export type HandleInput = {
  resourceId: string;
  kind?: ResourceKind;
  compartmentId?: string;
  region?: string;
};

export function createHandle(input: HandleInput, defaultRegion: string): ResourceHandle {
  const id = input.resourceId.trim();
  if (!id) throw new InvalidRequestError("resourceId is required");

  const kind = input.kind ?? inferKind(id);
  if (!kind) {
    throw new InvalidRequestError(`Cannot infer resource kind from '${id}'; pass kind explicitly`);
  }

  return Object.freeze({
    id,
    kind,
    compartmentId: input.compartmentId,
    region: input.region ?? defaultRegion,
  });
}
