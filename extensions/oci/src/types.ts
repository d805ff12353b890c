/**
 * OCI Extension — Shared Types
 *
 * Core type definitions used across the execution backends, the lifecycle
 * dispatcher, the work-request tracker and the tool surface.
 */

// =============================================================================
// Resource Kinds
// =============================================================================

export const RESOURCE_KINDS = ["Instance", "DatabaseSystem", "AutonomousDatabase"] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

// =============================================================================
// Lifecycle States
// =============================================================================

/**
 * Normalized lifecycle states. Provider values that have no direct
 * counterpart are folded into the closest state (see `normalizeState`).
 */
export const LIFECYCLE_STATES = [
  "PROVISIONING",
  "RUNNING",
  "STOPPING",
  "STOPPED",
  "STARTING",
  "TERMINATING",
  "TERMINATED",
  "AVAILABLE",
  "UPDATING",
  "SCALING",
  "RESTARTING",
  "UNAVAILABLE",
  "MAINTENANCE",
  "FAILED",
  "UNKNOWN",
] as const;

export type LifecycleState = (typeof LIFECYCLE_STATES)[number];

// =============================================================================
// Resource Handles
// =============================================================================

/** Identifies a managed resource for the duration of a single operation. */
export type ResourceHandle = Readonly<{
  id: string;
  kind: ResourceKind;
  compartmentId?: string;
  region: string;
}>;

// =============================================================================
// Actions
// =============================================================================

export const ACTION_KINDS = ["START", "STOP", "RESTART", "SCALE"] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export type ScalingParams = {
  computeCount?: number;
  dataStorageSizeInTBs?: number;
  isAutoScalingEnabled?: boolean;
  isAutoScalingForStorageEnabled?: boolean;
};

export type Action = Readonly<{
  kind: ActionKind;
  resourceId: string;
  softVariant: boolean;
  scaling?: Readonly<ScalingParams>;
}>;

// =============================================================================
// Backend Selection
// =============================================================================

/** Which execution backend ultimately served a call. */
export type BackendMethod = "PRIMARY" | "FALLBACK";

// =============================================================================
// Work Requests
// =============================================================================

export type WorkRequestStatus = "ACCEPTED" | "IN_PROGRESS" | "SUCCEEDED" | "FAILED" | "UNKNOWN";

export type WorkRequest = {
  workRequestId: string;
  status: WorkRequestStatus;
  issuedAt: string;
  lastPolledAt?: string;
  percentComplete?: number;
  polls: number;
};

// =============================================================================
// Common Configuration
// =============================================================================

export type OciRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

export type WorkRequestTrackerOptions = {
  maxPolls: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
};
