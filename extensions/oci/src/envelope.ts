/**
 * OCI Extension — Response Envelope Builder
 *
 * Pure functions: identical inputs (including `retrievedAt`) give identical
 * envelopes. Summaries are always one or more complete sentences.
 */

import type { ResourceDetail } from "./backends/types.js";
import { OciError, errorMessage, type OciErrorCode } from "./errors.js";
import type { ActionDetails } from "./lifecycle/dispatcher.js";
import type { BackendMethod, LifecycleState, ResourceKind, WorkRequest } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type EnvelopeErrorCode = OciErrorCode | "InternalError";

export type SuccessEnvelope<T> = {
  success: true;
  summary: string;
  method: BackendMethod | null;
  data: T;
  retrievedAt: string;
};

export type FailureEnvelope = {
  success: false;
  summary: string;
  method: BackendMethod | null;
  error: string;
  errorCode: EnvelopeErrorCode;
  retrievedAt: string;
};

export type ResponseEnvelope<T> = SuccessEnvelope<T> | FailureEnvelope;

// =============================================================================
// Text Helpers
// =============================================================================

const KIND_LABELS: Record<ResourceKind, { one: string; many: string }> = {
  Instance: { one: "instance", many: "instances" },
  DatabaseSystem: { one: "DB system", many: "DB systems" },
  AutonomousDatabase: { one: "autonomous database", many: "autonomous databases" },
};

export function kindLabel(kind: ResourceKind, count = 1): string {
  return count === 1 ? KIND_LABELS[kind].one : KIND_LABELS[kind].many;
}

export function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/** Trim and terminate with a period unless already punctuated. */
export function ensureSentence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) return "Done.";
  return /[.!?]$/.test(trimmed) ? trimmed : `${trimmed}.`;
}

// =============================================================================
// Envelopes
// =============================================================================

export function successEnvelope<T>(
  summary: string,
  data: T,
  method: BackendMethod | null,
  retrievedAt: string,
): SuccessEnvelope<T> {
  return { success: true, summary: ensureSentence(summary), method, data, retrievedAt };
}

export function errorCodeOf(error: unknown): EnvelopeErrorCode {
  return error instanceof OciError ? error.code : "InternalError";
}

/**
 * Failure envelope for `operation` (e.g. "stop instance"). The method comes
 * from the error's backend tag unless given.
 */
export function failureEnvelope(
  operation: string,
  error: unknown,
  retrievedAt: string,
  method?: BackendMethod | null,
): FailureEnvelope {
  const message = errorMessage(error).replace(/[.\s]+$/, "");
  const tagged = error instanceof OciError ? error.method : undefined;
  return {
    success: false,
    summary: ensureSentence(`Failed to ${operation}: ${message}`),
    method: method === undefined ? (tagged ?? null) : method,
    error: message,
    errorCode: errorCodeOf(error),
    retrievedAt,
  };
}

// =============================================================================
// Summaries
// =============================================================================

export function summarizeAction(details: ActionDetails): string {
  const verb = details.action.toLowerCase();
  const prefix = details.variant === "graceful" ? "Graceful " : details.variant === "forced" ? "Forced " : "";
  const lead = prefix ? `${prefix}${verb}` : capitalize(verb);
  const workRequest = details.workRequestId ? ` - work request ${details.workRequestId}` : "";
  return `${lead} action initiated for ${kindLabel(details.kind)} '${details.resourceName}' (was ${details.previousState})${workRequest}.`;
}

export function summarizeList(count: number, kind: ResourceKind, region: string, state?: LifecycleState): string {
  const stateText = state ? `${state.toLowerCase()} ` : "";
  return `Found ${count} ${stateText}${kindLabel(kind, count)} in ${region}.`;
}

export function summarizeDescribe(resource: ResourceDetail): string {
  const shape = resource.attributes.shape;
  const shapeText = typeof shape === "string" ? ` (${shape})` : "";
  let text = `${capitalize(kindLabel(resource.kind))} '${resource.name}'${shapeText} is ${resource.lifecycleState.toLowerCase()}`;

  const primary = resource.networkInterfaces.find((n) => n.isPrimary) ?? resource.networkInterfaces[0];
  if (primary?.privateIp) {
    text += ` with private IP ${primary.privateIp}`;
    if (primary.publicIp) text += ` and public IP ${primary.publicIp}`;
  }
  return `${text}.`;
}

export function summarizeState(kind: ResourceKind, name: string, state: LifecycleState): string {
  return `${capitalize(kindLabel(kind))} '${name}' is currently ${state}.`;
}

export function summarizeWorkRequest(workRequest: WorkRequest): string {
  const percent = workRequest.percentComplete !== undefined ? ` (${workRequest.percentComplete}% complete)` : "";
  return `Work request ${workRequest.workRequestId} is ${workRequest.status}${percent}.`;
}

/** Appended to an action summary once the tracker has an outcome. */
export function summarizeCompletion(workRequest: WorkRequest, currentState?: LifecycleState): string {
  switch (workRequest.status) {
    case "SUCCEEDED":
      return currentState
        ? `Work request succeeded; current state is ${currentState}.`
        : "Work request succeeded.";
    case "UNKNOWN":
      return `Completion is unconfirmed after ${workRequest.polls} polls.`;
    default:
      return `Work request is ${workRequest.status}.`;
  }
}
