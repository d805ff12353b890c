/**
 * OCI Extension — Error Taxonomy
 *
 * Every failure raised inside the execution layer is one of these classes.
 * Only `BackendUnavailableError` makes the backend selector try the fallback.
 */

import type { ActionKind, BackendMethod, LifecycleState, ResourceKind } from "./types.js";

export type OciErrorCode =
  | "BackendUnavailable"
  | "BackendRejected"
  | "InvalidStateTransition"
  | "NoOpRequest"
  | "ResourceNotFound"
  | "InvalidRequest"
  | "OperationCancelled"
  | "WorkRequestFailed"
  | "PartiallyApplied";

export type OciErrorOptions = {
  method?: BackendMethod;
  statusCode?: number;
  cause?: unknown;
};

export abstract class OciError extends Error {
  abstract readonly code: OciErrorCode;
  /** Backend that raised the error, set by the selector. */
  method?: BackendMethod;
  readonly statusCode?: number;

  constructor(message: string, options: OciErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.method = options.method;
    this.statusCode = options.statusCode;
  }
}

/** Transport, authentication or timeout failure. Eligible for fallback. */
export class BackendUnavailableError extends OciError {
  readonly code = "BackendUnavailable";

  constructor(message: string, options?: OciErrorOptions) {
    super(message, options);
    this.name = "BackendUnavailableError";
  }
}

/** Malformed, unauthorized or conflicting request. Never retried elsewhere. */
export class BackendRejectedError extends OciError {
  readonly code = "BackendRejected";

  constructor(message: string, options?: OciErrorOptions) {
    super(message, options);
    this.name = "BackendRejectedError";
  }
}

export class ResourceNotFoundError extends OciError {
  readonly code = "ResourceNotFound";

  constructor(public readonly resourceId: string, options?: OciErrorOptions) {
    super(`Resource ${resourceId} not found or not authorized`, options);
    this.name = "ResourceNotFoundError";
  }
}

export class InvalidStateTransitionError extends OciError {
  readonly code = "InvalidStateTransition";

  constructor(
    public readonly kind: ResourceKind,
    public readonly action: ActionKind,
    public readonly currentState: LifecycleState,
    public readonly allowedStates: readonly LifecycleState[],
    resourceName?: string,
  ) {
    const target = resourceName ? ` '${resourceName}'` : "";
    super(
      `Cannot ${action.toLowerCase()}${target}: current state is ${currentState}, expected ${allowedStates.join(" or ")}`,
    );
    this.name = "InvalidStateTransitionError";
  }
}

export class NoOpRequestError extends OciError {
  readonly code = "NoOpRequest";

  constructor(message = "Scale request specifies no changes") {
    super(message);
    this.name = "NoOpRequestError";
  }
}

/** Caller input that cannot be turned into a backend call. */
export class InvalidRequestError extends OciError {
  readonly code = "InvalidRequest";

  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

export class OperationCancelledError extends OciError {
  readonly code = "OperationCancelled";

  constructor(operation: string) {
    super(`Operation ${operation} was cancelled`);
    this.name = "OperationCancelledError";
  }
}

/** A tracked work request ended in FAILED (or was canceled by the provider). */
export class WorkRequestFailedError extends OciError {
  readonly code = "WorkRequestFailed";

  constructor(public readonly workRequestId: string) {
    super(`work request ${workRequestId} finished with status FAILED`);
    this.name = "WorkRequestFailedError";
  }
}

/**
 * A multi-node action failed after some nodes had already accepted it.
 * Never eligible for fallback: replaying would re-issue the accepted nodes.
 */
export class PartiallyAppliedError extends OciError {
  readonly code = "PartiallyApplied";

  constructor(
    public readonly resourceId: string,
    public readonly providerAction: string,
    public readonly actionedNodes: string[],
    public readonly workRequestId: string | undefined,
    cause: unknown,
  ) {
    super(
      `${providerAction} reached ${actionedNodes.length} node(s) of ${resourceId} (${actionedNodes.join(", ")})` +
        `${workRequestId ? `, first work request ${workRequestId}` : ""} before failing: ${errorMessage(cause)}`,
      { cause },
    );
    this.name = "PartiallyAppliedError";
  }
}

/** Tag an error with the backend that produced it, keeping an earlier tag. */
export function tagMethod(error: unknown, method: BackendMethod): unknown {
  if (error instanceof OciError && error.method === undefined) {
    error.method = method;
  }
  return error;
}

/** Best-effort message extraction for logs and envelopes. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
}
