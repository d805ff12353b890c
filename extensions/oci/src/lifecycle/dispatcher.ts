/**
 * OCI Extension — Lifecycle Action Dispatcher
 *
 * Re-reads a resource's state, validates the requested transition against
 * it and issues the provider mutation. Dispatch never polls: the returned
 * work request id is handed to the tracker by the caller.
 */

import { hasSoftVariant, providerAction } from "../backends/mapping.js";
import { InvalidRequestError, NoOpRequestError, tagMethod } from "../errors.js";
import type { OciLogger } from "../logging/index.js";
import type { BackendSelector } from "../selector.js";
import type {
  Action,
  ActionKind,
  BackendMethod,
  LifecycleState,
  ResourceHandle,
  ResourceKind,
  ScalingParams,
} from "../types.js";
import { resolveTransition, validateTransition } from "./state-machine.js";

// =============================================================================
// Types
// =============================================================================

export type ActionVariant = "graceful" | "forced" | null;

export type ActionDetails = {
  resourceId: string;
  resourceName: string;
  kind: ResourceKind;
  action: ActionKind;
  providerAction: string;
  variant: ActionVariant;
  previousState: LifecycleState;
  targetState: LifecycleState;
  workRequestId?: string;
  requestId?: string;
  initiatedAt: string;
  appliedChanges?: ScalingParams;
};

export type DispatchResult = {
  details: ActionDetails;
  method: BackendMethod;
};

export type CreateActionInput = {
  kind: ActionKind;
  resourceId: string;
  softVariant?: boolean;
  scaling?: ScalingParams;
};

// =============================================================================
// Action Construction
// =============================================================================

function definedScaling(scaling: ScalingParams): ScalingParams {
  const result: ScalingParams = {};
  if (scaling.computeCount !== undefined) result.computeCount = scaling.computeCount;
  if (scaling.dataStorageSizeInTBs !== undefined) result.dataStorageSizeInTBs = scaling.dataStorageSizeInTBs;
  if (scaling.isAutoScalingEnabled !== undefined) result.isAutoScalingEnabled = scaling.isAutoScalingEnabled;
  if (scaling.isAutoScalingForStorageEnabled !== undefined) {
    result.isAutoScalingForStorageEnabled = scaling.isAutoScalingForStorageEnabled;
  }
  return result;
}

export function isEmptyScaling(scaling?: ScalingParams): boolean {
  return !scaling || Object.keys(definedScaling(scaling)).length === 0;
}

/** Build a frozen Action. `softVariant` defaults to true. */
export function createAction(input: CreateActionInput): Action {
  if (input.scaling && input.kind !== "SCALE") {
    throw new InvalidRequestError(`Scaling parameters are only valid for SCALE, not ${input.kind}`);
  }
  return Object.freeze({
    kind: input.kind,
    resourceId: input.resourceId,
    softVariant: input.softVariant ?? true,
    scaling: input.scaling ? Object.freeze(definedScaling(input.scaling)) : undefined,
  });
}

export function actionVariant(kind: ResourceKind, action: Action): ActionVariant {
  if (!hasSoftVariant(kind, action.kind)) return null;
  return action.softVariant ? "graceful" : "forced";
}

// =============================================================================
// Dispatcher
// =============================================================================

export class LifecycleDispatcher {
  private logger: OciLogger;

  constructor(
    private selector: BackendSelector,
    logger: OciLogger,
    private now: () => Date = () => new Date(),
  ) {
    this.logger = logger.child("dispatcher");
  }

  async dispatch(handle: ResourceHandle, action: Action, signal?: AbortSignal): Promise<DispatchResult> {
    if (action.resourceId !== handle.id) {
      throw new InvalidRequestError(`Action targets ${action.resourceId} but handle is ${handle.id}`);
    }
    resolveTransition(handle.kind, action.kind);
    if (action.kind === "SCALE" && isEmptyScaling(action.scaling)) throw new NoOpRequestError();

    const log = this.logger.withContext({ operation: action.kind, resourceId: handle.id });

    const { value: snapshot, method: readMethod } = await this.selector.execute(
      `read state of ${handle.id}`,
      (backend, s) => backend.currentState(handle, s),
      signal,
    );

    let targetState: LifecycleState;
    try {
      targetState = validateTransition(handle.kind, action.kind, snapshot.state, snapshot.resourceName).to;
    } catch (error) {
      throw tagMethod(error, readMethod);
    }

    log.info(`'${snapshot.resourceName}' is ${snapshot.state}; issuing ${providerAction(handle.kind, action.kind, action.softVariant)}`);

    const { value: result, method } = await this.selector.execute(
      `${action.kind} ${handle.id}`,
      (backend, s) => backend.mutate(handle, action, s),
      signal,
    );

    const details: ActionDetails = {
      resourceId: handle.id,
      resourceName: snapshot.resourceName,
      kind: handle.kind,
      action: action.kind,
      providerAction: result.providerAction,
      variant: actionVariant(handle.kind, action),
      previousState: snapshot.state,
      targetState,
      workRequestId: result.workRequestId,
      requestId: result.requestId,
      initiatedAt: this.now().toISOString(),
    };
    if (action.kind === "SCALE" && action.scaling) details.appliedChanges = { ...action.scaling };

    log.withContext({ method }).info(
      result.workRequestId ? `Action initiated, work request ${result.workRequestId}` : "Action initiated",
    );
    return { details, method };
  }
}
