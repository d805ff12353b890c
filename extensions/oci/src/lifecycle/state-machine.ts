/**
 * OCI Extension — Lifecycle Transition Table
 */

import { InvalidRequestError, InvalidStateTransitionError } from "../errors.js";
import type { ActionKind, LifecycleState, ResourceKind } from "../types.js";

export type Transition = {
  from: readonly LifecycleState[];
  to: LifecycleState;
};

type TransitionTable = Record<ResourceKind, Partial<Record<ActionKind, Transition>>>;

export const TRANSITIONS: TransitionTable = {
  Instance: {
    START: { from: ["STOPPED"], to: "RUNNING" },
    STOP: { from: ["RUNNING"], to: "STOPPED" },
    RESTART: { from: ["RUNNING"], to: "RUNNING" },
  },
  DatabaseSystem: {
    START: { from: ["STOPPED"], to: "AVAILABLE" },
    STOP: { from: ["AVAILABLE"], to: "STOPPED" },
    RESTART: { from: ["AVAILABLE"], to: "AVAILABLE" },
  },
  AutonomousDatabase: {
    START: { from: ["STOPPED"], to: "AVAILABLE" },
    STOP: { from: ["AVAILABLE"], to: "STOPPED" },
    RESTART: { from: ["AVAILABLE"], to: "AVAILABLE" },
    SCALE: { from: ["AVAILABLE"], to: "AVAILABLE" },
  },
};

/** Throws `InvalidRequest` for pairs the table does not define. */
export function resolveTransition(kind: ResourceKind, action: ActionKind): Transition {
  const transition = TRANSITIONS[kind][action];
  if (!transition) throw new InvalidRequestError(`${action} is not supported for ${kind}`);
  return transition;
}

export function validateTransition(
  kind: ResourceKind,
  action: ActionKind,
  current: LifecycleState,
  resourceName?: string,
): Transition {
  const transition = resolveTransition(kind, action);
  if (!transition.from.includes(current)) {
    throw new InvalidStateTransitionError(kind, action, current, transition.from, resourceName);
  }
  return transition;
}
