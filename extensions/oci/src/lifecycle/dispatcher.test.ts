import { describe, it, expect, beforeEach } from "vitest";
import {
  BackendUnavailableError,
  InvalidRequestError,
  InvalidStateTransitionError,
  NoOpRequestError,
} from "../errors.js";
import { MemoryTransport, createOciLogger } from "../logging/index.js";
import { BackendSelector } from "../selector.js";
import {
  MOCK_REGION,
  MockExecutionBackend,
  mockAutonomousDatabase,
  mockInstance,
} from "../testing/mock-backend.js";
import type { ResourceHandle } from "../types.js";
import { LifecycleDispatcher, actionVariant, createAction, isEmptyScaling } from "./dispatcher.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");
const INSTANCE: ResourceHandle = { id: mockInstance().id, kind: "Instance", region: MOCK_REGION };
const ADB: ResourceHandle = { id: mockAutonomousDatabase().id, kind: "AutonomousDatabase", region: MOCK_REGION };

let primary: MockExecutionBackend;
let fallback: MockExecutionBackend;
let logs: MemoryTransport;
let dispatcher: LifecycleDispatcher;

beforeEach(() => {
  primary = new MockExecutionBackend({ resources: [mockInstance(), mockAutonomousDatabase()] });
  fallback = new MockExecutionBackend({ resources: [mockInstance(), mockAutonomousDatabase()] });
  logs = new MemoryTransport();
  const logger = createOciLogger("test", { transports: [logs] });
  dispatcher = new LifecycleDispatcher(new BackendSelector(primary, fallback, logger), logger, () => NOW);
});

// ===========================================================================
// Action construction
// ===========================================================================

describe("createAction", () => {
  it("defaults to the graceful variant and freezes the action", () => {
    const action = createAction({ kind: "STOP", resourceId: "r" });
    expect(action).toEqual({ kind: "STOP", resourceId: "r", softVariant: true, scaling: undefined });
    expect(Object.isFrozen(action)).toBe(true);
  });

  it("drops undefined scaling fields", () => {
    const action = createAction({ kind: "SCALE", resourceId: "r", scaling: { computeCount: 4, dataStorageSizeInTBs: undefined } });
    expect(action.scaling).toEqual({ computeCount: 4 });
  });

  it("rejects scaling parameters on other actions", () => {
    expect(() => createAction({ kind: "START", resourceId: "r", scaling: { computeCount: 2 } })).toThrow(
      "Scaling parameters are only valid for SCALE, not START",
    );
  });

  it("detects empty scaling", () => {
    expect(isEmptyScaling(undefined)).toBe(true);
    expect(isEmptyScaling({ computeCount: undefined })).toBe(true);
    expect(isEmptyScaling({ isAutoScalingEnabled: false })).toBe(false);
  });

  it("names the variant only where one exists", () => {
    expect(actionVariant("Instance", createAction({ kind: "STOP", resourceId: "r", softVariant: false }))).toBe("forced");
    expect(actionVariant("Instance", createAction({ kind: "RESTART", resourceId: "r" }))).toBe("graceful");
    expect(actionVariant("AutonomousDatabase", createAction({ kind: "RESTART", resourceId: "r" }))).toBeNull();
  });
});

// ===========================================================================
// Dispatch
// ===========================================================================

describe("LifecycleDispatcher", () => {
  it("reads state, validates and mutates", async () => {
    const result = await dispatcher.dispatch(INSTANCE, createAction({ kind: "STOP", resourceId: INSTANCE.id }));

    expect(result).toEqual({
      method: "PRIMARY",
      details: {
        resourceId: INSTANCE.id,
        resourceName: "web-1",
        kind: "Instance",
        action: "STOP",
        providerAction: "SOFTSTOP",
        variant: "graceful",
        previousState: "RUNNING",
        targetState: "STOPPED",
        workRequestId: "ocid1.workrequest.oc1..mock1",
        requestId: "mock-request-1",
        initiatedAt: "2026-03-01T12:00:00.000Z",
      },
    });
    expect(primary.calls.map((c) => c.operation)).toEqual(["currentState", "mutate"]);
  });

  it("uses the forced provider action", async () => {
    const result = await dispatcher.dispatch(
      INSTANCE,
      createAction({ kind: "RESTART", resourceId: INSTANCE.id, softVariant: false }),
    );
    expect(result.details.providerAction).toBe("RESET");
    expect(result.details.variant).toBe("forced");
  });

  it("rejects a transition from the wrong state without mutating", async () => {
    const error = await dispatcher
      .dispatch(INSTANCE, createAction({ kind: "START", resourceId: INSTANCE.id }))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvalidStateTransitionError);
    expect(error).toMatchObject({ method: "PRIMARY" });
    expect(primary.callsOf("mutate")).toHaveLength(0);
  });

  it("tags a rejected transition with the backend that read the state", async () => {
    primary.fail("currentState", new BackendUnavailableError("down"));
    await expect(
      dispatcher.dispatch(INSTANCE, createAction({ kind: "START", resourceId: INSTANCE.id })),
    ).rejects.toMatchObject({ code: "InvalidStateTransition", method: "FALLBACK" });
  });

  it("rejects unsupported pairs before any backend call", async () => {
    await expect(
      dispatcher.dispatch(INSTANCE, createAction({ kind: "SCALE", resourceId: INSTANCE.id, scaling: { computeCount: 2 } })),
    ).rejects.toBeInstanceOf(InvalidRequestError);
    expect(primary.calls).toHaveLength(0);
  });

  it("rejects a scale with no changes", async () => {
    await expect(
      dispatcher.dispatch(ADB, createAction({ kind: "SCALE", resourceId: ADB.id, scaling: {} })),
    ).rejects.toBeInstanceOf(NoOpRequestError);
    expect(primary.calls).toHaveLength(0);
  });

  it("rejects an action aimed at another resource", async () => {
    await expect(
      dispatcher.dispatch(INSTANCE, createAction({ kind: "STOP", resourceId: ADB.id })),
    ).rejects.toThrow(`Action targets ${ADB.id} but handle is ${INSTANCE.id}`);
  });

  it("records applied changes for a scale", async () => {
    const result = await dispatcher.dispatch(
      ADB,
      createAction({ kind: "SCALE", resourceId: ADB.id, scaling: { computeCount: 4 } }),
    );

    expect(result.details.providerAction).toBe("UPDATE");
    expect(result.details.variant).toBeNull();
    expect(result.details.appliedChanges).toEqual({ computeCount: 4 });
  });

  it("reports the fallback when the mutation falls back", async () => {
    primary.failOnce("mutate", new BackendUnavailableError("read ECONNRESET"));

    const result = await dispatcher.dispatch(INSTANCE, createAction({ kind: "STOP", resourceId: INSTANCE.id }));

    expect(result.method).toBe("FALLBACK");
    expect(result.details.workRequestId).toBe("ocid1.workrequest.oc1..mock1");
    expect(fallback.callsOf("mutate")).toHaveLength(1);
  });

  it("logs the initiation with method context", async () => {
    await dispatcher.dispatch(INSTANCE, createAction({ kind: "STOP", resourceId: INSTANCE.id }));
    const last = logs.entries[logs.entries.length - 1];
    expect(last?.message).toBe("Action initiated, work request ocid1.workrequest.oc1..mock1");
    expect(last?.method).toBe("PRIMARY");
    expect(last?.operation).toBe("STOP");
  });
});
