import { describe, it, expect, vi, beforeEach, type MockInstance } from "vitest";
import { OciCLIWrapper, type OciCLIResult } from "../cli/wrapper.js";
import {
  BackendRejectedError,
  BackendUnavailableError,
  OperationCancelledError,
  PartiallyAppliedError,
  ResourceNotFoundError,
} from "../errors.js";
import { MemoryTransport, createOciLogger } from "../logging/index.js";
import { CliBackend, classifyCliFailure, parseServiceError, scaleArgs } from "./cli-backend.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function ok(parsed: unknown): OciCLIResult {
  return { success: true, stdout: JSON.stringify(parsed), stderr: "", exitCode: 0, parsed, timedOut: false, cancelled: false };
}

function failed(overrides: Partial<OciCLIResult> = {}): OciCLIResult {
  return { success: false, stdout: "", stderr: "", exitCode: 1, timedOut: false, cancelled: false, ...overrides };
}

function serviceError(status: number, code: string, message: string): string {
  return `ServiceError:\n${JSON.stringify({ status, code, message, "opc-request-id": "req-1" }, null, 2)}\n`;
}

const REGION = "us-ashburn-1";
const INSTANCE = { id: "ocid1.instance.oc1.iad.a", kind: "Instance", region: REGION } as const;
const DB_SYSTEM = {
  id: "ocid1.dbsystem.oc1.iad.d",
  kind: "DatabaseSystem",
  region: REGION,
  compartmentId: "ocid1.compartment.oc1..c",
} as const;
const ADB = { id: "ocid1.autonomousdatabase.oc1.iad.b", kind: "AutonomousDatabase", region: REGION } as const;

let cli: OciCLIWrapper;
let execute: MockInstance<OciCLIWrapper["execute"]>;
let logs: MemoryTransport;
let backend: CliBackend;

/** Answer each command by the first matching prefix. */
function route(table: Array<[string, OciCLIResult]>): void {
  execute.mockImplementation(async (args) => {
    const command = args.join(" ");
    const hit = table.find(([prefix]) => command.startsWith(prefix));
    if (!hit) throw new Error(`unexpected command: ${command}`);
    return hit[1];
  });
}

function commands(): string[] {
  return execute.mock.calls.map(([args]) => args.join(" "));
}

beforeEach(() => {
  cli = new OciCLIWrapper();
  execute = vi.spyOn(cli, "execute");
  logs = new MemoryTransport();
  backend = new CliBackend(cli, createOciLogger("test", { level: "debug", transports: [logs] }));
});

// ===========================================================================
// Error classification
// ===========================================================================

describe("parseServiceError", () => {
  it("extracts status, code and message", () => {
    expect(parseServiceError(serviceError(404, "NotAuthorizedOrNotFound", "Authorization failed"))).toEqual({
      status: 404,
      code: "NotAuthorizedOrNotFound",
      message: "Authorization failed",
    });
  });

  it("returns undefined without the marker", () => {
    expect(parseServiceError("Error: Missing option")).toBeUndefined();
  });

  it("returns an empty object for an unreadable body", () => {
    expect(parseServiceError("ServiceError: {not json}")).toEqual({});
  });
});

describe("classifyCliFailure", () => {
  it("maps cancellation first", () => {
    const error = classifyCliFailure(failed({ cancelled: true, timedOut: true }), "list Instance");
    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(error.message).toBe("Operation list Instance was cancelled");
  });

  it("maps a missing binary to BackendUnavailable", () => {
    const error = classifyCliFailure(failed({ errorCode: "ENOENT" }), "ping");
    expect(error).toBeInstanceOf(BackendUnavailableError);
    expect(error.message).toBe("oci CLI not found on PATH");
  });

  it("maps a timeout to BackendUnavailable", () => {
    expect(classifyCliFailure(failed({ timedOut: true }), "get Instance").message).toBe(
      "oci CLI timed out during get Instance",
    );
  });

  it("maps service errors by status", () => {
    const notFound = classifyCliFailure(failed({ stderr: serviceError(404, "NotAuthorizedOrNotFound", "x") }), "get", "ocid1.x");
    expect(notFound).toBeInstanceOf(ResourceNotFoundError);
    expect(notFound.message).toBe("Resource ocid1.x not found or not authorized");
    expect(notFound.statusCode).toBe(404);

    const auth = classifyCliFailure(failed({ stderr: serviceError(401, "NotAuthenticated", "bad key") }), "get");
    expect(auth).toBeInstanceOf(BackendUnavailableError);
    expect(auth.message).toBe("Authentication failed (NotAuthenticated: bad key)");

    const throttled = classifyCliFailure(failed({ stderr: serviceError(429, "TooManyRequests", "slow down") }), "get");
    expect(throttled).toBeInstanceOf(BackendUnavailableError);

    const conflict = classifyCliFailure(failed({ stderr: serviceError(409, "IncorrectState", "busy") }), "STOP instance");
    expect(conflict).toBeInstanceOf(BackendRejectedError);
    expect(conflict.message).toBe("IncorrectState: busy");
  });

  it("maps a usage error to BackendRejected", () => {
    const error = classifyCliFailure(failed({ exitCode: 2, stderr: "Error: No such option: --bogus\nUsage: oci" }), "list Instance");
    expect(error).toBeInstanceOf(BackendRejectedError);
    expect(error.message).toBe("oci CLI rejected list Instance: Error: No such option: --bogus");
  });

  it("treats anything else as unavailable", () => {
    const error = classifyCliFailure(failed({ stderr: "connection reset\nmore" }), "ping");
    expect(error).toBeInstanceOf(BackendUnavailableError);
    expect(error.message).toBe("oci CLI failed during ping: connection reset");
  });
});

describe("scaleArgs", () => {
  it("emits only provided flags", () => {
    expect(scaleArgs({ computeCount: 4, isAutoScalingEnabled: false })).toEqual([
      "--compute-count",
      "4",
      "--is-auto-scaling-enabled",
      "false",
    ]);
  });
});

// ===========================================================================
// Reads
// ===========================================================================

describe("CliBackend reads", () => {
  it("lists resources and filters by state", async () => {
    route([
      [
        "compute instance list",
        ok({
          data: [
            { id: "i1", "display-name": "web-1", "lifecycle-state": "RUNNING" },
            { id: "i2", "display-name": "web-2", "lifecycle-state": "STOPPED" },
          ],
        }),
      ],
    ]);

    const result = await backend.list({
      kind: "Instance",
      compartmentId: "ocid1.compartment.oc1..c",
      region: REGION,
      lifecycleState: "STOPPED",
    });

    expect(result.map((r) => r.name)).toEqual(["web-2"]);
    expect(commands()).toEqual([
      "compute instance list --compartment-id ocid1.compartment.oc1..c --all --region us-ashburn-1",
    ]);
  });

  it("reads empty output as an empty list", async () => {
    route([["db autonomous-database list", { ...ok(undefined), stdout: "" }]]);
    const result = await backend.list({ kind: "AutonomousDatabase", compartmentId: "c", region: REGION });
    expect(result).toEqual([]);
  });

  it("describes an instance with its VNICs, primary first", async () => {
    route([
      ["compute instance get", ok({ data: { id: INSTANCE.id, "display-name": "web-1", "lifecycle-state": "RUNNING" } })],
      [
        "compute instance list-vnics",
        ok({
          data: [
            { id: "v2", "private-ip": "10.0.1.9", "is-primary": false },
            { id: "v1", "private-ip": "10.0.0.5", "public-ip": "203.0.113.10", "is-primary": true },
          ],
        }),
      ],
    ]);

    const detail = await backend.describe(INSTANCE);

    expect(detail.networkInfoIncluded).toBe(true);
    expect(detail.networkInterfaces.map((n) => n.vnicId)).toEqual(["v1", "v2"]);
    expect(detail.networkInterfaces[0]?.publicIp).toBe("203.0.113.10");
    expect(commands()[0]).toBe(`compute instance get --instance-id ${INSTANCE.id} --region us-ashburn-1`);
  });

  it("keeps the description when the VNIC lookup fails", async () => {
    route([
      ["compute instance get", ok({ data: { id: INSTANCE.id, "lifecycle-state": "RUNNING" } })],
      ["compute instance list-vnics", failed({ stderr: serviceError(500, "InternalError", "boom") })],
    ]);

    const detail = await backend.describe(INSTANCE);

    expect(detail.networkInterfaces).toEqual([]);
    expect(detail.networkInfoIncluded).toBe(true);
    expect(logs.entries.map((e) => e.message)).toContain(
      `Failed to get network info for ${INSTANCE.id}: InternalError: boom`,
    );
  });

  it("skips VNICs when network info is not requested", async () => {
    route([["compute instance get", ok({ data: { id: INSTANCE.id, "lifecycle-state": "RUNNING" } })]]);
    const detail = await backend.describe(INSTANCE, { includeNetwork: false });
    expect(detail.networkInfoIncluded).toBe(false);
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it("derives a DB system state from its nodes", async () => {
    route([
      [
        "db system get",
        ok({ data: { id: DB_SYSTEM.id, "display-name": "orders-db", "lifecycle-state": "AVAILABLE", "compartment-id": DB_SYSTEM.compartmentId } }),
      ],
      ["db node list", ok({ data: [{ id: "n1", "lifecycle-state": "STOPPED" }] })],
    ]);

    expect(await backend.currentState(DB_SYSTEM)).toEqual({
      state: "STOPPED",
      nativeState: "STOPPED",
      resourceName: "orders-db",
    });
    expect(commands()[1]).toBe(
      `db node list --compartment-id ${DB_SYSTEM.compartmentId} --db-system-id ${DB_SYSTEM.id} --all --region us-ashburn-1`,
    );
  });

  it("reads a work request", async () => {
    route([
      [
        "work-requests work-request get",
        ok({ data: { status: "IN_PROGRESS", "percent-complete": 40, "time-accepted": "2026-03-01T12:00:00Z" } }),
      ],
    ]);

    expect(await backend.getWorkRequest("ocid1.workrequest.x", REGION)).toEqual({
      status: "IN_PROGRESS",
      percentComplete: 40,
      timeAccepted: "2026-03-01T12:00:00Z",
    });
  });

  it("pings with a region listing", async () => {
    route([["iam region list", ok({ data: [] })]]);
    await backend.ping(REGION);
    expect(commands()).toEqual(["iam region list --region us-ashburn-1"]);
  });

  it("throws ResourceNotFound for a missing resource", async () => {
    route([["compute instance get", failed({ stderr: serviceError(404, "NotAuthorizedOrNotFound", "nope") })]]);
    await expect(backend.currentState(INSTANCE)).rejects.toBeInstanceOf(ResourceNotFoundError);
  });
});

// ===========================================================================
// Mutations
// ===========================================================================

describe("CliBackend mutations", () => {
  it("runs an instance action and reads the work request id", async () => {
    route([
      [
        "compute instance action",
        ok({ data: { id: INSTANCE.id }, "opc-work-request-id": "ocid1.workrequest.w1", "opc-request-id": "req-7" }),
      ],
    ]);

    const result = await backend.mutate(INSTANCE, { kind: "STOP", resourceId: INSTANCE.id, softVariant: true });

    expect(result).toEqual({ providerAction: "SOFTSTOP", workRequestId: "ocid1.workrequest.w1", requestId: "req-7" });
    expect(commands()).toEqual([
      `compute instance action --instance-id ${INSTANCE.id} --action SOFTSTOP --region us-ashburn-1`,
    ]);
  });

  it("applies a DB system action to every node", async () => {
    route([
      ["db node list", ok({ data: [{ id: "n1", "lifecycle-state": "AVAILABLE" }, { id: "n2", "lifecycle-state": "AVAILABLE" }] })],
      ["db node soft-reset --db-node-id n1", ok({ "opc-work-request-id": "wr-n1" })],
      ["db node soft-reset --db-node-id n2", ok({ "opc-work-request-id": "wr-n2" })],
    ]);

    const result = await backend.mutate(DB_SYSTEM, { kind: "RESTART", resourceId: DB_SYSTEM.id, softVariant: true });

    expect(result).toEqual({ providerAction: "SOFTRESET", workRequestId: "wr-n1", requestId: undefined });
    expect(commands().slice(1)).toEqual([
      "db node soft-reset --db-node-id n1 --region us-ashburn-1",
      "db node soft-reset --db-node-id n2 --region us-ashburn-1",
    ]);
  });

  it("reports a DB system action that stopped after the first node as partially applied", async () => {
    route([
      ["db node list", ok({ data: [{ id: "n1", "lifecycle-state": "AVAILABLE" }, { id: "n2", "lifecycle-state": "AVAILABLE" }] })],
      ["db node stop --db-node-id n1", ok({ "opc-work-request-id": "wr-n1" })],
      ["db node stop --db-node-id n2", failed({ timedOut: true })],
    ]);

    const error = await backend
      .mutate(DB_SYSTEM, { kind: "STOP", resourceId: DB_SYSTEM.id, softVariant: false })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PartiallyAppliedError);
    expect(error).toMatchObject({ actionedNodes: ["n1"], workRequestId: "wr-n1", providerAction: "STOP" });
    expect(error instanceof PartiallyAppliedError && error.cause).toBeInstanceOf(BackendUnavailableError);
  });

  it("rejects a DB system action without nodes", async () => {
    route([["db node list", ok({ data: [] })]]);
    await expect(
      backend.mutate(DB_SYSTEM, { kind: "STOP", resourceId: DB_SYSTEM.id, softVariant: false }),
    ).rejects.toThrow(`DB system ${DB_SYSTEM.id} has no DB nodes to stop`);
  });

  it("scales an autonomous database with --force", async () => {
    route([["db autonomous-database update", ok({ "opc-work-request-id": "wr-scale" })]]);

    const result = await backend.mutate(ADB, {
      kind: "SCALE",
      resourceId: ADB.id,
      softVariant: true,
      scaling: { computeCount: 4 },
    });

    expect(result.providerAction).toBe("UPDATE");
    expect(result.workRequestId).toBe("wr-scale");
    expect(commands()).toEqual([
      `db autonomous-database update --autonomous-database-id ${ADB.id} --region us-ashburn-1 --compute-count 4 --force`,
    ]);
  });

  it("starts an autonomous database", async () => {
    route([["db autonomous-database start", ok({ data: { id: ADB.id } })]]);
    const result = await backend.mutate(ADB, { kind: "START", resourceId: ADB.id, softVariant: true });
    expect(result).toEqual({ providerAction: "START", workRequestId: undefined, requestId: undefined });
    expect(commands()).toEqual([`db autonomous-database start --autonomous-database-id ${ADB.id} --region us-ashburn-1`]);
  });

  it("surfaces cancellation", async () => {
    route([["compute instance action", failed({ cancelled: true })]]);
    await expect(
      backend.mutate(INSTANCE, { kind: "START", resourceId: INSTANCE.id, softVariant: true }),
    ).rejects.toBeInstanceOf(OperationCancelledError);
  });
});
