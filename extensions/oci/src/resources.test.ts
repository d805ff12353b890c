import { describe, it, expect } from "vitest";
import { InvalidRequestError } from "./errors.js";
import { createHandle, inferKind, parseLifecycleState, parseResourceKind } from "./resources.js";

describe("inferKind", () => {
  it("reads the OCID resource type", () => {
    expect(inferKind("ocid1.instance.oc1.iad.abc")).toBe("Instance");
    expect(inferKind("ocid1.dbsystem.oc1.iad.abc")).toBe("DatabaseSystem");
    expect(inferKind("ocid1.autonomousdatabase.oc1.iad.abc")).toBe("AutonomousDatabase");
  });

  it("returns undefined for other types and malformed ids", () => {
    expect(inferKind("ocid1.vcn.oc1.iad.abc")).toBeUndefined();
    expect(inferKind("not-an-ocid")).toBeUndefined();
  });
});

describe("parseResourceKind", () => {
  it("accepts canonical names and aliases", () => {
    expect(parseResourceKind("DatabaseSystem")).toBe("DatabaseSystem");
    expect(parseResourceKind("db_system")).toBe("DatabaseSystem");
    expect(parseResourceKind("ADB")).toBe("AutonomousDatabase");
    expect(parseResourceKind("instances")).toBe("Instance");
  });

  it("rejects unknown kinds", () => {
    expect(() => parseResourceKind("bucket")).toThrow(
      "Unknown resource kind 'bucket'. Expected one of: Instance, DatabaseSystem, AutonomousDatabase",
    );
  });
});

describe("parseLifecycleState", () => {
  it("is case-insensitive", () => {
    expect(parseLifecycleState("running")).toBe("RUNNING");
    expect(parseLifecycleState(" Stopped ")).toBe("STOPPED");
  });

  it("rejects unknown states", () => {
    expect(() => parseLifecycleState("asleep")).toThrow("Unknown lifecycle state 'asleep'");
  });
});

describe("createHandle", () => {
  it("infers the kind and defaults the region", () => {
    const handle = createHandle({ resourceId: " ocid1.instance.oc1.iad.abc " }, "us-ashburn-1");
    expect(handle).toEqual({
      id: "ocid1.instance.oc1.iad.abc",
      kind: "Instance",
      compartmentId: undefined,
      region: "us-ashburn-1",
    });
    expect(Object.isFrozen(handle)).toBe(true);
  });

  it("prefers an explicit kind and region", () => {
    const handle = createHandle(
      { resourceId: "legacy-id", kind: "DatabaseSystem", region: "eu-frankfurt-1" },
      "us-ashburn-1",
    );
    expect(handle.kind).toBe("DatabaseSystem");
    expect(handle.region).toBe("eu-frankfurt-1");
  });

  it("requires a resource id", () => {
    expect(() => createHandle({ resourceId: "  " }, "r")).toThrow(InvalidRequestError);
  });

  it("requires a kind it can infer", () => {
    expect(() => createHandle({ resourceId: "ocid1.vcn.oc1.iad.abc" }, "r")).toThrow(
      "Cannot infer resource kind from 'ocid1.vcn.oc1.iad.abc'; pass kind explicitly",
    );
  });
});
