/**
 * OCI Tool Registry
 *
 * Collects the lifecycle tools into a plain registry used by the MCP server.
 * Every tool answers with a response envelope serialized as JSON text.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { failureEnvelope, type ResponseEnvelope } from "../envelope.js";
import { InvalidRequestError } from "../errors.js";
import { parseLifecycleState, parseResourceKind } from "../resources.js";
import type { OciCoreService } from "../service.js";

// =============================================================================
// Types
// =============================================================================

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  details?: unknown;
  isError: boolean;
};

export type ToolDefinition = {
  name: string;
  label: string;
  description: string;
  parameters: TSchema;
  execute: (params: Record<string, unknown>, signal?: AbortSignal) => Promise<ToolResult>;
};

export type ToolRegistryDeps = {
  service: OciCoreService;
  now?: () => Date;
};

// =============================================================================
// Shared Parameters
// =============================================================================

const KIND_DESCRIPTION = "Resource kind: Instance, DatabaseSystem or AutonomousDatabase";

const resourceId = Type.String({ description: "OCID of the resource", minLength: 1 });
const kind = Type.Optional(Type.String({ description: `${KIND_DESCRIPTION} (inferred from the OCID when omitted)` }));
const compartmentId = Type.Optional(
  Type.String({ description: "Compartment OCID (defaults to OCI_COMPARTMENT_ID or the tenancy)" }),
);
const lifecycleState = Type.Optional(Type.String({ description: "Lifecycle state filter, e.g. RUNNING or AVAILABLE" }));
const region = Type.Optional(Type.String({ description: "Region override, e.g. us-ashburn-1" }));
const waitForCompletion = Type.Optional(
  Type.Boolean({ description: "Poll the work request until it finishes (bounded)" }),
);

const lifecycleParameters = Type.Object({
  resourceId,
  kind,
  compartmentId,
  softVariant: Type.Optional(
    Type.Boolean({ description: "Graceful variant (SOFTSTOP/SOFTRESET) when true, forced when false. Default true" }),
  ),
  waitForCompletion,
  region,
});

// =============================================================================
// Helpers
// =============================================================================

function envelopeResult(envelope: ResponseEnvelope<unknown>): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(envelope, null, 2) }],
    details: envelope,
    isError: !envelope.success,
  };
}

function optionalKind(value: string | undefined) {
  return value === undefined ? undefined : parseResourceKind(value);
}

function optionalState(value: string | undefined) {
  return value === undefined ? undefined : parseLifecycleState(value);
}

// =============================================================================
// Registry Builder
// =============================================================================

/**
 * Build the tool registry. Returns tool definitions bound to the service.
 */
export function buildToolRegistry(deps: ToolRegistryDeps): ToolDefinition[] {
  const { service } = deps;
  const now = deps.now ?? (() => new Date());
  const tools: ToolDefinition[] = [];

  const add = <S extends TSchema>(tool: {
    name: string;
    label: string;
    description: string;
    parameters: S;
    run: (params: Static<S>, signal?: AbortSignal) => Promise<ResponseEnvelope<unknown>>;
  }) => {
    const operation = tool.label.toLowerCase();
    tools.push({
      name: tool.name,
      label: tool.label,
      description: tool.description,
      parameters: tool.parameters,
      async execute(params, signal) {
        try {
          if (!Value.Check(tool.parameters, params)) {
            const problems = [...Value.Errors(tool.parameters, params)].map((e) => `${e.path || "/"} ${e.message}`);
            throw new InvalidRequestError(`Invalid parameters: ${problems.join("; ")}`);
          }
          return envelopeResult(await tool.run(params, signal));
        } catch (error) {
          return envelopeResult(failureEnvelope(operation, error, now().toISOString(), null));
        }
      },
    });
  };

  // ─── Queries ────────────────────────────────────────────────────────
  add({
    name: "oci_list_resources",
    label: "List resources",
    description:
      "List compute instances, DB systems or autonomous databases in a compartment, " +
      "optionally filtered by lifecycle state.",
    parameters: Type.Object({
      kind: Type.String({ description: KIND_DESCRIPTION }),
      compartmentId,
      lifecycleState,
      region,
    }),
    run: (params, signal) =>
      service.listResources(
        {
          kind: parseResourceKind(params.kind),
          compartmentId: params.compartmentId,
          lifecycleState: optionalState(params.lifecycleState),
          region: params.region,
        },
        signal,
      ),
  });

  add({
    name: "oci_list_instances_with_network",
    label: "List instances with network info",
    description: "List compute instances together with their primary private and public IP addresses.",
    parameters: Type.Object({
      compartmentId,
      lifecycleState: Type.Optional(Type.String({ description: "Lifecycle state filter (default RUNNING)" })),
      region,
    }),
    run: (params, signal) =>
      service.listInstancesWithNetwork(
        { compartmentId: params.compartmentId, lifecycleState: optionalState(params.lifecycleState), region: params.region },
        signal,
      ),
  });

  add({
    name: "oci_describe_resource",
    label: "Describe resource",
    description: "Get full details of a resource, including network interfaces for compute instances.",
    parameters: Type.Object({
      resourceId,
      kind,
      compartmentId,
      includeNetwork: Type.Optional(Type.Boolean({ description: "Include VNIC details for instances (default true)" })),
      region,
    }),
    run: (params, signal) =>
      service.describeResource({ ...params, kind: optionalKind(params.kind) }, signal),
  });

  add({
    name: "oci_get_resource_state",
    label: "Get resource state",
    description: "Read the current lifecycle state of a resource (always a fresh read).",
    parameters: Type.Object({ resourceId, kind, region }),
    run: (params, signal) => service.getResourceState({ ...params, kind: optionalKind(params.kind) }, signal),
  });

  // ─── Lifecycle Actions ──────────────────────────────────────────────
  add({
    name: "oci_start_resource",
    label: "Start resource",
    description: "Start a stopped instance, DB system or autonomous database.",
    parameters: lifecycleParameters,
    run: (params, signal) => service.startResource({ ...params, kind: optionalKind(params.kind) }, signal),
  });

  add({
    name: "oci_stop_resource",
    label: "Stop resource",
    description: "Stop a running resource. Instances stop gracefully (SOFTSTOP) unless softVariant is false.",
    parameters: lifecycleParameters,
    run: (params, signal) => service.stopResource({ ...params, kind: optionalKind(params.kind) }, signal),
  });

  add({
    name: "oci_restart_resource",
    label: "Restart resource",
    description: "Restart a running resource. Uses SOFTRESET unless softVariant is false.",
    parameters: lifecycleParameters,
    run: (params, signal) => service.restartResource({ ...params, kind: optionalKind(params.kind) }, signal),
  });

  add({
    name: "oci_scale_autonomous_database",
    label: "Scale autonomous database",
    description: "Change compute count, storage or auto-scaling settings of an available autonomous database.",
    parameters: Type.Object({
      resourceId,
      computeCount: Type.Optional(Type.Number({ description: "New compute (ECPU/OCPU) count", exclusiveMinimum: 0 })),
      dataStorageSizeInTBs: Type.Optional(Type.Integer({ description: "New storage size in TB", minimum: 1 })),
      isAutoScalingEnabled: Type.Optional(Type.Boolean()),
      isAutoScalingForStorageEnabled: Type.Optional(Type.Boolean()),
      waitForCompletion,
      region,
    }),
    run: (params, signal) => service.scaleAutonomousDatabase(params, signal),
  });

  // ─── Work Requests & Diagnostics ────────────────────────────────────
  add({
    name: "oci_get_work_request",
    label: "Get work request",
    description: "Read the status of a work request, optionally waiting until it finishes.",
    parameters: Type.Object({
      workRequestId: Type.String({ description: "Work request OCID", minLength: 1 }),
      region,
      wait: Type.Optional(Type.Boolean({ description: "Poll until terminal (bounded)" })),
    }),
    run: (params, signal) => service.getWorkRequest(params, signal),
  });

  add({
    name: "oci_test_connection",
    label: "Test connection",
    description: "Check configuration, both execution backends and access to compute and database services.",
    parameters: Type.Object({}),
    run: (_params, signal) => service.testConnection(signal),
  });

  return tools;
}
