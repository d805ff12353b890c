/**
 * OCI Extension — Entry Point
 *
 * Lifecycle tools for OCI compute instances, DB systems and autonomous
 * databases, served over MCP. Re-exports the public API for programmatic use.
 */

export { createOciRuntime, assembleRuntime, type OciRuntime, type CreateRuntimeOptions } from "./src/runtime.js";
export {
  OciCoreService,
  createOciCoreService,
  type ActionData,
  type ConnectionReport,
  type DescribeResourceData,
  type ListResourcesData,
  type ResourceStateData,
  type WorkRequestData,
} from "./src/service.js";
export { BackendSelector } from "./src/selector.js";
export { LifecycleDispatcher, createAction } from "./src/lifecycle/dispatcher.js";
export { WorkRequestTracker } from "./src/work-requests/tracker.js";
export { ApiBackend } from "./src/backends/api-backend.js";
export { CliBackend } from "./src/backends/cli-backend.js";
export type { ExecutionBackend } from "./src/backends/types.js";
export type { ResponseEnvelope, SuccessEnvelope, FailureEnvelope } from "./src/envelope.js";
export * from "./src/errors.js";
export * from "./src/types.js";
export { McpServer, buildToolRegistry, createMcpServer, startStdioServer } from "./src/mcp/index.js";
export { registerOciCli } from "./src/ops-cli.js";
