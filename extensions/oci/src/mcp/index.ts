/**
 * MCP module — tool registry + stdio server.
 */
export { buildToolRegistry, type ToolDefinition, type ToolResult, type ToolRegistryDeps } from "./tool-registry.js";
export {
  McpServer,
  createMcpServer,
  isJsonRpcRequest,
  startStdioServer,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type StdioOptions,
} from "./server.js";
