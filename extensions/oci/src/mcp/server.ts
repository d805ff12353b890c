/**
 * oci-ops MCP Server
 *
 * Exposes the OCI lifecycle tools over the Model Context Protocol (stdio
 * transport, newline-delimited JSON-RPC).
 *
 * Usage:
 *   oci-ops mcp
 *
 * Client config:
 *   {
 *     "mcpServers": {
 *       "oci-ops": { "command": "oci-ops", "args": ["mcp"] }
 *     }
 *   }
 */

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { errorMessage } from "../errors.js";
import type { OciLogger } from "../logging/index.js";
import { createOciCoreService } from "../service.js";
import type { OciRuntime } from "../runtime.js";
import { buildToolRegistry, type ToolDefinition } from "./tool-registry.js";

// =============================================================================
// MCP Protocol Types
// =============================================================================

type RequestId = number | string;

export type JsonRpcRequest = {
  jsonrpc: "2.0";
  id?: RequestId;
  method: string;
  params?: Record<string, unknown>;
};

export type JsonRpcResponse = {
  jsonrpc: "2.0";
  id: RequestId | null;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRequestId(value: unknown): value is RequestId {
  return typeof value === "string" || typeof value === "number";
}

/** Shape check for an incoming message; anything else is an invalid request. */
export function isJsonRpcRequest(value: unknown): value is JsonRpcRequest {
  if (!isRecord(value)) return false;
  if (value.jsonrpc !== "2.0" || typeof value.method !== "string") return false;
  if (value.id !== undefined && !isRequestId(value.id)) return false;
  return value.params === undefined || isRecord(value.params);
}

// =============================================================================
// Server Implementation
// =============================================================================

const PROTOCOL_VERSION = "2024-11-05";
const SERVER_NAME = "oci-ops";
const SERVER_VERSION = "0.1.0";

export class McpServer {
  private tools: ToolDefinition[];
  private toolMap: Map<string, ToolDefinition>;
  private inFlight = new Map<RequestId, AbortController>();

  constructor(
    tools: ToolDefinition[],
    private logger?: OciLogger,
  ) {
    this.tools = tools;
    this.toolMap = new Map(tools.map((t) => [t.name, t]));
  }

  /** Number of tool calls still running. */
  get pendingCalls(): number {
    return this.inFlight.size;
  }

  /**
   * Handle one parsed JSON-RPC message. Returns null for notifications.
   */
  async handleMessage(message: unknown): Promise<JsonRpcResponse | null> {
    if (!isJsonRpcRequest(message)) {
      const id = isRecord(message) && isRequestId(message.id) ? message.id : null;
      return { jsonrpc: "2.0", id, error: { code: -32600, message: "Invalid Request" } };
    }
    return this.handleRequest(message);
  }

  async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse | null> {
    const id = request.id ?? null;
    try {
      switch (request.method) {
        case "initialize":
          return this.respond(id, {
            protocolVersion: PROTOCOL_VERSION,
            capabilities: {
              tools: { listChanged: false },
            },
            serverInfo: {
              name: SERVER_NAME,
              version: SERVER_VERSION,
            },
          });

        // ── Notifications (no response) ──────────────────────────────
        case "notifications/initialized":
          return null;

        case "notifications/cancelled": {
          const target = request.params?.requestId;
          if (isRequestId(target)) {
            const controller = this.inFlight.get(target);
            if (controller) {
              this.logger?.info(`Cancelling request ${target}`);
              controller.abort();
            }
          }
          return null;
        }

        case "tools/list":
          return this.respond(id, {
            tools: this.tools.map((t) => ({
              name: t.name,
              description: t.description,
              inputSchema: t.parameters,
            })),
          });

        case "tools/call":
          return this.respond(id, await this.callTool(id, request.params));

        // ── Protocol stubs (no resources or prompts) ─────────────────
        case "resources/list":
          return this.respond(id, { resources: [] });

        case "prompts/list":
          return this.respond(id, { prompts: [] });

        case "ping":
          return this.respond(id, {});

        default:
          return {
            jsonrpc: "2.0",
            id,
            error: { code: -32601, message: `Method not found: ${request.method}` },
          };
      }
    } catch (err) {
      return {
        jsonrpc: "2.0",
        id,
        error: { code: -32603, message: `Internal error: ${errorMessage(err)}` },
      };
    }
  }

  private async callTool(id: RequestId | null, params: Record<string, unknown> | undefined) {
    const toolName = typeof params?.name === "string" ? params.name : undefined;
    const args = isRecord(params?.arguments) ? params.arguments : {};

    const tool = toolName ? this.toolMap.get(toolName) : undefined;
    if (!tool) {
      return {
        content: [{ type: "text", text: `Unknown tool: ${toolName}` }],
        isError: true,
      };
    }

    const controller = new AbortController();
    if (id !== null) this.inFlight.set(id, controller);
    try {
      const result = await tool.execute(args, controller.signal);
      return { content: result.content, isError: result.isError };
    } finally {
      if (id !== null) this.inFlight.delete(id);
    }
  }

  private respond(id: RequestId | null, result: unknown): JsonRpcResponse {
    return { jsonrpc: "2.0", id, result };
  }
}

/** Server with the full OCI tool set bound to a runtime. */
export function createMcpServer(runtime: OciRuntime): McpServer {
  const tools = buildToolRegistry({ service: createOciCoreService(runtime), now: runtime.now });
  return new McpServer(tools, runtime.logger.child("mcp"));
}

// =============================================================================
// Stdio Transport
// =============================================================================

export type StdioOptions = {
  input?: Readable;
  output?: Writable;
  /** Install SIGINT/SIGTERM handlers that close the input. Default true. */
  handleSignals?: boolean;
};

/**
 * Serve until the input closes. Requests run concurrently so that a
 * `notifications/cancelled` can reach a call that is still in flight;
 * responses are written as each call completes.
 */
export async function startStdioServer(runtime: OciRuntime, opts: StdioOptions = {}): Promise<void> {
  const log = runtime.logger.child("stdio");
  const server = createMcpServer(runtime);
  const output = opts.output ?? process.stdout;

  const rl = createInterface({ input: opts.input ?? process.stdin, terminal: false });

  const write = (msg: JsonRpcResponse) => {
    output.write(JSON.stringify(msg) + "\n");
  };

  // ── Graceful shutdown ──────────────────────────────────────────────
  const shutdown = () => {
    log.info("Shutting down");
    rl.close();
  };

  const handleSignals = opts.handleSignals ?? true;
  if (handleSignals) {
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  }

  log.info("MCP server starting");

  const pending = new Set<Promise<void>>();
  try {
    for await (const line of rl) {
      const trimmed = line.trim();
      if (!trimmed) continue;

      let message: unknown;
      try {
        message = JSON.parse(trimmed);
      } catch {
        write({
          jsonrpc: "2.0",
          id: null,
          error: { code: -32700, message: "Parse error" },
        });
        continue;
      }

      const task: Promise<void> = (async () => {
        try {
          const response = await server.handleMessage(message);
          if (response) write(response);
        } catch (err) {
          log.error(`Unhandled request failure: ${errorMessage(err)}`);
        } finally {
          pending.delete(task);
        }
      })();
      pending.add(task);
    }

    await Promise.all(pending);
    log.info("Input closed, server stopped");
  } finally {
    if (handleSignals) {
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
    }
  }
}
