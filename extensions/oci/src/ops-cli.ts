/**
 * OCI Extension — CLI Commands
 *
 * Registers the `oci-ops` subcommands: the MCP server plus a few direct
 * queries that print the same envelopes the tools return.
 */

import type { Command } from "commander";
import type { ResponseEnvelope } from "./envelope.js";
import { errorMessage } from "./errors.js";
import { startStdioServer } from "./mcp/server.js";
import { parseLifecycleState, parseResourceKind } from "./resources.js";
import type { OciRuntime } from "./runtime.js";
import { createOciCoreService } from "./service.js";

// =============================================================================
// Types
// =============================================================================

export type OciCliContext = {
  program: Command;
  createRuntime: () => Promise<OciRuntime>;
  logger: {
    error: (msg: string) => void;
  };
};

// =============================================================================
// Helpers
// =============================================================================

/** Simple table formatter for terminal output. */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));
  const sep = widths.map((w) => "─".repeat(w + 2)).join("┼");
  const formatRow = (cells: string[]) => cells.map((c, i) => ` ${c.padEnd(widths[i] ?? 0)} `).join("│");
  return [formatRow(headers), sep, ...rows.map(formatRow)].join("\n");
}

function report<T>(envelope: ResponseEnvelope<T>, json: boolean, body?: (data: T) => string): void {
  if (json) {
    console.log(JSON.stringify(envelope, null, 2));
  } else {
    console.log(envelope.summary);
    const text = envelope.success && body ? body(envelope.data) : "";
    if (text) console.log(text);
  }
  if (!envelope.success) process.exitCode = 1;
}

// =============================================================================
// CLI Registration
// =============================================================================

/**
 * Register the `oci-ops` commands on `ctx.program`.
 */
export function registerOciCli(ctx: OciCliContext): void {
  const { program } = ctx;

  const run = async (action: (runtime: OciRuntime) => Promise<void>) => {
    try {
      await action(await ctx.createRuntime());
    } catch (error) {
      ctx.logger.error(errorMessage(error));
      process.exitCode = 1;
    }
  };

  // ---------------------------------------------------------------------------
  // mcp
  // ---------------------------------------------------------------------------
  program
    .command("mcp")
    .description("Start the MCP server on stdio")
    .action(() => run((runtime) => startStdioServer(runtime)));

  // ---------------------------------------------------------------------------
  // test-connection
  // ---------------------------------------------------------------------------
  program
    .command("test-connection")
    .description("Check configuration, both backends and service access")
    .option("--json", "Print the full response envelope")
    .action((opts: { json?: boolean }) =>
      run(async (runtime) => {
        const envelope = await createOciCoreService(runtime).testConnection();
        report(envelope, opts.json ?? false, (data) =>
          table(
            ["Check", "Status", "Detail"],
            data.checks.map((c) => [c.name, c.status, c.detail]),
          ),
        );
      }),
    );

  // ---------------------------------------------------------------------------
  // list <kind>
  // ---------------------------------------------------------------------------
  program
    .command("list <kind>")
    .description("List instances, DB systems or autonomous databases")
    .option("--compartment <ocid>", "Compartment OCID")
    .option("--state <state>", "Lifecycle state filter")
    .option("--region <region>", "Region override")
    .option("--json", "Print the full response envelope")
    .action((kind: string, opts: { compartment?: string; state?: string; region?: string; json?: boolean }) =>
      run(async (runtime) => {
        const envelope = await createOciCoreService(runtime).listResources({
          kind: parseResourceKind(kind),
          compartmentId: opts.compartment,
          lifecycleState: opts.state === undefined ? undefined : parseLifecycleState(opts.state),
          region: opts.region,
        });
        report(envelope, opts.json ?? false, (data) =>
          data.count === 0
            ? ""
            : table(
                ["Name", "State", "OCID"],
                data.resources.map((r) => [r.name, r.lifecycleState, r.id]),
              ),
        );
      }),
    );

  // ---------------------------------------------------------------------------
  // state <resourceId>
  // ---------------------------------------------------------------------------
  program
    .command("state <resourceId>")
    .description("Show the current lifecycle state of a resource")
    .option("--kind <kind>", "Resource kind when it cannot be inferred from the OCID")
    .option("--region <region>", "Region override")
    .option("--json", "Print the full response envelope")
    .action((resourceId: string, opts: { kind?: string; region?: string; json?: boolean }) =>
      run(async (runtime) => {
        const envelope = await createOciCoreService(runtime).getResourceState({
          resourceId,
          kind: opts.kind === undefined ? undefined : parseResourceKind(opts.kind),
          region: opts.region,
        });
        report(envelope, opts.json ?? false);
      }),
    );
}
