#!/usr/bin/env node
/**
 * oci-ops command-line entry point.
 */

import { Command } from "commander";
import { registerOciCli } from "./src/ops-cli.js";
import { createOciRuntime } from "./src/runtime.js";

const program = new Command()
  .name("oci-ops")
  .description("Lifecycle operations for OCI compute and database resources")
  .version("0.1.0");

registerOciCli({
  program,
  createRuntime: () => createOciRuntime(),
  logger: { error: (msg) => process.stderr.write(`[oci-ops] ${msg}\n`) },
});

await program.parseAsync(process.argv);
