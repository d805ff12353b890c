/**
 * OCI Extension — Backend Selector
 *
 * Runs a call on the primary backend and, only when that backend is
 * unavailable, once on the fallback. The two are never run concurrently.
 */

import type { ExecutionBackend } from "./backends/types.js";
import { BackendUnavailableError, OperationCancelledError, errorMessage, tagMethod } from "./errors.js";
import type { OciLogger } from "./logging/index.js";
import type { BackendMethod } from "./types.js";

export type Selected<T> = {
  value: T;
  method: BackendMethod;
};

export type BackendCall<T> = (backend: ExecutionBackend, signal?: AbortSignal) => Promise<T>;

export class BackendSelector {
  private logger: OciLogger;

  constructor(
    readonly primary: ExecutionBackend,
    readonly fallback: ExecutionBackend,
    logger: OciLogger,
  ) {
    this.logger = logger.child("selector");
  }

  async execute<T>(operation: string, call: BackendCall<T>, signal?: AbortSignal): Promise<Selected<T>> {
    if (signal?.aborted) throw new OperationCancelledError(operation);

    let primaryError: BackendUnavailableError;
    try {
      return { value: await call(this.primary, signal), method: "PRIMARY" };
    } catch (error) {
      tagMethod(error, "PRIMARY");
      if (!(error instanceof BackendUnavailableError) || signal?.aborted) throw error;
      primaryError = error;
    }

    this.logger.warn(`${this.primary.name} unavailable for ${operation}, trying ${this.fallback.name}`, {
      error: primaryError.message,
    });

    try {
      return { value: await call(this.fallback, signal), method: "FALLBACK" };
    } catch (error) {
      tagMethod(error, "FALLBACK");
      if (!(error instanceof BackendUnavailableError)) throw error;
      throw new BackendUnavailableError(
        `Both backends unavailable: ${this.primary.name}: ${primaryError.message}; ${this.fallback.name}: ${errorMessage(error)}`,
        { method: "FALLBACK", cause: error },
      );
    }
  }
}
