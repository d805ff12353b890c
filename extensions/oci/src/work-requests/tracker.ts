/**
 * OCI Extension — Work Request Tracker
 *
 * Polls a work request with capped exponential backoff until it reaches a
 * terminal status or the poll budget runs out (reported as UNKNOWN).
 */

import { BackendUnavailableError, errorMessage } from "../errors.js";
import type { OciLogger } from "../logging/index.js";
import { sleep as abortableSleep } from "../retry.js";
import type { WorkRequestPoll } from "../backends/types.js";
import type { BackendSelector } from "../selector.js";
import type { BackendMethod, WorkRequest, WorkRequestStatus, WorkRequestTrackerOptions } from "../types.js";

export type TrackResult = {
  workRequest: WorkRequest;
  /** Backend that served the last successful poll; null when none succeeded. */
  method: BackendMethod | null;
};

export type TrackOptions = {
  signal?: AbortSignal;
  issuedAt?: string;
};

export type TrackerDeps = {
  selector: BackendSelector;
  logger: OciLogger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
};

const STATUS_RANK: Record<WorkRequestStatus, number> = {
  UNKNOWN: -1,
  ACCEPTED: 0,
  IN_PROGRESS: 1,
  SUCCEEDED: 2,
  FAILED: 2,
};

export function isTerminal(status: WorkRequestStatus): boolean {
  return status === "SUCCEEDED" || status === "FAILED";
}

/** Status only moves forward; a terminal status is final. */
export function advanceStatus(current: WorkRequestStatus, observed: WorkRequestStatus): WorkRequestStatus {
  if (isTerminal(current)) return current;
  return STATUS_RANK[observed] > STATUS_RANK[current] ? observed : current;
}

export class WorkRequestTracker {
  private logger: OciLogger;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private now: () => Date;

  constructor(
    private deps: TrackerDeps,
    readonly options: WorkRequestTrackerOptions,
  ) {
    this.logger = deps.logger.child("work-requests");
    this.sleep = deps.sleep ?? ((ms, signal) => abortableSleep(ms, signal, "work request wait"));
    this.now = deps.now ?? (() => new Date());
  }

  /** Delay before poll `n` (1-based); the first poll is immediate. */
  delayBeforePoll(n: number): number {
    if (n <= 1) return 0;
    const { initialDelayMs, backoffFactor, maxDelayMs } = this.options;
    return Math.min(initialDelayMs * backoffFactor ** (n - 2), maxDelayMs);
  }

  async track(workRequestId: string, region: string, opts?: TrackOptions): Promise<TrackResult> {
    const signal = opts?.signal;
    const workRequest: WorkRequest = {
      workRequestId,
      status: "ACCEPTED",
      issuedAt: opts?.issuedAt ?? this.now().toISOString(),
      polls: 0,
    };
    let method: BackendMethod | null = null;

    for (let poll = 1; poll <= this.options.maxPolls; poll++) {
      const delay = this.delayBeforePoll(poll);
      if (delay > 0) await this.sleep(delay, signal);

      workRequest.polls = poll;
      const observed = await this.pollWithRetry(workRequestId, region, poll, signal);
      if (!observed) continue;

      method = observed.method;
      workRequest.lastPolledAt = this.now().toISOString();
      workRequest.status = advanceStatus(workRequest.status, observed.value.status);
      if (observed.value.percentComplete !== undefined) workRequest.percentComplete = observed.value.percentComplete;

      this.logger.debug(`Work request ${workRequestId} is ${workRequest.status}`, {
        poll,
        percentComplete: workRequest.percentComplete,
      });
      if (isTerminal(workRequest.status)) return { workRequest, method };
    }

    this.logger.warn(`Work request ${workRequestId} not terminal after ${this.options.maxPolls} polls`);
    return { workRequest: { ...workRequest, status: "UNKNOWN" }, method };
  }

  /**
   * One poll slot. Transport failures are retried on the poll backoff
   * schedule (up to `maxPolls` retries); only an exhausted slot returns
   * undefined and counts against the budget.
   */
  private async pollWithRetry(
    workRequestId: string,
    region: string,
    poll: number,
    signal?: AbortSignal,
  ): Promise<{ value: WorkRequestPoll; method: BackendMethod } | undefined> {
    const { maxPolls } = this.options;
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.deps.selector.execute(
          `poll work request ${workRequestId}`,
          (backend, s) => backend.getWorkRequest(workRequestId, region, s),
          signal,
        );
      } catch (error) {
        if (!(error instanceof BackendUnavailableError)) throw error;
        if (attempt > maxPolls) {
          this.logger.warn(
            `Poll ${poll}/${maxPolls} of ${workRequestId} failed after ${maxPolls} retries: ${errorMessage(error)}`,
          );
          return undefined;
        }
        const delay = this.delayBeforePoll(attempt + 1);
        this.logger.warn(`Poll ${poll}/${maxPolls} of ${workRequestId} failed, retrying in ${delay}ms: ${errorMessage(error)}`);
        await this.sleep(delay, signal);
      }
    }
  }
}
