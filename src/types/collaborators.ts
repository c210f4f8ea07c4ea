/**
 * Collaborator contracts
 *
 * The trial engine talks to the target service, the host and the report
 * through these interfaces only.
 */

import type { Result } from 'ts-results';
import type { RequestFailureKind, ResourceSample, TrialResult } from './trial.js';

/**
 * One unit of work sent in a single request
 */
export interface WorkloadUnit {
  readonly workloadId: string;
  readonly prompt: string;
}

export interface IssueContext {
  /** Aborted on per-request timeout and, under the `abort` in-flight policy, on trial end */
  readonly signal: AbortSignal;
  readonly workerIndex: number;
}

export interface IssueSuccess {
  readonly responseLength: number;
}

export interface IssueFailure {
  readonly kind: RequestFailureKind;
  readonly reason: string;
  readonly status?: number;
}

/**
 * Sends one workload unit to the target service
 *
 * Implementations report failures as `Err` values; throwing is treated as an
 * `unexpected` failure by the generator.
 */
export interface RequestIssuer {
  send(unit: WorkloadUnit, context: IssueContext): Promise<Result<IssueSuccess, IssueFailure>>;
}

/**
 * Point-in-time host utilisation reading
 *
 * Dimensions that cannot be read are reported as 0.
 */
export interface ResourceProbe {
  sample(): Promise<ResourceSample>;
}

/**
 * Consumer of the ordered trial results
 */
export interface ResultSink {
  consume(results: readonly TrialResult[]): Promise<void>;
}
