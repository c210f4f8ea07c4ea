/**
 * Ollama generate issuer
 *
 * Sends one non-streaming `/api/generate` request per workload unit.
 */

import type { Logger } from 'pino';
import { Err, Ok, type Result } from 'ts-results';
import { z } from 'zod';
import type { IssueContext, IssueFailure, IssueSuccess, RequestIssuer, WorkloadUnit } from '../types/collaborators.js';
import type { RequestFailureKind } from '../types/trial.js';
import { errorMessage } from '../utils/errors.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface OllamaRequestIssuerOptions {
  /** Full generate URL, e.g. http://localhost:11434/api/generate */
  endpoint: string;
  fetch?: FetchLike;
  logger?: Logger;
}

const GenerateResponseSchema = z.object({
  response: z.string(),
});

const MAX_REASON_BODY = 200;

function failure(kind: RequestFailureKind, reason: string, status?: number): Err<IssueFailure> {
  return Err<IssueFailure>(status === undefined ? { kind, reason } : { kind, reason, status });
}

export class OllamaRequestIssuer implements RequestIssuer {
  private readonly endpoint: string;
  private readonly fetch: FetchLike;
  private readonly logger?: Logger;

  constructor(options: OllamaRequestIssuerOptions) {
    this.endpoint = options.endpoint;
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger;
  }

  public async send(unit: WorkloadUnit, context: IssueContext): Promise<Result<IssueSuccess, IssueFailure>> {
    let response: Response;
    let body: string;

    try {
      response = await this.fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: unit.workloadId, prompt: unit.prompt, stream: false }),
        signal: context.signal,
      });
      body = await response.text();
    } catch (error) {
      if (context.signal.aborted) {
        return failure('aborted', 'request aborted');
      }
      return failure('network', errorMessage(error));
    }

    if (response.status !== 200) {
      const excerpt = body.length > MAX_REASON_BODY ? `${body.slice(0, MAX_REASON_BODY)}...` : body;
      return failure('status', `unexpected status ${response.status}${excerpt ? `: ${excerpt}` : ''}`, response.status);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      return failure('malformed', `response is not JSON: ${errorMessage(error)}`);
    }

    const parsed = GenerateResponseSchema.safeParse(payload);
    if (!parsed.success) {
      return failure('malformed', 'response has no string "response" field');
    }

    this.logger?.trace(
      { workerIndex: context.workerIndex, workloadId: unit.workloadId, response: parsed.data.response },
      'Generate response'
    );
    return Ok({ responseLength: parsed.data.response.length });
  }
}
