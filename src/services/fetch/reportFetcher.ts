/**
 * Report Fetcher
 *
 * Pulls a resort's normalized grooming report from its report URL.
 * Any failure (non-2xx, timeout, network, malformed body) surfaces as an
 * UpstreamFetchError so the cycle skips just that resort.
 */

import { z } from 'zod';
import { UpstreamFetchError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import { LocalDateSchema, RunDifficultySchema } from '../../models/groomingSchemas';
import type { FetchedReport, Resort } from '../../types/grooming';

/**
 * Upstream payload. Unrecognized difficulty labels are treated as unknown.
 */
export const FetchedReportSchema = z.object({
  date: LocalDateSchema,
  runs: z.array(
    z.object({
      name: z.string(),
      difficulty: RunDifficultySchema.nullable().optional().catch(null),
    })
  ),
});

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ReportFetcherOptions {
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export class ReportFetcher {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: ReportFetcherOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input: string, init?: RequestInit) => fetch(input, init));
  }

  async fetchReport(resort: Resort): Promise<FetchedReport> {
    let response: Response;
    try {
      response = await this.fetchImpl(resort.reportUrl, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      const reason =
        error instanceof Error && error.name === 'TimeoutError'
          ? `timed out after ${this.options.timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
      throw new UpstreamFetchError(resort.resortId, reason);
    }

    if (!response.ok) {
      throw new UpstreamFetchError(resort.resortId, `HTTP ${response.status}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new UpstreamFetchError(resort.resortId, 'response body is not JSON', response.status);
    }

    const parsed = FetchedReportSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new UpstreamFetchError(resort.resortId, `invalid report payload (${issues.join('; ')})`);
    }

    logger.debug('Fetched grooming report', {
      resortId: resort.resortId,
      date: parsed.data.date,
      runs: parsed.data.runs.length,
    });

    return {
      date: parsed.data.date,
      runs: parsed.data.runs.map((run) => ({ name: run.name, difficulty: run.difficulty ?? null })),
    };
  }
}
