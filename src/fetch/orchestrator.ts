import type { FetchConfig } from '../config';
import { QueryAbortedError, QueryTimeoutError, ProviderError, toFetchFailure } from '../provider/errors';
import { Logger } from '../utils/logger';
import type {
  FailedOutcome,
  FetchAllOptions,
  FetchOutcome,
  QueryDescriptor,
  QueryExecutor
} from './types';

interface FetchOrchestratorDependencies {
  logger: Logger;
  executor: QueryExecutor;
  config: FetchConfig;
}

function assertDistinctIds(queries: readonly QueryDescriptor[]): void {
  const seen = new Set<string>();
  for (const query of queries) {
    if (seen.has(query.id)) {
      throw new Error(`Duplicate query id "${query.id}" in fetch batch`);
    }
    seen.add(query.id);
  }
}

function failedOutcome(query: QueryDescriptor, error: unknown, startedAt: number): FailedOutcome {
  return {
    status: 'failed',
    id: query.id,
    kind: query.kind,
    failure: toFetchFailure(error),
    durationMs: Date.now() - startedAt
  };
}

export class FetchOrchestrator {
  private readonly logger: Logger;

  constructor(private readonly deps: FetchOrchestratorDependencies) {
    this.logger = deps.logger.child({ component: 'fetch' });
  }

  private resolveDeadline(options: FetchAllOptions): number | null {
    const deadline = options.deadlineMs ?? this.deps.config.batch_deadline_ms;
    return deadline > 0 ? deadline : null;
  }

  private async runQuery(query: QueryDescriptor, controller: AbortController): Promise<FetchOutcome> {
    const startedAt = Date.now();
    const timeoutMs = this.deps.config.query_timeout_ms;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new QueryTimeoutError(`Query ${query.id}`, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });

    try {
      const result = await Promise.race([this.deps.executor.execute(query, controller.signal), timeout]);
      return { ...result, status: 'fulfilled', id: query.id, durationMs: Date.now() - startedAt };
    } catch (error) {
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : undefined;
      const outcome = failedOutcome(query, reason instanceof ProviderError ? reason : error, startedAt);
      this.logger.warn('Query failed', {
        queryId: query.id,
        kind: query.kind,
        code: outcome.failure.code,
        error: outcome.failure.message
      });
      return outcome;
    } finally {
      clearTimeout(timer);
    }
  }

  async fetchAll(queries: readonly QueryDescriptor[], options: FetchAllOptions = {}): Promise<Map<string, FetchOutcome>> {
    assertDistinctIds(queries);

    const batchStartedAt = Date.now();
    const outcomes = new Map<string, FetchOutcome>();
    const controllers = new Map<string, AbortController>();

    const tasks = queries.map(async (query) => {
      const controller = new AbortController();
      controllers.set(query.id, controller);
      const outcome = await this.runQuery(query, controller);
      if (!outcomes.has(query.id)) {
        outcomes.set(query.id, outcome);
      }
    });
    const settled = Promise.all(tasks).then(() => 'settled' as const);

    const deadlineMs = this.resolveDeadline(options);
    if (deadlineMs === null) {
      await settled;
    } else {
      let timer: NodeJS.Timeout | undefined;
      const expired = new Promise<'expired'>((resolve) => {
        timer = setTimeout(() => resolve('expired'), deadlineMs);
      });
      const winner = await Promise.race([settled, expired]);
      clearTimeout(timer);

      if (winner === 'expired') {
        const reason = new QueryAbortedError(`Batch deadline of ${deadlineMs}ms exceeded`, 'deadline_exceeded');
        for (const query of queries) {
          if (outcomes.has(query.id)) {
            continue;
          }
          outcomes.set(query.id, failedOutcome(query, reason, batchStartedAt));
          controllers.get(query.id)?.abort(reason);
        }
        this.logger.warn('Fetch batch deadline reached', { deadlineMs });
      }
    }

    const ordered = new Map<string, FetchOutcome>();
    for (const query of queries) {
      const outcome = outcomes.get(query.id);
      ordered.set(query.id, outcome ?? failedOutcome(query, new Error('Query produced no outcome'), batchStartedAt));
    }

    const failed = Array.from(ordered.values()).filter((outcome) => outcome.status === 'failed');
    this.logger.info('Fetch batch complete', {
      queries: queries.length,
      failed: failed.length,
      durationMs: Date.now() - batchStartedAt
    });

    return ordered;
  }
}
