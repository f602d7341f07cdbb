import type { PollingConfig, ProviderConfig } from '../config';
import type { BackoffPolicy } from '../ratelimit/backoff';
import { computeBackoffDelay, DEFAULT_BACKOFF_POLICY } from '../ratelimit/backoff';
import type { RateLimiter } from '../ratelimit/rate-limiter';
import { systemClock, type Clock } from '../utils/clock';
import { describeError, Logger } from '../utils/logger';
import { normalizeKeyword, urlMatchesDomain } from '../utils/text';
import {
  isAbortError,
  isTransientStatus,
  MalformedResponseError,
  ProviderHttpError,
  QueryAbortedError,
  RateLimitError,
  RetriesExhaustedError,
  toFetchFailure,
  UnsupportedMarketError
} from './errors';
import {
  parseBacklinksSummary,
  parseCompetitors,
  parseKeywordExport,
  parseTaskStatus,
  parseTaskSubmissions
} from './parsers';
import {
  isTerminalTaskState,
  UNRANKED,
  type BacklinksSummaryResult,
  type CompetitorRankingsResult,
  type CompetitorSummaryResult,
  type KeywordFailure,
  type KeywordMetricsResult,
  type RankingQuery,
  type RankingRecord,
  type RankingsResult,
  type SerpResultItem,
  type SerpTaskState,
  type SerpTaskStatus,
  type SerpTaskSubmission,
  type TerminalSerpTaskState
} from './types';

export const DEFAULT_BASE_URL = 'https://api.seranking.com/v1';

export interface RankingProviderClientDependencies {
  logger: Logger;
  apiKey: string;
  config: ProviderConfig;
  polling: PollingConfig;
  limiter: RateLimiter;
  backoff?: BackoffPolicy;
  clock?: Clock;
  fetchImpl?: typeof fetch;
  random?: () => number;
}

type QueryParams = Record<string, string | number | undefined>;

interface RequestOptions {
  method?: 'GET' | 'POST';
  query?: QueryParams;
  json?: unknown;
  form?: Array<[string, string]>;
  signal?: AbortSignal;
}

interface SerpCollection {
  results: Map<string, SerpResultItem[]>;
  failures: KeywordFailure[];
}

function buildRecord(
  keyword: string,
  domain: string,
  items: SerpResultItem[],
  observedAt: string
): RankingRecord {
  const match = items.find((item) => urlMatchesDomain(item.url, domain));
  return {
    keyword,
    domain,
    position: match ? match.position : UNRANKED,
    searchVolume: null,
    costPerClick: null,
    difficulty: null,
    url: match?.url ?? null,
    title: match?.title ?? null,
    observedAt
  };
}

export class RankingProviderClient {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly fetchImpl: typeof fetch;
  private readonly backoff: BackoffPolicy;
  private readonly random: () => number;

  constructor(private readonly deps: RankingProviderClientDependencies) {
    this.logger = deps.logger.child({ component: 'provider' });
    this.clock = deps.clock ?? systemClock;
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.backoff = deps.backoff ?? DEFAULT_BACKOFF_POLICY;
    this.random = deps.random ?? Math.random;
  }

  private resolveEngine(market: string): number {
    const engineId = this.deps.config.engines[market.trim().toLowerCase()];
    if (engineId === undefined) {
      throw new UnsupportedMarketError(market);
    }
    return engineId;
  }

  private buildUrl(endpoint: string, query?: QueryParams): string {
    const base = (this.deps.config.base_url || DEFAULT_BASE_URL).replace(/\/+$/, '');
    const url = new URL(`${base}${endpoint}`);
    if (query) {
      Object.entries(query).forEach(([key, value]) => {
        if (value !== undefined) {
          url.searchParams.append(key, String(value));
        }
      });
    }
    return url.toString();
  }

  private buildInit(options: RequestOptions): RequestInit {
    const headers: Record<string, string> = {
      Authorization: `Token ${this.deps.apiKey}`
    };
    const init: RequestInit = { method: options.method ?? 'GET', headers, signal: options.signal };

    if (options.form) {
      const form = new FormData();
      options.form.forEach(([key, value]) => form.append(key, value));
      init.body = form;
    } else if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(options.json);
    }

    return init;
  }

  private async pause(ms: number, signal?: AbortSignal): Promise<void> {
    try {
      await this.clock.sleep(ms, signal);
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw new QueryAbortedError();
      }
      throw error;
    }
  }

  private async readJson(endpoint: string, response: Response): Promise<unknown> {
    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new MalformedResponseError(`Provider returned invalid JSON for ${endpoint}: ${text.slice(0, 120)}`);
    }
  }

  async request(endpoint: string, options: RequestOptions = {}): Promise<unknown> {
    const url = this.buildUrl(endpoint, options.query);
    const { signal } = options;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.backoff.maxAttempts; attempt += 1) {
      if (signal?.aborted) {
        throw new QueryAbortedError();
      }

      await this.deps.limiter.acquire(signal).catch((error: unknown) => {
        throw signal?.aborted ? new QueryAbortedError() : error;
      });

      let response: Response;
      try {
        response = await this.fetchImpl(url, this.buildInit(options));
      } catch (error) {
        if (signal?.aborted || isAbortError(error)) {
          throw new QueryAbortedError();
        }
        lastError = error;
        this.logger.warn('Provider request failed; retrying', {
          endpoint,
          attempt,
          error: describeError(error)
        });
        await this.retryPause(attempt, signal);
        continue;
      }

      if (response.ok) {
        return this.readJson(endpoint, response);
      }

      if (isTransientStatus(response.status)) {
        lastError = response.status === 429
          ? new RateLimitError(endpoint)
          : new ProviderHttpError(endpoint, response.status, (await response.text()).slice(0, 200));
        this.logger.warn('Provider signalled a transient failure; backing off', {
          endpoint,
          status: response.status,
          attempt
        });
        await this.retryPause(attempt, signal);
        continue;
      }

      const body = await response.text();
      throw new ProviderHttpError(endpoint, response.status, body.slice(0, 200));
    }

    throw new RetriesExhaustedError(endpoint, this.backoff.maxAttempts, lastError);
  }

  private async retryPause(attempt: number, signal?: AbortSignal): Promise<void> {
    if (attempt >= this.backoff.maxAttempts) {
      return;
    }
    const delayMs = computeBackoffDelay(attempt, this.backoff, this.random);
    this.logger.debug('Backing off before retry', { attempt, delayMs });
    await this.pause(delayMs, signal);
  }

  private async advanceTask(state: SerpTaskState, startedAt: number, signal?: AbortSignal): Promise<SerpTaskState> {
    switch (state.phase) {
      case 'submitted':
        return { phase: 'polling', keyword: state.keyword, taskId: state.taskId, attempts: 0 };
      case 'polling': {
        const elapsedMs = this.clock.now() - startedAt;
        if (elapsedMs >= this.deps.polling.task_timeout_ms) {
          return { phase: 'timed_out', keyword: state.keyword, attempts: state.attempts, elapsedMs };
        }

        let status: SerpTaskStatus;
        try {
          const payload = await this.request('/serp/tasks/status', { query: { task_id: state.taskId }, signal });
          status = parseTaskStatus(payload);
        } catch (error) {
          if (error instanceof QueryAbortedError) {
            throw error;
          }
          const failure = toFetchFailure(error);
          return { phase: 'failed', keyword: state.keyword, code: failure.code, message: failure.message };
        }

        const attempts = state.attempts + 1;
        if (status.state === 'ready') {
          return { phase: 'ready', keyword: state.keyword, items: status.items, attempts };
        }
        if (status.state === 'unknown') {
          return {
            phase: 'failed',
            keyword: state.keyword,
            code: 'malformed_response',
            message: `Unknown SERP task status "${status.status}"`
          };
        }

        const remainingMs = this.deps.polling.task_timeout_ms - (this.clock.now() - startedAt);
        await this.pause(Math.max(0, Math.min(this.deps.polling.interval_ms, remainingMs)), signal);
        return { phase: 'polling', keyword: state.keyword, taskId: state.taskId, attempts };
      }
      default:
        return state;
    }
  }

  private async runSerpTask(
    submission: SerpTaskSubmission,
    startedAt: number,
    signal?: AbortSignal
  ): Promise<TerminalSerpTaskState> {
    let state: SerpTaskState = { phase: 'submitted', keyword: submission.keyword, taskId: submission.taskId };
    while (!isTerminalTaskState(state)) {
      state = await this.advanceTask(state, startedAt, signal);
    }
    return state;
  }

  private async collectSerpResults(keywords: string[], market: string, signal?: AbortSignal): Promise<SerpCollection> {
    const engineId = this.resolveEngine(market);
    const payload = await this.request('/serp/tasks', {
      method: 'POST',
      json: { engine_id: engineId, query: keywords },
      signal
    });
    const submissions = parseTaskSubmissions(payload);
    const startedAt = this.clock.now();

    this.logger.debug('Submitted SERP tasks', { engineId, tasks: submissions.length });

    const states = await Promise.all(
      submissions.map((submission) => this.runSerpTask(submission, startedAt, signal))
    );

    const results = new Map<string, SerpResultItem[]>();
    const failures: KeywordFailure[] = [];
    const byNormalized = new Map<string, TerminalSerpTaskState>();
    states.forEach((state) => {
      const normalized = normalizeKeyword(state.keyword);
      if (normalized) {
        byNormalized.set(normalized, state);
      }
    });

    for (const keyword of keywords) {
      const state = byNormalized.get(normalizeKeyword(keyword) ?? keyword);
      if (!state) {
        failures.push({ keyword, code: 'malformed_response', message: 'Provider returned no task for keyword' });
        continue;
      }
      if (state.phase === 'ready') {
        results.set(keyword, state.items);
      } else if (state.phase === 'timed_out') {
        failures.push({
          keyword,
          code: 'timeout',
          message: `SERP task still processing after ${state.elapsedMs}ms (${state.attempts} polls)`
        });
      } else {
        failures.push({ keyword, code: state.code, message: state.message });
      }
    }

    if (failures.length > 0) {
      this.logger.warn('Some SERP tasks did not complete', {
        failed: failures.length,
        keywords: failures.map((failure) => failure.keyword)
      });
    }

    return { results, failures };
  }

  async fetchRankings(query: RankingQuery, signal?: AbortSignal): Promise<RankingsResult> {
    if (query.keywords.length === 0) {
      return { records: [], failures: [] };
    }
    const { results, failures } = await this.collectSerpResults(query.keywords, query.market, signal);
    const observedAt = new Date(this.clock.now()).toISOString();
    const records: RankingRecord[] = [];

    for (const keyword of query.keywords) {
      const items = results.get(keyword);
      if (items) {
        records.push(buildRecord(keyword, query.domain, items, observedAt));
      }
    }

    return { records, failures };
  }

  async fetchCompetitorRankings(
    keywords: string[],
    competitors: string[],
    market: string,
    signal?: AbortSignal
  ): Promise<CompetitorRankingsResult> {
    if (keywords.length === 0 || competitors.length === 0) {
      return { competitors, records: [], failures: [] };
    }
    const { results, failures } = await this.collectSerpResults(keywords, market, signal);
    const observedAt = new Date(this.clock.now()).toISOString();
    const records: RankingRecord[] = [];

    for (const keyword of keywords) {
      const items = results.get(keyword);
      if (!items) {
        continue;
      }
      competitors.forEach((competitor) => {
        records.push(buildRecord(keyword, competitor, items, observedAt));
      });
    }

    return { competitors, records, failures };
  }

  async fetchKeywordMetrics(keywords: string[], market: string, signal?: AbortSignal): Promise<KeywordMetricsResult> {
    if (keywords.length === 0) {
      return { metrics: [], missing: [] };
    }

    const form: Array<[string, string]> = keywords.map((keyword): [string, string] => ['keywords[]', keyword]);
    form.push(['sort', 'volume'], ['sort_order', 'desc']);

    const payload = await this.request('/keywords/export', {
      method: 'POST',
      query: { source: market.trim().toLowerCase() },
      form,
      signal
    });

    const metrics = parseKeywordExport(payload);
    const found = new Set(metrics.map((entry) => normalizeKeyword(entry.keyword)));
    const missing = keywords.filter((keyword) => !found.has(normalizeKeyword(keyword)));

    return { metrics, missing };
  }

  async fetchCompetitorSummary(
    domain: string,
    competitors: string[],
    market: string,
    signal?: AbortSignal
  ): Promise<CompetitorSummaryResult> {
    if (competitors.length > 0) {
      return {
        autoDiscovered: false,
        competitors: competitors.map((competitor) => ({
          domain: competitor,
          commonKeywords: null,
          totalKeywords: null,
          trafficSum: null,
          priceSum: null
        }))
      };
    }

    this.logger.info('Auto-discovering competitors', { domain, market });
    const payload = await this.request('/domain/competitors', {
      query: { source: market.trim().toLowerCase(), domain, type: 'organic', stats: 1 },
      signal
    });

    return {
      autoDiscovered: true,
      competitors: parseCompetitors(payload, this.deps.config.competitor_discovery_limit)
    };
  }

  async fetchBacklinksSummary(domain: string, signal?: AbortSignal): Promise<BacklinksSummaryResult> {
    const payload = await this.request('/backlinks/summary', {
      query: { target: domain, mode: 'domain' },
      signal
    });
    return parseBacklinksSummary(payload, domain);
  }
}

