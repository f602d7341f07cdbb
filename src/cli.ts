#!/usr/bin/env node
import { mkdirSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { loadEnvConfig, loadSettings } from './config';
import { ReportExporter } from './export';
import { createPipeline, parseRunRequest } from './pipeline';
import type { PipelineRuntime } from './pipeline';
import { describeError, Logger } from './utils/logger';

function ensureDirectories(paths: string[]) {
  paths.forEach((path) => {
    const resolved = resolve(process.cwd(), path);
    mkdirSync(resolved, { recursive: true });
  });
}

function readRequestFile(path: string): unknown {
  const contents = readFileSync(resolve(process.cwd(), path), 'utf-8');
  return JSON.parse(contents);
}

async function bootstrap() {
  const settings = loadSettings();
  const env = loadEnvConfig();
  const requestPath = process.argv[2] ?? resolve('configs', 'request.json');

  ensureDirectories([settings.paths.data_dir, settings.paths.outputs_dir]);

  const logger = new Logger({ level: settings.logging.level, format: settings.logging.format });

  logger.info('Ranking pipeline bootstrap complete', {
    requestPath,
    market: settings.provider.default_market,
    cacheBackend: env.cacheBackend ?? settings.cache.backend,
    minIntervalMs: settings.rate_limit.min_interval_ms,
    queryTimeoutMs: settings.fetch.query_timeout_ms,
    hasApiKey: Boolean(env.serankingApiKey)
  });

  const request = parseRunRequest(readRequestFile(requestPath));
  let runtime: PipelineRuntime | null = null;

  try {
    runtime = await createPipeline(settings, env, logger);
    const report = await runtime.pipeline.run(request);

    const exporter = new ReportExporter({
      logger,
      config: settings.exporter,
      outputDir: resolve(process.cwd(), settings.paths.outputs_dir)
    });
    const exported = exporter.export(report);
    if (exported) {
      logger.info('Report ready', { ...exported });
    }

    logger.info('Cache status', { ...(await runtime.cache.stats()) });
  } catch (error) {
    logger.error('Pipeline execution failed', { error: describeError(error) });
    throw error;
  } finally {
    if (runtime) {
      await runtime.close();
    }
  }
}

bootstrap().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Bootstrap failed', error);
  process.exitCode = 1;
});
