/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import { SOURCE_KIND_LABELS } from './domain/deny-event';
import { ExtractionOrchestrator, ExtractionSource } from './engine/orchestrator';
import { BatchRunService } from './engine/run-service';
import { createMemoryRunStore } from './storage/memory-store';
import { RunStore } from './storage/store';
import { errorHandler } from './api/middleware';
import { createRunRoutes } from './api/runs';
import { Logger, logger as rootLogger } from './logger';

const startTime = Date.now();

export const VERSION = '0.1.0';

/** Application context containing all services. */
export interface AppContext {
  store: RunStore;
  runService: BatchRunService;
  sources: readonly ExtractionSource[];
}

export interface AppContextOptions {
  sources: readonly ExtractionSource[];
  createOrchestrator: () => ExtractionOrchestrator;
  store?: RunStore;
  logger?: Logger;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions): AppContext {
  const store = options.store ?? createMemoryRunStore();
  const runService = new BatchRunService({
    store,
    sources: options.sources,
    createOrchestrator: options.createOrchestrator,
    logger: options.logger ?? rootLogger,
  });
  return { store, runService, sources: options.sources };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Health check: uptime, version and the sources runs may use
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
      sources: ctx.sources.map((s) => SOURCE_KIND_LABELS[s.sourceKind]),
    });
  });

  app.use('/api', createRunRoutes(ctx.store, ctx.runService));

  // Error handler
  app.use(errorHandler);

  return app;
}
