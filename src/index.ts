/**
 * deny-ledger: extraction and normalization of denied AI-assistant actions.
 *
 * Library entry point. The executable lives in cli.ts.
 */

export * from './domain';
export * from './classification';
export * from './retrieval/query-endpoint';
export * from './retrieval/paged-retriever';
export * from './credentials/credential-source';
export * from './sinks/sink';
export { CsvFileSink } from './sinks/csv-file-sink';
export type { CsvFileSinkOptions } from './sinks/csv-file-sink';
export { MemorySink } from './sinks/memory-sink';
export * from './engine/state-machine';
export * from './engine/extraction-job';
export * from './engine/orchestrator';
export * from './engine/summary';
export * from './engine/run-service';
export * from './export/evidence-exporter';
export * from './notifications/webhook';
export * from './config/config';
export * from './storage/store';
export { MemoryRunStore, createMemoryRunStore } from './storage/memory-store';
export { createRuntime } from './runtime';
export type { Runtime, RuntimeOverrides } from './runtime';
export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOptions } from './server';
export { createLogger, setLogHandler, setLogLevel, resetLogHandler, parseLogLevel, LogLevel, logger } from './logger';
export type { Logger, LogEntry, LogHandler } from './logger';
