export { logger, log, setLogLevel, getLogLevel, errorFields } from './logger';
export type { LogLevel, LogEntry } from './logger';
export { RecordStoreQueryLogger } from './drizzle-logger';
