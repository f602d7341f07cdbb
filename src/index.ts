export * from './analysis';
export * from './cache';
export * from './config';
export * from './export';
export * from './fetch';
export * from './keywords';
export * from './pipeline';
export * from './provider';
export * from './ratelimit';
export * from './report';
export { systemClock, type Clock } from './utils/clock';
export { describeError, Logger, type LogLevel, type LogSink } from './utils/logger';
