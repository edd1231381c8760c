/**
 * Linkpage PDF Flow: publish a PDF to a new linkpage with a QR code.
 *
 * Public exports for programmatic use. The command-line entry lives in
 * `cli.ts`.
 */

export * from './domain';
export * from './adapters';
export * from './engine';
export * from './storage';
export { HttpTransport, DEFAULT_TIMEOUT_MS } from './transport/http-transport';
export type {
  FetchInit,
  FetchLike,
  FetchResponseLike,
  HttpMethod,
  HttpResponse,
  HttpTransportOptions,
  VendorRequest,
} from './transport/http-transport';
export { ConfigError, loadConfig, loadEnvFile } from './config';
export type { FlowConfig } from './config';
export {
  LogLevel,
  createLogger,
  jsonLogHandler,
  logger,
  setLogHandler,
  setLogLevel,
  textLogHandler,
} from './logger';
export type { LogEntry, LogHandler, Logger } from './logger';
