export { RelayAgent } from './agent';
export type { AgentOptions } from './agent';
export { Logger, LogLevel, parseLogLevel } from './common/logger';
export type { ComponentLogger } from './common/logger';
export * from './common/errors';
export { Configuration, DEFAULT_CONFIG_PATH, loadConfiguration, parseConfiguration } from './config/config';
export { resolveSettings } from './config/settings';
export type { AgentSettings } from './config/settings';
export { SecurityProvider } from './security/security-provider';
export type { AuthHeaders, SecurityCredentials } from './security/security-provider';
export { sanitizeLogData } from './security/sanitize';
export { DeliveryClient, DeliveryPolicy, describeErrorBody } from './server/delivery-client';
export type { DeliveryResult, DeliverOptions } from './server/delivery-client';
export { AxiosTransport } from './server/http-transport';
export type { HttpTransport, TransportRequest, TransportResponse } from './server/http-transport';
export { DedupFilter } from './service/dedup-filter';
export { normalizeEventLogRecord, normalizeJournalEntry, normalizeRecord, renderValue } from './service/event-normalizer';
export * from './service/event-sources';
export { MonitorLoop } from './service/monitor-loop';
export type { MonitorHandler, MonitorState, MonitorStatistics } from './service/monitor-loop';
export { IntervalStream, SubscriptionStream } from './service/streams';
export type { EventStream } from './service/streams';
export * from './service/monitors';
export { VitalsCollector, formatSize } from './monitoring/vitals-collector';
export { NodeVitalsHost } from './monitoring/vitals-host';
export type {
  DiskIoCounters,
  FileSystemUsage,
  MountEntry,
  NetworkIoCounters,
  PlatformIdentity,
  SwapUsage,
  VitalsHost
} from './monitoring/vitals-host';
export { CommandExecutor, runInShell } from './execution/command-executor';
export type { ShellOutcome, ShellRunner } from './execution/command-executor';
export * from './types';
