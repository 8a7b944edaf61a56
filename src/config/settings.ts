import { ConfigurationError } from '../common/errors';
import { LogLevel, parseLogLevel } from '../common/logger';
import { SEVERITY_PRIORITY, Severity } from '../types';
import { Configuration } from './config';

export interface ServiceSettings {
  accessToken: string;
  clientId: string;
  clientSecret: string;
  eventsUrl: string;
  commandsUrl: string;
}

export interface DeliverySettings {
  maxAttempts: number;
  timeoutMs: number;
  fatalStatuses: number[];
}

export interface AgentSettings {
  logDir: string;
  logLevel: LogLevel;
  service: ServiceSettings;
  delivery: DeliverySettings;
  dedup: {
    maxEntries: number;
    ttlMs: number;
  };
  journal: {
    enabled: boolean;
    minimumSeverity: Severity;
  };
  eventLog: {
    enabled: boolean;
  };
  vitals: {
    enabled: boolean;
    intervalMs: number;
  };
  commands: {
    enabled: boolean;
    intervalMs: number;
    pollTimeoutMs: number;
    execTimeoutMs: number;
  };
}

function requireString(config: Configuration, key: string): string {
  const value = config.getString(key);
  if (value === undefined || value.trim() === '') {
    throw new ConfigurationError(`Missing required setting "${key}"`, key);
  }
  return value;
}

function positiveInt(config: Configuration, key: string, fallback: number): number {
  const value = config.getInt(key) ?? fallback;
  if (value < 1) {
    throw new ConfigurationError(`Setting "${key}" must be at least 1`, key);
  }
  return value;
}

function isSeverity(value: string): value is Severity {
  return Object.prototype.hasOwnProperty.call(SEVERITY_PRIORITY, value);
}

function severity(config: Configuration, key: string, fallback: Severity): Severity {
  const value = config.getString(key);
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.toLowerCase();
  if (!isSeverity(normalized)) {
    throw new ConfigurationError(`Setting "${key}" must be one of ${Object.keys(SEVERITY_PRIORITY).join(', ')}`, key);
  }
  return normalized;
}

/** URLs the agent appends paths to must end with a slash. */
function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

/**
 * Resolve the typed agent settings. Missing service credentials or URLs are
 * start-up errors.
 */
export function resolveSettings(config: Configuration): AgentSettings {
  return {
    logDir: config.getString('agent.log_dir') ?? './logs',
    logLevel: parseLogLevel(config.getString('agent.log_level')),
    service: {
      accessToken: requireString(config, 'service.access_token'),
      clientId: requireString(config, 'service.client_id'),
      clientSecret: requireString(config, 'service.client_secret'),
      eventsUrl: requireString(config, 'service.events_url'),
      commandsUrl: withTrailingSlash(requireString(config, 'service.commands_url'))
    },
    delivery: {
      maxAttempts: positiveInt(config, 'delivery.retries', 3),
      timeoutMs: positiveInt(config, 'delivery.timeout', 300) * 1000,
      fatalStatuses: config.getNumberList('delivery.fatal_statuses') ?? []
    },
    dedup: {
      maxEntries: positiveInt(config, 'dedup.max_entries', 10000),
      ttlMs: Math.max(0, config.getFloat('dedup.ttl') ?? 0) * 1000
    },
    journal: {
      enabled: config.getBool('journal.enabled') ?? true,
      minimumSeverity: severity(config, 'journal.priority', 'error')
    },
    eventLog: {
      enabled: config.getBool('eventlog.enabled') ?? true
    },
    vitals: {
      enabled: config.getBool('vitals.enabled') ?? true,
      intervalMs: positiveInt(config, 'vitals.interval', 3600) * 1000
    },
    commands: {
      enabled: config.getBool('commands.enabled') ?? true,
      intervalMs: positiveInt(config, 'commands.interval', 30) * 1000,
      pollTimeoutMs: positiveInt(config, 'commands.poll_timeout', 300) * 1000,
      execTimeoutMs: Math.max(0, config.getInt('commands.exec_timeout') ?? 0) * 1000
    }
  };
}
