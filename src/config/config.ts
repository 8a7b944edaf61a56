import * as fs from 'fs';
import { ConfigurationError, describeError } from '../common/errors';

export type ConfigValue = string | number | boolean | null | ConfigValue[] | ConfigTree;

export interface ConfigTree {
  [key: string]: ConfigValue;
}

const isTree = (value: ConfigValue | undefined): value is ConfigTree =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Dotted-key lookup over a parsed settings tree. Every accessor returns
 * `undefined` for an absent key, which is distinct from a present but
 * falsy value.
 */
export class Configuration {
  constructor(private readonly data: ConfigTree) {}

  get(key: string): ConfigValue | undefined {
    let current: ConfigValue | undefined = this.data;
    for (const part of key.split('.')) {
      if (!isTree(current) || !Object.prototype.hasOwnProperty.call(current, part)) {
        return undefined;
      }
      current = current[part];
    }
    return current;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  getBool(key: string): boolean | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return undefined;
    }
    if (typeof value === 'boolean') {
      return value;
    }
    if (typeof value === 'number') {
      return value === 1;
    }
    if (typeof value === 'string') {
      return value.toLowerCase() === 'true' || value === '1';
    }
    throw new ConfigurationError(`The value for key "${key}" is not a boolean value.`, key);
  }

  getFloat(key: string): number | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return undefined;
    }
    const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
    if (Number.isNaN(parsed) || (typeof value === 'string' && value.trim() === '')) {
      throw new ConfigurationError(`The value for key "${key}" is not a number.`, key);
    }
    return parsed;
  }

  getInt(key: string): number | undefined {
    const value = this.getFloat(key);
    if (value === undefined) {
      return undefined;
    }
    return Math.trunc(value);
  }

  getString(key: string): string | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return undefined;
    }
    if (isTree(value) || Array.isArray(value)) {
      throw new ConfigurationError(`The value for key "${key}" is not a scalar.`, key);
    }
    return String(value);
  }

  getNumberList(key: string): number[] | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return undefined;
    }
    if (!Array.isArray(value) || value.some(item => typeof item !== 'number')) {
      throw new ConfigurationError(`The value for key "${key}" is not a list of numbers.`, key);
    }
    return value.filter((item): item is number => typeof item === 'number');
  }
}

// ============================================
// SETTINGS FILE
// ============================================

export const DEFAULT_CONFIG_PATH = './agent.config.json';

const defaultTree: ConfigTree = {
  agent: {
    log_dir: './logs',
    log_level: 'info'
  },
  delivery: {
    retries: 3,
    timeout: 300,
    fatal_statuses: []
  },
  dedup: {
    max_entries: 10000,
    ttl: 0
  },
  journal: {
    enabled: true,
    priority: 'error'
  },
  eventlog: {
    enabled: true
  },
  vitals: {
    enabled: true,
    interval: 3600
  },
  commands: {
    enabled: true,
    interval: 30,
    poll_timeout: 300,
    exec_timeout: 0
  }
};

function mergeTrees(base: ConfigTree, override: ConfigTree): ConfigTree {
  const merged: ConfigTree = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = merged[key];
    merged[key] = isTree(existing) && isTree(value) ? mergeTrees(existing, value) : value;
  }
  return merged;
}

function isConfigValue(value: unknown): value is ConfigValue {
  if (value === null || ['string', 'number', 'boolean'].includes(typeof value)) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isConfigValue);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.values(value).every(isConfigValue);
  }
  return false;
}

export function parseConfiguration(text: string, source = 'settings'): Configuration {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${source}: ${describeError(error)}`);
  }

  if (!isConfigValue(parsed) || !isTree(parsed)) {
    throw new ConfigurationError(`${source} must contain a JSON object`);
  }

  return new Configuration(mergeTrees(defaultTree, parsed));
}

/**
 * Load the settings file and lay it over the built-in defaults.
 */
export function loadConfiguration(configPath: string = DEFAULT_CONFIG_PATH): Configuration {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${configPath}: ${describeError(error)}`);
  }
  return parseConfiguration(text, configPath);
}
