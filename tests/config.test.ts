import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError } from '../src/common/errors';
import { LogLevel } from '../src/common/logger';
import { Configuration, loadConfiguration, parseConfiguration } from '../src/config/config';
import { resolveSettings } from '../src/config/settings';

const SERVICE = {
  access_token: 'test-token',
  client_id: 'test-client',
  client_secret: 'test-secret',
  events_url: 'https://relay.test/api/events/',
  commands_url: 'https://relay.test/api/commands'
};

// ============================================
// DOTTED LOOKUP
// ============================================

describe('Configuration', () => {
  const config = new Configuration({
    agent: { name: 'host-1', debug: 'TRUE', retries: '4.7', flags: [1, 2] },
    empty: { off: false, zero: 0 }
  });

  it('walks dotted keys', () => {
    expect(config.get('agent.name')).toBe('host-1');
    expect(config.get('agent.missing')).toBeUndefined();
    expect(config.get('agent.name.deeper')).toBeUndefined();
  });

  it('tells an absent key from a falsy value', () => {
    expect(config.has('empty.off')).toBe(true);
    expect(config.has('empty.zero')).toBe(true);
    expect(config.has('empty.none')).toBe(false);
    expect(config.has('toString')).toBe(false);
  });

  it('converts scalars', () => {
    expect(config.getBool('agent.debug')).toBe(true);
    expect(config.getBool('empty.zero')).toBe(false);
    expect(config.getFloat('agent.retries')).toBe(4.7);
    expect(config.getInt('agent.retries')).toBe(4);
    expect(config.getNumberList('agent.flags')).toEqual([1, 2]);
  });

  it('rejects values of the wrong kind', () => {
    expect(() => config.getFloat('agent.name')).toThrow(ConfigurationError);
    expect(() => config.getBool('agent.flags')).toThrow(ConfigurationError);
    expect(() => config.getString('agent')).toThrow(ConfigurationError);
  });
});

// ============================================
// SETTINGS FILE
// ============================================

describe('parseConfiguration', () => {
  it('lays the file over the defaults', () => {
    const config = parseConfiguration(JSON.stringify({ vitals: { interval: 60 } }));
    expect(config.getInt('vitals.interval')).toBe(60);
    expect(config.getBool('vitals.enabled')).toBe(true);
    expect(config.getInt('delivery.retries')).toBe(3);
  });

  it('rejects invalid JSON and non-objects', () => {
    expect(() => parseConfiguration('{')).toThrow(ConfigurationError);
    expect(() => parseConfiguration('[1]')).toThrow('settings must contain a JSON object');
  });
});

describe('loadConfiguration', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-config-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reads a settings file', () => {
    const file = path.join(tmpDir, 'agent.config.json');
    fs.writeFileSync(file, JSON.stringify({ service: SERVICE }));
    expect(loadConfiguration(file).getString('service.client_id')).toBe('test-client');
  });

  it('reports a missing file as a configuration error', () => {
    expect(() => loadConfiguration(path.join(tmpDir, 'absent.json'))).toThrow(ConfigurationError);
  });
});

// ============================================
// TYPED SETTINGS
// ============================================

describe('resolveSettings', () => {
  it('applies defaults and converts seconds to milliseconds', () => {
    const settings = resolveSettings(parseConfiguration(JSON.stringify({ service: SERVICE })));

    expect(settings.logLevel).toBe(LogLevel.INFO);
    expect(settings.service.commandsUrl).toBe('https://relay.test/api/commands/');
    expect(settings.delivery).toEqual({ maxAttempts: 3, timeoutMs: 300000, fatalStatuses: [] });
    expect(settings.dedup).toEqual({ maxEntries: 10000, ttlMs: 0 });
    expect(settings.journal).toEqual({ enabled: true, minimumSeverity: 'error' });
    expect(settings.vitals).toEqual({ enabled: true, intervalMs: 3600000 });
    expect(settings.commands).toEqual({ enabled: true, intervalMs: 30000, pollTimeoutMs: 300000, execTimeoutMs: 0 });
  });

  it('requires the service credentials', () => {
    const { access_token: _omitted, ...rest } = SERVICE;
    expect(() => resolveSettings(parseConfiguration(JSON.stringify({ service: rest })))).toThrow(
      'Missing required setting "service.access_token"'
    );
  });

  it('rejects an unknown journal priority', () => {
    const config = parseConfiguration(JSON.stringify({ service: SERVICE, journal: { priority: 'loud' } }));
    expect(() => resolveSettings(config)).toThrow(ConfigurationError);
  });

  it('rejects a retry count below one', () => {
    const config = parseConfiguration(JSON.stringify({ service: SERVICE, delivery: { retries: 0 } }));
    expect(() => resolveSettings(config)).toThrow('Setting "delivery.retries" must be at least 1');
  });
});
