import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RelayAgent } from '../src/agent';
import { ConfigurationError, KeyLoadError } from '../src/common/errors';
import { parseConfiguration } from '../src/config/config';
import { CommandExecutor } from '../src/execution/command-executor';
import { VitalsCollector } from '../src/monitoring/vitals-collector';
import { NodeVitalsHost } from '../src/monitoring/vitals-host';
import { DeliveryClient } from '../src/server/delivery-client';
import { DedupFilter } from '../src/service/dedup-filter';
import { EventSource, SubscriptionHandle } from '../src/service/event-sources';
import { commandHandler, eventLogHandler, journalHandler, vitalsHandler } from '../src/service/monitors';
import { RawEventRecord, SeverityFilter } from '../src/types';
import { FakeTransport, createMockLogger, createSecurity, flushPromises, response, testKeyPair } from './helpers';

const EVENTS_URL = 'https://relay.test/api/events/';
const NOW = new Date('2024-03-01T12:00:00.000Z');

const logger = createMockLogger();
let transport: FakeTransport;

function postedJson(index: number): unknown {
  return JSON.parse(transport.posts[index].body.toString('utf8'));
}

class FakeJournal implements EventSource<RawEventRecord> {
  readonly name = 'journald';
  filters: SeverityFilter[] = [];
  unsubscribed: boolean = false;
  private onEvent: ((event: RawEventRecord) => void) | null = null;

  subscribe(filter: SeverityFilter, onEvent: (event: RawEventRecord) => void): SubscriptionHandle {
    this.filters.push(filter);
    this.onEvent = onEvent;
    return { unsubscribe: () => { this.unsubscribed = true; } };
  }

  emit(fields: Record<string, string>): void {
    this.onEvent?.(new Map(Object.entries(fields)));
  }
}

beforeEach(() => {
  jest.clearAllMocks();
  transport = new FakeTransport().replyToPost(response(201));
});

// ============================================
// MONITOR HANDLERS
// ============================================

describe('journalHandler', () => {
  function handler(): (entry: RawEventRecord) => Promise<void> {
    const delivery = new DeliveryClient(createSecurity(), transport, logger);
    return journalHandler({ delivery, dedup: new DedupFilter(), eventsUrl: EVENTS_URL, logger, now: () => NOW });
  }

  it('delivers a normalized event', async () => {
    await handler()(new Map([['MESSAGE', 'disk full'], ['PRIORITY', '3']]));

    expect(transport.posts[0].url).toBe(EVENTS_URL);
    expect(postedJson(0)).toEqual({
      event_date: '2024-03-01T12:00:00.000Z',
      source: 'journald',
      properties: [
        { name: 'message', value: 'disk full' },
        { name: 'priority', value: '3' }
      ]
    });
  });

  it('drops repeated messages and records without one', async () => {
    const handle = handler();
    await handle(new Map([['MESSAGE', 'disk full']]));
    await handle(new Map([['MESSAGE', 'disk full'], ['_PID', '2']]));
    await handle(new Map([['PRIORITY', '3']]));
    await handle(new Map([['MESSAGE', '']]));

    expect(transport.posts).toHaveLength(1);
  });
});

describe('eventLogHandler', () => {
  it('delivers a normalized event-log record', async () => {
    const delivery = new DeliveryClient(createSecurity(), transport, logger);
    const handle = eventLogHandler({ delivery, eventsUrl: EVENTS_URL, logger, now: () => NOW });

    await handle({ message: 'Service stopped', level: '2', record: new Map([['EventID', 7036]]) });

    expect(postedJson(0)).toEqual({
      event_date: '2024-03-01T12:00:00.000Z',
      source: 'eventlog',
      properties: [
        { name: 'message', value: 'Service stopped' },
        { name: 'priority', value: '2' },
        { name: 'eventid', value: '7036' }
      ]
    });
  });

  it('delivers repeated and empty-message records', async () => {
    const delivery = new DeliveryClient(createSecurity(), transport, logger);
    const handle = eventLogHandler({ delivery, eventsUrl: EVENTS_URL, logger, now: () => NOW });
    const record = { message: 'Service stopped', level: '2', record: new Map([['EventID', 7036]]) };

    await handle(record);
    await handle(record);
    await handle({ message: '', level: '2', record: new Map([['EventID', 1000]]) });

    expect(transport.posts).toHaveLength(3);
    expect(postedJson(2)).toEqual({
      event_date: '2024-03-01T12:00:00.000Z',
      source: 'eventlog',
      properties: [
        { name: 'message', value: '' },
        { name: 'priority', value: '2' },
        { name: 'eventid', value: '1000' }
      ]
    });
  });
});

describe('vitalsHandler', () => {
  it('sends the tree as an indented JSON string', async () => {
    const delivery = new DeliveryClient(createSecurity(), transport, logger);
    const collector = new VitalsCollector(new NodeVitalsHost(), logger);
    jest.spyOn(collector, 'collect').mockResolvedValue({ boot_time: { boot_time: '2024-03-01T11:00:00.000Z' } });

    await vitalsHandler(collector, delivery, EVENTS_URL)(1);

    expect(postedJson(0)).toEqual({
      vitals: '{\n    "boot_time": {\n        "boot_time": "2024-03-01T11:00:00.000Z"\n    }\n}'
    });
  });
});

describe('commandHandler', () => {
  it('runs one polling cycle per tick', async () => {
    const security = createSecurity();
    const delivery = new DeliveryClient(security, transport, logger);
    const executor = new CommandExecutor('https://relay.test/api/commands/', delivery, transport, security, logger);
    const run = jest.spyOn(executor, 'run').mockResolvedValue(0);

    await commandHandler(executor)(1);

    expect(run).toHaveBeenCalledTimes(1);
  });
});

// ============================================
// AGENT
// ============================================

function agentConfig(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    service: {
      access_token: 'test-token',
      client_id: 'test-client',
      client_secret: Buffer.from(testKeyPair().privateKey, 'utf8').toString('base64'),
      events_url: EVENTS_URL,
      commands_url: 'https://relay.test/api/commands/'
    },
    vitals: { enabled: false },
    commands: { enabled: false },
    ...overrides
  });
}

describe('RelayAgent', () => {
  it('fails to start with an unusable key', () => {
    const config = parseConfiguration(
      JSON.stringify({
        service: {
          access_token: 'test-token',
          client_id: 'test-client',
          client_secret: 'test-secret',
          events_url: EVENTS_URL,
          commands_url: 'https://relay.test/api/commands/'
        }
      })
    );
    expect(() => new RelayAgent(config, { logger, transport })).toThrow(KeyLoadError);
  });

  it('fails to start without service settings', () => {
    expect(() => new RelayAgent(parseConfiguration('{}'), { logger, transport })).toThrow(ConfigurationError);
  });

  it('loads its settings from a file', () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-agent-test-'));
    try {
      const file = path.join(tmpDir, 'agent.config.json');
      fs.writeFileSync(file, agentConfig());
      expect(RelayAgent.fromFile(file, { logger, transport, eventSource: null }).isRunning).toBe(false);
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it('relays journal records until stopped', async () => {
    const journal = new FakeJournal();
    const agent = new RelayAgent(parseConfiguration(agentConfig({ journal: { priority: 'warning' } })), {
      logger,
      transport,
      eventSource: { kind: 'journal', source: journal }
    });

    agent.start();
    expect(journal.filters).toEqual([{ minimum: 'warning' }]);

    journal.emit({ MESSAGE: 'disk full' });
    journal.emit({ MESSAGE: 'disk full' });
    journal.emit({ MESSAGE: 'fan failure' });
    await flushPromises();

    expect(transport.posts).toHaveLength(2);
    expect(agent.getStatistics()).toEqual([{ name: 'journal', state: 'waiting', processed: 3, failed: 0 }]);

    await agent.stop();
    expect(journal.unsubscribed).toBe(true);
    expect(agent.isRunning).toBe(false);
  });

  it('polls for commands straight away when enabled', async () => {
    transport.replyToGet(response(200, '[]'));
    const agent = new RelayAgent(parseConfiguration(agentConfig({ commands: { enabled: true } })), {
      logger,
      transport,
      eventSource: null
    });

    agent.start();
    await new Promise(resolve => setTimeout(resolve, 20));

    expect(transport.gets.map(request => request.url)).toEqual(['https://relay.test/api/commands/?status=pending']);
    await agent.stop();
  });

  it('runs without a log source on other platforms', async () => {
    const agent = new RelayAgent(parseConfiguration(agentConfig()), { logger, transport, platform: 'darwin' });

    agent.start();

    expect(logger.warn).toHaveBeenCalledWith('No system log source for this platform; log monitoring is off');
    expect(agent.getStatistics()).toEqual([]);
    await agent.stop();
  });
});
