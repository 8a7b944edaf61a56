// monitors.ts - the agent's monitor loops and what each does with an item
import { ComponentLogger } from '../common/logger';
import { CommandExecutor } from '../execution/command-executor';
import { VitalsCollector } from '../monitoring/vitals-collector';
import { DeliveryClient } from '../server/delivery-client';
import { LogEvent, RawEventRecord, SeverityFilter, VitalsEvent } from '../types';
import { DedupFilter } from './dedup-filter';
import { normalizeEventLogRecord, normalizeJournalEntry, renderValue } from './event-normalizer';
import { EventLogRecord, EventSource } from './event-sources';
import { MonitorHandler, MonitorLoop } from './monitor-loop';
import { IntervalStream, SubscriptionStream } from './streams';

export interface LogMonitorDeps {
  delivery: DeliveryClient;
  eventsUrl: string;
  logger: ComponentLogger;
  now?: () => Date;
}

export interface JournalMonitorDeps extends LogMonitorDeps {
  dedup: DedupFilter;
}

const LOG_EVENT_LABEL = 'system log event';

async function sendLogEvent(deps: LogMonitorDeps, event: LogEvent): Promise<void> {
  await deps.delivery.deliverJson(deps.eventsUrl, event, { label: LOG_EVENT_LABEL });
}

/**
 * Journal records without a MESSAGE field, and messages already delivered,
 * are dropped.
 */
export function journalHandler(deps: JournalMonitorDeps): MonitorHandler<RawEventRecord> {
  const now = deps.now ?? (() => new Date());
  return async entry => {
    const message = entry.get('MESSAGE');
    if (message === undefined || message === null) {
      return;
    }
    if (!deps.dedup.shouldEmit(renderValue(message))) {
      return;
    }
    await sendLogEvent(deps, normalizeJournalEntry(entry, now()));
  };
}

/** Every event-log record is delivered, repeats and empty messages included. */
export function eventLogHandler(deps: LogMonitorDeps): MonitorHandler<EventLogRecord> {
  const now = deps.now ?? (() => new Date());
  return async ({ message, level, record }) => {
    await sendLogEvent(deps, normalizeEventLogRecord(record, message, level, now()));
  };
}

export function vitalsHandler(
  collector: VitalsCollector,
  delivery: DeliveryClient,
  eventsUrl: string
): MonitorHandler<number> {
  return async () => {
    const tree = await collector.collect();
    const event: VitalsEvent = { vitals: JSON.stringify(tree, null, 4) };
    await delivery.deliverJson(eventsUrl, event, { label: 'vitals report' });
  };
}

export function commandHandler(executor: CommandExecutor): MonitorHandler<number> {
  return async () => {
    await executor.run();
  };
}

export function createJournalMonitor(
  source: EventSource<RawEventRecord>,
  filter: SeverityFilter,
  deps: JournalMonitorDeps
): MonitorLoop<RawEventRecord> {
  return new MonitorLoop('journal', new SubscriptionStream(source, filter), journalHandler(deps), deps.logger);
}

export function createEventLogMonitor(
  source: EventSource<EventLogRecord>,
  filter: SeverityFilter,
  deps: LogMonitorDeps
): MonitorLoop<EventLogRecord> {
  return new MonitorLoop('eventlog', new SubscriptionStream(source, filter), eventLogHandler(deps), deps.logger);
}

/** Collects straight away, then once per interval. */
export function createVitalsMonitor(
  collector: VitalsCollector,
  delivery: DeliveryClient,
  eventsUrl: string,
  intervalMs: number,
  logger: ComponentLogger
): MonitorLoop<number> {
  return new MonitorLoop(
    'vitals',
    new IntervalStream(intervalMs, { immediate: true }),
    vitalsHandler(collector, delivery, eventsUrl),
    logger
  );
}

export function createCommandMonitor(
  executor: CommandExecutor,
  intervalMs: number,
  logger: ComponentLogger
): MonitorLoop<number> {
  return new MonitorLoop('commands', new IntervalStream(intervalMs, { immediate: true }), commandHandler(executor), logger);
}
