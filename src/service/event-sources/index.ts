import { ComponentLogger } from '../../common/logger';
import { RawEventRecord } from '../../types';
import { JournalEventSource } from './journal-source';
import { EventLogRecord, WindowsEventLogSource } from './windows-event-log-source';
import { EventSource } from './types';

export type PlatformEventSource =
  | { kind: 'journal'; source: EventSource<RawEventRecord> }
  | { kind: 'eventlog'; source: EventSource<EventLogRecord> };

/**
 * Pick the log source for this host. Decided once at start-up.
 */
export function selectEventSource(
  platform: NodeJS.Platform,
  logger: ComponentLogger
): PlatformEventSource | null {
  switch (platform) {
    case 'linux':
      return { kind: 'journal', source: new JournalEventSource(logger) };
    case 'win32':
      return { kind: 'eventlog', source: new WindowsEventLogSource(logger) };
    default:
      return null;
  }
}

export * from './types';
export { JournalEventSource, parseJournalLine } from './journal-source';
export { WindowsEventLogSource, parseEventLogLine } from './windows-event-log-source';
export type { EventLogRecord } from './windows-event-log-source';
export { LineSubscription } from './line-subscription';
export type { SpawnFn, SpawnedProcess } from './line-subscription';
