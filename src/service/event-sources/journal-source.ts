import { ComponentLogger } from '../../common/logger';
import { RawEventRecord, RawFieldValue, SEVERITY_PRIORITY, SeverityFilter } from '../../types';
import { LineSubscription, SpawnFn, parseJsonObject, toRawFieldValue } from './line-subscription';
import { EventSource, SubscriptionHandle } from './types';

const SOURCE_NAME = 'journald';

// Journal fields holding microseconds since the epoch.
const REALTIME_FIELDS = new Set(['__REALTIME_TIMESTAMP', '_SOURCE_REALTIME_TIMESTAMP']);

function toTimestamp(value: RawFieldValue): RawFieldValue {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    return value;
  }
  return new Date(Number(BigInt(value) / 1000n));
}

/**
 * Parse one `journalctl --output=json` line. Realtime timestamps become
 * Dates; every other field is kept as the journal wrote it.
 */
export function parseJournalLine(line: string): RawEventRecord {
  const fields = parseJsonObject(line, SOURCE_NAME);
  const record: RawEventRecord = new Map();
  for (const [name, value] of Object.entries(fields)) {
    const raw = toRawFieldValue(value);
    record.set(name, REALTIME_FIELDS.has(name) ? toTimestamp(raw) : raw);
  }
  return record;
}

export function journalctlArgs(filter: SeverityFilter): string[] {
  return [
    '--follow',
    '--output=json',
    '--lines=0',
    '--all',
    `--priority=${SEVERITY_PRIORITY[filter.minimum]}`
  ];
}

/**
 * Follows the systemd journal from its tail.
 */
export class JournalEventSource implements EventSource<RawEventRecord> {
  readonly name = SOURCE_NAME;

  constructor(
    private readonly logger: ComponentLogger,
    private readonly options: { spawnProcess?: SpawnFn; restartDelayMs?: number; command?: string } = {}
  ) {}

  subscribe(filter: SeverityFilter, onEvent: (event: RawEventRecord) => void): SubscriptionHandle {
    const subscription = new LineSubscription<RawEventRecord>({
      name: this.name,
      command: this.options.command ?? 'journalctl',
      args: journalctlArgs(filter),
      parseLine: parseJournalLine,
      onRecord: onEvent,
      logger: this.logger,
      spawnProcess: this.options.spawnProcess,
      restartDelayMs: this.options.restartDelayMs
    });
    subscription.start();
    return subscription;
  }
}
