// windows-event-log-source.ts - realtime System log subscription through PowerShell
import { ComponentLogger } from '../../common/logger';
import { SourceReadError } from '../../common/errors';
import { RawEventRecord, Severity, SeverityFilter } from '../../types';
import { LineSubscription, SpawnFn, parseJsonObject, toRawFieldValue } from './line-subscription';
import { EventSource, SubscriptionHandle } from './types';

const SOURCE_NAME = 'eventlog';
const RECORD_PREFIX = 'EVENTLOG_RECORD:';

export interface EventLogRecord {
  /** Formatted event description. */
  message: string;
  /** Numeric event level as the log reports it (1 critical, 2 error, ...). */
  level: string;
  record: RawEventRecord;
}

// Windows levels: 1 critical, 2 error, 3 warning, 4 information, 5 verbose
const WINDOWS_LEVEL: Record<Severity, number> = {
  emergency: 1,
  alert: 1,
  critical: 1,
  error: 2,
  warning: 3,
  notice: 4,
  info: 4,
  debug: 5
};

const TIMESTAMP_MEMBERS = new Set(['TimeGenerated', 'TimeWritten']);

/**
 * XPath query selecting the filter's level and everything more severe,
 * e.g. `*[System[(Level=1 or Level=2)]]` for errors.
 */
export function buildLevelQuery(filter: SeverityFilter): string {
  const highest = WINDOWS_LEVEL[filter.minimum];
  const levels: string[] = [];
  for (let level = 1; level <= highest; level++) {
    levels.push(`Level=${level}`);
  }
  return `*[System[(${levels.join(' or ')})]]`;
}

export function buildWatcherScript(logName: string, query: string): string {
  return `
$ErrorActionPreference = 'Stop'
$query = New-Object System.Diagnostics.Eventing.Reader.EventLogQuery('${logName}', [System.Diagnostics.Eventing.Reader.PathType]::LogName, '${query}')
$watcher = New-Object System.Diagnostics.Eventing.Reader.EventLogWatcher($query)
Register-ObjectEvent -InputObject $watcher -EventName EventRecordWritten -SourceIdentifier RelayEventLog | Out-Null
$watcher.Enabled = $true
while ($true) {
  $evt = Wait-Event -SourceIdentifier RelayEventLog
  Remove-Event -EventIdentifier $evt.EventIdentifier
  $record = $evt.SourceEventArgs.EventRecord
  if ($record -eq $null) { continue }
  $message = ''
  try { $message = $record.FormatDescription() } catch { }
  $payload = [ordered]@{
    Message = $message
    Level = [string]$record.Level
    RecordNumber = $record.RecordId
    EventID = $record.Id
    EventCategory = $record.Task
    EventType = $record.Level
    SourceName = $record.ProviderName
    Sid = if ($record.UserId) { $record.UserId.Value } else { $null }
    TimeGenerated = $record.TimeCreated.ToUniversalTime().ToString('o')
    Data = @($record.Properties | ForEach-Object { [string]$_.Value })
    MachineName = $record.MachineName
    LogName = $record.LogName
  }
  Write-Output ('${RECORD_PREFIX}' + ($payload | ConvertTo-Json -Compress -Depth 4))
}
`.trim();
}

/**
 * Parse one watcher output line. Lines without the record prefix are
 * PowerShell chatter and carry no record.
 */
export function parseEventLogLine(line: string): EventLogRecord | null {
  if (!line.startsWith(RECORD_PREFIX)) {
    return null;
  }

  const fields = parseJsonObject(line.substring(RECORD_PREFIX.length), SOURCE_NAME);
  const message = fields.Message;
  const level = fields.Level;
  if (typeof level !== 'string' && typeof level !== 'number') {
    throw new SourceReadError('Record has no level', SOURCE_NAME);
  }

  const record: RawEventRecord = new Map();
  for (const [name, value] of Object.entries(fields)) {
    if (name === 'Message' || name === 'Level') {
      continue;
    }
    if (TIMESTAMP_MEMBERS.has(name) && typeof value === 'string' && !Number.isNaN(Date.parse(value))) {
      record.set(name, new Date(value));
    } else {
      record.set(name, toRawFieldValue(value));
    }
  }

  return {
    message: typeof message === 'string' ? message : '',
    level: String(level),
    record
  };
}

export class WindowsEventLogSource implements EventSource<EventLogRecord> {
  readonly name = SOURCE_NAME;

  constructor(
    private readonly logger: ComponentLogger,
    private readonly options: { logName?: string; spawnProcess?: SpawnFn; restartDelayMs?: number } = {}
  ) {}

  subscribe(filter: SeverityFilter, onEvent: (event: EventLogRecord) => void): SubscriptionHandle {
    const script = buildWatcherScript(this.options.logName ?? 'System', buildLevelQuery(filter));
    // -EncodedCommand keeps the script clear of shell quoting
    const encodedCommand = Buffer.from(script, 'utf16le').toString('base64');

    const subscription = new LineSubscription<EventLogRecord>({
      name: this.name,
      command: 'powershell.exe',
      args: ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-EncodedCommand', encodedCommand],
      parseLine: parseEventLogLine,
      onRecord: onEvent,
      logger: this.logger,
      spawnProcess: this.options.spawnProcess,
      restartDelayMs: this.options.restartDelayMs
    });
    subscription.start();
    return subscription;
  }
}
