// event-normalizer.ts - raw source records to canonical LogEvents
import { EventSourceTag, LogEvent, LogProperty, RawEventRecord, RawFieldValue } from '../types';

/**
 * Members of a classic event-log record that are forwarded. Everything
 * else the record carries is dropped.
 */
export const EVENT_LOG_MEMBERS: ReadonlySet<string> = new Set([
  'ClosingRecordNumber',
  'Data',
  'EventCategory',
  'EventID',
  'EventType',
  'RecordNumber',
  'Reserved',
  'ReservedFlags',
  'Sid',
  'SourceName',
  'TimeGenerated',
  'TimeWritten'
]);

function toJsonValue(value: RawFieldValue): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, inner]) => [key, toJsonValue(inner)]));
  }
  return value;
}

/**
 * Render one field value as a property string.
 */
export function renderValue(value: RawFieldValue): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) || typeof value === 'object') {
    return JSON.stringify(toJsonValue(value));
  }
  return String(value);
}

function property(name: string, value: RawFieldValue): LogProperty {
  return Object.freeze({ name: name.toLowerCase(), value: renderValue(value) });
}

function buildEvent(source: EventSourceTag, properties: LogProperty[], now: Date): LogEvent {
  return Object.freeze({
    event_date: now.toISOString(),
    source,
    properties: Object.freeze(properties)
  });
}

/**
 * Every field of the record, in the order the source produced them.
 */
export function normalizeRecord(source: EventSourceTag, record: RawEventRecord, now: Date = new Date()): LogEvent {
  const properties: LogProperty[] = [];
  for (const [name, value] of record) {
    properties.push(property(name, value));
  }
  return buildEvent(source, properties, now);
}

export function normalizeJournalEntry(entry: RawEventRecord, now: Date = new Date()): LogEvent {
  return normalizeRecord('journald', entry, now);
}

/**
 * Event-log records lead with the formatted message and the record's level,
 * followed by the allow-listed members.
 */
export function normalizeEventLogRecord(
  record: RawEventRecord,
  message: string,
  level: string,
  now: Date = new Date()
): LogEvent {
  const properties: LogProperty[] = [property('message', message), property('priority', level)];
  for (const [name, value] of record) {
    if (EVENT_LOG_MEMBERS.has(name)) {
      properties.push(property(name, value));
    }
  }
  return buildEvent('eventlog', properties, now);
}
