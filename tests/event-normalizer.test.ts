import {
  normalizeEventLogRecord,
  normalizeJournalEntry,
  normalizeRecord,
  renderValue
} from '../src/service/event-normalizer';
import { RawEventRecord, RawFieldValue } from '../src/types';

const NOW = new Date('2024-03-01T12:00:00.000Z');

function toRawRecord(fields: Record<string, RawFieldValue>): RawEventRecord {
  return new Map(Object.entries(fields));
}

// ============================================
// VALUE RENDERING
// ============================================

describe('renderValue', () => {
  it('keeps strings as they are', () => {
    expect(renderValue('disk full')).toBe('disk full');
  });

  it('renders numbers, booleans and bigints as text', () => {
    expect(renderValue(3)).toBe('3');
    expect(renderValue(true)).toBe('true');
    expect(renderValue(12345678901234567890n)).toBe('12345678901234567890');
  });

  it('renders missing values as empty strings', () => {
    expect(renderValue(null)).toBe('');
    expect(renderValue(undefined)).toBe('');
  });

  it('renders dates as ISO-8601', () => {
    expect(renderValue(new Date('2024-01-02T03:04:05.000Z'))).toBe('2024-01-02T03:04:05.000Z');
  });

  it('renders arrays and objects as JSON', () => {
    expect(renderValue(['a', 1])).toBe('["a",1]');
    expect(renderValue({ when: new Date('2024-01-02T03:04:05.000Z'), n: 2n })).toBe(
      '{"when":"2024-01-02T03:04:05.000Z","n":"2"}'
    );
  });
});

// ============================================
// JOURNAL ENTRIES
// ============================================

describe('normalizeJournalEntry', () => {
  it('lower-cases every field name and keeps the source order', () => {
    const entry: RawEventRecord = new Map<string, RawFieldValue>([
      ['MESSAGE', 'disk full'],
      ['PRIORITY', '3'],
      ['_PID', 42]
    ]);

    const event = normalizeJournalEntry(entry, NOW);

    expect(event).toEqual({
      event_date: '2024-03-01T12:00:00.000Z',
      source: 'journald',
      properties: [
        { name: 'message', value: 'disk full' },
        { name: 'priority', value: '3' },
        { name: '_pid', value: '42' }
      ]
    });
  });

  it('returns a frozen event', () => {
    const event = normalizeJournalEntry(new Map([['MESSAGE', 'x']]), NOW);
    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.properties)).toBe(true);
  });

  it('serializes to the wire shape', () => {
    const event = normalizeRecord('journald', toRawRecord({ MESSAGE: 'x' }), NOW);
    expect(JSON.stringify(event)).toBe(
      '{"event_date":"2024-03-01T12:00:00.000Z","source":"journald","properties":[{"name":"message","value":"x"}]}'
    );
  });
});

// ============================================
// EVENT-LOG RECORDS
// ============================================

describe('normalizeEventLogRecord', () => {
  it('leads with message and priority and keeps only allow-listed members', () => {
    const record: RawEventRecord = new Map<string, string | number | Date | string[]>([
      ['EventID', 7031],
      ['SourceName', 'Service Control Manager'],
      ['MachineName', 'HOST-1'],
      ['TimeGenerated', new Date('2024-02-29T23:59:59.000Z')],
      ['Data', ['Spooler', '1']]
    ]);

    const event = normalizeEventLogRecord(record, 'The Spooler service terminated.', '2', NOW);

    expect(event.source).toBe('eventlog');
    expect(event.properties).toEqual([
      { name: 'message', value: 'The Spooler service terminated.' },
      { name: 'priority', value: '2' },
      { name: 'eventid', value: '7031' },
      { name: 'sourcename', value: 'Service Control Manager' },
      { name: 'timegenerated', value: '2024-02-29T23:59:59.000Z' },
      { name: 'data', value: '["Spooler","1"]' }
    ]);
  });
});
