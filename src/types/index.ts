// Type definitions shared with the service API

import { z } from 'zod';

export interface LogProperty {
  readonly name: string;
  readonly value: string;
}

export interface LogEvent {
  /** ISO-8601 time the event was built. */
  readonly event_date: string;
  readonly source: EventSourceTag;
  readonly properties: readonly LogProperty[];
}

export type EventSourceTag = 'journald' | 'eventlog';

export interface VitalsEvent {
  /** The vitals tree serialized as JSON. */
  vitals: string;
}

export const SERVER_COMMAND_STATUSES = ['requested', 'pending', 'completed', 'canceled', 'rejected'] as const;

export type ServerCommandStatus = typeof SERVER_COMMAND_STATUSES[number];

export const ServerCommandSchema = z.object({
  id: z.string().uuid(),
  create_date: z.string(),
  channel_id: z.string(),
  server_id: z.string().uuid(),
  thread_id: z.string().nullish(),
  user_id: z.string().uuid(),
  channel_name: z.string(),
  server_name: z.string(),
  user_name: z.string(),
  query: z.string(),
  command: z.string(),
  status: z.enum(SERVER_COMMAND_STATUSES),
  notification_url: z.string().nullish()
});

export type ServerCommand = z.infer<typeof ServerCommandSchema>;

export interface ServerCommandResult {
  start_date: string;
  end_date: string;
  /** Run time in seconds. */
  total_time: number;
  exit_code: number;
  stdout?: string;
  stderr?: string;
}

// Raw records handed over by the event sources. A Map keeps the fields in
// the order the source produced them.
export type RawFieldValue = string | number | boolean | bigint | Date | null | undefined | RawFieldValue[] | { [key: string]: RawFieldValue };

export type RawEventRecord = Map<string, RawFieldValue>;

export type Severity = 'emergency' | 'alert' | 'critical' | 'error' | 'warning' | 'notice' | 'info' | 'debug';

/** Syslog priority numbers; lower is more severe. */
export const SEVERITY_PRIORITY: Record<Severity, number> = {
  emergency: 0,
  alert: 1,
  critical: 2,
  error: 3,
  warning: 4,
  notice: 5,
  info: 6,
  debug: 7
};

export interface SeverityFilter {
  /** Least severe level that is still delivered. */
  minimum: Severity;
}

// Vitals tree
export type VitalsValue = string | number | boolean | null | VitalsValue[] | { [key: string]: VitalsValue };

export type VitalsTree = { [category: string]: VitalsValue };
