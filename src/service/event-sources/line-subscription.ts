// line-subscription.ts - long-running child process that prints one record per line
import { spawn } from 'child_process';
import { ComponentLogger } from '../../common/logger';
import { SourceReadError, describeError } from '../../common/errors';
import { RawFieldValue } from '../../types';
import { SubscriptionHandle } from './types';

/**
 * The parts of a child process the subscription touches. Node's
 * ChildProcess satisfies it; tests hand in an EventEmitter with streams.
 */
export interface SpawnedProcess {
  readonly stdout: NodeJS.ReadableStream;
  readonly stderr: NodeJS.ReadableStream;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFn = (command: string, args: readonly string[]) => SpawnedProcess;

export const spawnSubscriptionProcess: SpawnFn = (command, args) =>
  spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true, shell: false });

/**
 * Split a buffer into complete lines; the unterminated tail is returned as
 * the remainder for the next chunk.
 */
export function splitLines(buffer: string): { lines: string[]; remainder: string } {
  const lines = buffer.split('\n');
  const remainder = lines.pop() ?? '';
  return { lines: lines.map(line => line.replace(/\r$/, '')), remainder };
}

/**
 * Parse one line of JSON into a plain object or throw.
 */
export function parseJsonObject(line: string, source: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    throw new SourceReadError(`Unparseable record: ${describeError(error)}`, source, { cause: error });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new SourceReadError('Record is not a JSON object', source);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function toRawFieldValue(value: unknown): RawFieldValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toRawFieldValue);
  }
  if (typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, inner]) => [key, toRawFieldValue(inner)]));
  }
  return String(value);
}

export interface LineSubscriptionOptions<T> {
  /** Source identifier used in logs and errors. */
  name: string;
  command: string;
  args: readonly string[];
  /** Returns `null` for lines that carry no record. Throws SourceReadError for bad ones. */
  parseLine: (line: string) => T | null;
  onRecord: (record: T) => void;
  logger: ComponentLogger;
  spawnProcess?: SpawnFn;
  restartDelayMs?: number;
}

/**
 * Runs the subscription process, turns its stdout into records and respawns
 * it when it dies until unsubscribed.
 */
export class LineSubscription<T> implements SubscriptionHandle {
  private child: SpawnedProcess | null = null;
  private buffer: string = '';
  private stopped: boolean = false;
  private restartTimer: NodeJS.Timeout | null = null;
  private readonly spawnProcess: SpawnFn;
  private readonly restartDelayMs: number;

  constructor(private readonly options: LineSubscriptionOptions<T>) {
    this.spawnProcess = options.spawnProcess ?? spawnSubscriptionProcess;
    this.restartDelayMs = options.restartDelayMs ?? 30000;
  }

  start(): void {
    if (this.stopped || this.child) {
      return;
    }

    const { name, command, args, logger } = this.options;
    logger.info(`Subscribing to ${name}`, { command });

    let child: SpawnedProcess;
    try {
      child = this.spawnProcess(command, args);
    } catch (error) {
      logger.error(`Failed to start the ${name} subscription`, error);
      this.scheduleRestart();
      return;
    }

    this.child = child;
    this.buffer = '';

    child.stdout.setEncoding('utf8');
    child.stdout.on('data', (chunk: string | Buffer) => this.consume(chunk.toString()));
    child.stderr.on('data', (chunk: string | Buffer) => {
      const text = chunk.toString().trim();
      if (text) {
        logger.warn(`${name} stderr`, { stderr: text });
      }
    });

    let ended = false;
    const onEnd = (reason: string, error?: unknown): void => {
      if (ended) {
        return;
      }
      ended = true;
      if (this.child === child) {
        this.child = null;
      }
      if (!this.stopped) {
        logger.warn(`The ${name} subscription ended: ${reason}`, undefined, error);
        this.scheduleRestart();
      }
    };

    child.once('error', error => onEnd('process error', error));
    child.once('exit', (code, signal) => onEnd(`exit code ${code ?? 'none'}, signal ${signal ?? 'none'}`));
  }

  unsubscribe(): void {
    this.stopped = true;
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    if (this.child) {
      const child = this.child;
      this.child = null;
      child.kill();
      this.options.logger.info(`Unsubscribed from ${this.options.name}`);
    }
  }

  private scheduleRestart(): void {
    if (this.stopped || this.restartTimer) {
      return;
    }
    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      this.start();
    }, this.restartDelayMs);
  }

  private consume(chunk: string): void {
    const { lines, remainder } = splitLines(this.buffer + chunk);
    this.buffer = remainder;

    for (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed) {
        continue;
      }

      let record: T | null;
      try {
        record = this.options.parseLine(trimmed);
      } catch (error) {
        this.options.logger.warn(`Skipping unreadable ${this.options.name} record`, { line: trimmed.substring(0, 200) }, error);
        continue;
      }

      if (record !== null) {
        this.options.onRecord(record);
      }
    }
  }
}
