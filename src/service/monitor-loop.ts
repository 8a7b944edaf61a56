// monitor-loop.ts - one cooperative loop per observed source
import { ComponentLogger } from '../common/logger';
import { EventStream } from './streams';

export type MonitorState = 'idle' | 'waiting' | 'processing' | 'stopped';

export type MonitorHandler<T> = (item: T) => Promise<void>;

export interface MonitorStatistics {
  name: string;
  state: MonitorState;
  processed: number;
  failed: number;
}

/**
 * Waits on a stream and runs the handler for each item, strictly one after
 * another. Handler failures are logged and the loop carries on; only
 * `stop()` ends it. A pending stop is honoured once the item in hand has
 * been processed.
 */
export class MonitorLoop<T> {
  private state: MonitorState = 'idle';
  private abort = new AbortController();
  private running: Promise<void> | null = null;
  private processed: number = 0;
  private failed: number = 0;

  constructor(
    readonly name: string,
    private readonly stream: EventStream<T>,
    private readonly handler: MonitorHandler<T>,
    private readonly logger: ComponentLogger
  ) {}

  get currentState(): MonitorState {
    return this.state;
  }

  /**
   * Start the loop. The returned promise settles when the loop has stopped.
   */
  start(): Promise<void> {
    if (this.running) {
      this.logger.warn(`Monitor ${this.name} already started`);
      return this.running;
    }
    if (this.state === 'stopped') {
      return Promise.resolve();
    }
    this.running = this.run();
    return this.running;
  }

  async stop(): Promise<void> {
    this.abort.abort();
    if (this.running) {
      await this.running;
    } else {
      this.state = 'stopped';
      this.stream.close();
    }
  }

  getStatistics(): MonitorStatistics {
    return { name: this.name, state: this.state, processed: this.processed, failed: this.failed };
  }

  private async run(): Promise<void> {
    this.logger.info(`Starting ${this.name} monitor`);
    const { signal } = this.abort;

    try {
      while (!signal.aborted) {
        this.state = 'waiting';
        const item = await this.stream.next(signal);
        if (item === null) {
          break;
        }

        this.state = 'processing';
        try {
          await this.handler(item);
          this.processed++;
        } catch (error) {
          this.failed++;
          this.logger.error(`Monitor ${this.name} failed to process an item`, error);
        }
      }
    } finally {
      this.state = 'stopped';
      this.stream.close();
      this.logger.info(`Stopped ${this.name} monitor`, { processed: this.processed, failed: this.failed });
    }
  }
}
