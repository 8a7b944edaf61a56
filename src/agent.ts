import { ComponentLogger, Logger } from './common/logger';
import { Configuration, loadConfiguration } from './config/config';
import { AgentSettings, resolveSettings } from './config/settings';
import { CommandExecutor } from './execution/command-executor';
import { VitalsCollector } from './monitoring/vitals-collector';
import { NodeVitalsHost, VitalsHost } from './monitoring/vitals-host';
import { SecurityProvider } from './security/security-provider';
import { DeliveryClient, DeliveryPolicy } from './server/delivery-client';
import { AxiosTransport, HttpTransport } from './server/http-transport';
import { DedupFilter } from './service/dedup-filter';
import { PlatformEventSource, selectEventSource } from './service/event-sources';
import { MonitorLoop, MonitorStatistics } from './service/monitor-loop';
import {
  LogMonitorDeps,
  createCommandMonitor,
  createEventLogMonitor,
  createJournalMonitor,
  createVitalsMonitor
} from './service/monitors';

export interface AgentOptions {
  logger?: ComponentLogger;
  transport?: HttpTransport;
  vitalsHost?: VitalsHost;
  /** Replaces the platform log source; `null` runs without one. */
  eventSource?: PlatformEventSource | null;
  platform?: NodeJS.Platform;
}

interface RunningMonitor {
  stop(): Promise<void>;
  getStatistics(): MonitorStatistics;
}

/**
 * Wires the agent together and owns the monitor loops. Construction fails
 * with KeyLoadError or ConfigurationError; nothing after that stops the
 * process.
 */
export class RelayAgent {
  private logger: ComponentLogger;
  private settings: AgentSettings;
  private security: SecurityProvider;
  private transport: HttpTransport;
  private delivery: DeliveryClient;
  private monitors: RunningMonitor[] = [];
  private runs: Promise<void>[] = [];
  private started: boolean = false;
  private options: AgentOptions;

  constructor(config: Configuration, options: AgentOptions = {}) {
    this.options = options;
    this.settings = resolveSettings(config);
    this.logger = options.logger ?? new Logger('agent', this.settings.logDir, this.settings.logLevel);

    this.security = new SecurityProvider({
      accessToken: this.settings.service.accessToken,
      clientId: this.settings.service.clientId,
      clientSecret: this.settings.service.clientSecret
    });

    this.transport = options.transport ?? new AxiosTransport();
    this.delivery = new DeliveryClient(this.security, this.transport, this.logger, {
      policy: new DeliveryPolicy({
        maxAttempts: this.settings.delivery.maxAttempts,
        fatalStatuses: this.settings.delivery.fatalStatuses
      }),
      timeoutMs: this.settings.delivery.timeoutMs
    });
  }

  static fromFile(configPath: string, options: AgentOptions = {}): RelayAgent {
    return new RelayAgent(loadConfiguration(configPath), options);
  }

  get isRunning(): boolean {
    return this.started;
  }

  start(): void {
    if (this.started) {
      this.logger.warn('Agent already started');
      return;
    }
    this.started = true;
    this.logger.info('Starting relay agent...');

    this.startLogMonitor();

    if (this.settings.vitals.enabled) {
      const collector = new VitalsCollector(this.options.vitalsHost ?? new NodeVitalsHost(), this.logger);
      this.launch(
        createVitalsMonitor(collector, this.delivery, this.settings.service.eventsUrl, this.settings.vitals.intervalMs, this.logger)
      );
    }

    if (this.settings.commands.enabled) {
      const executor = new CommandExecutor(
        this.settings.service.commandsUrl,
        this.delivery,
        this.transport,
        this.security,
        this.logger,
        {
          pollTimeoutMs: this.settings.commands.pollTimeoutMs,
          execTimeoutMs: this.settings.commands.execTimeoutMs
        }
      );
      this.launch(createCommandMonitor(executor, this.settings.commands.intervalMs, this.logger));
    }

    this.logger.info('Relay agent started', { monitors: this.monitors.map(monitor => monitor.getStatistics().name) });
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.logger.info('Stopping relay agent...');
    await Promise.all(this.monitors.map(monitor => monitor.stop()));
    await Promise.all(this.runs);
    this.monitors = [];
    this.runs = [];
    this.started = false;
    this.logger.info('Relay agent stopped');
  }

  getStatistics(): MonitorStatistics[] {
    return this.monitors.map(monitor => monitor.getStatistics());
  }

  private startLogMonitor(): void {
    const selected =
      this.options.eventSource !== undefined
        ? this.options.eventSource
        : selectEventSource(this.options.platform ?? process.platform, this.logger);

    if (!selected) {
      this.logger.warn('No system log source for this platform; log monitoring is off');
      return;
    }

    const deps: LogMonitorDeps = {
      delivery: this.delivery,
      eventsUrl: this.settings.service.eventsUrl,
      logger: this.logger
    };
    const filter = { minimum: this.settings.journal.minimumSeverity };

    if (selected.kind === 'journal' && this.settings.journal.enabled) {
      const dedup = new DedupFilter({ maxEntries: this.settings.dedup.maxEntries, ttlMs: this.settings.dedup.ttlMs });
      this.launch(createJournalMonitor(selected.source, filter, { ...deps, dedup }));
    } else if (selected.kind === 'eventlog' && this.settings.eventLog.enabled) {
      this.launch(createEventLogMonitor(selected.source, filter, deps));
    }
  }

  private launch<T>(monitor: MonitorLoop<T>): void {
    this.monitors.push(monitor);
    this.runs.push(monitor.start());
  }
}
