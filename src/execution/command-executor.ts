// command-executor.ts - runs shell commands queued on the service and reports the results
import { ChildProcess, spawn } from 'child_process';
import { ComponentLogger } from '../common/logger';
import { CommandExecutionFault, describeError } from '../common/errors';
import { DeliveryClient, DeliveryResult } from '../server/delivery-client';
import { HttpTransport, TransportResponse } from '../server/http-transport';
import { SecurityProvider } from '../security/security-provider';
import { ServerCommand, ServerCommandResult, ServerCommandSchema } from '../types';

export interface ShellOutcome {
  /** Process exit status; -1 when the process could not be started or was killed. */
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type ShellRunner = (command: string, timeoutMs: number) => Promise<ShellOutcome>;

/**
 * Run a command line through the platform shell and capture its output.
 * Resolves for every outcome, including a failed start.
 */
export const runInShell: ShellRunner = (command, timeoutMs) =>
  new Promise(resolve => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const finish = (exitCode: number, fault?: string): void => {
      if (settled) {
        return;
      }
      settled = true;
      let errorText = Buffer.concat(stderr).toString('utf8');
      if (fault) {
        errorText = errorText ? `${errorText}\n${fault}` : fault;
      }
      resolve({ exitCode, stdout: Buffer.concat(stdout).toString('utf8'), stderr: errorText });
    };

    let child: ChildProcess;
    try {
      child = spawn(command, {
        shell: true,
        windowsHide: true,
        stdio: ['ignore', 'pipe', 'pipe'],
        timeout: timeoutMs > 0 ? timeoutMs : undefined
      });
    } catch (error) {
      finish(-1, describeError(error));
      return;
    }

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.once('error', error => finish(-1, error.message));
    child.once('close', (code, signal) => {
      if (code === null) {
        finish(-1, `Terminated by ${signal ?? 'unknown signal'}`);
      } else {
        finish(code);
      }
    });
  });

export interface CommandExecutorOptions {
  /** Timeout of the pending-command poll. */
  pollTimeoutMs?: number;
  /** 0 runs commands without a time limit. */
  execTimeoutMs?: number;
  runShell?: ShellRunner;
  now?: () => Date;
}

/**
 * Pulls pending commands from `{commandsUrl}?status=pending`, runs each one
 * and posts the outcome to `{commandsUrl}{id}/result/`.
 */
export class CommandExecutor {
  private logger: ComponentLogger;
  private commandsUrl: string;
  private delivery: DeliveryClient;
  private transport: HttpTransport;
  private security: SecurityProvider;
  private pollTimeoutMs: number;
  private execTimeoutMs: number;
  private runShell: ShellRunner;
  private now: () => Date;

  constructor(
    commandsUrl: string,
    delivery: DeliveryClient,
    transport: HttpTransport,
    security: SecurityProvider,
    logger: ComponentLogger,
    options: CommandExecutorOptions = {}
  ) {
    this.commandsUrl = commandsUrl.endsWith('/') ? commandsUrl : `${commandsUrl}/`;
    this.delivery = delivery;
    this.transport = transport;
    this.security = security;
    this.logger = logger;
    this.pollTimeoutMs = options.pollTimeoutMs ?? 300000;
    this.execTimeoutMs = options.execTimeoutMs ?? 0;
    this.runShell = options.runShell ?? runInShell;
    this.now = options.now ?? (() => new Date());
  }

  resultUrl(commandId: string): string {
    return `${this.commandsUrl}${commandId}/result/`;
  }

  /**
   * Fetch the pending commands. Any failure yields an empty list.
   */
  async poll(): Promise<ServerCommand[]> {
    const url = `${this.commandsUrl}?status=pending`;

    let response: TransportResponse;
    try {
      response = await this.transport.get({
        url,
        headers: { ...this.security.authHeaders() },
        timeoutMs: this.pollTimeoutMs
      });
    } catch (error) {
      this.logger.error('Failed to fetch pending commands', error, { url });
      return [];
    }

    if (response.status !== 200) {
      this.logger.error(`Failed to fetch pending commands. Code: ${response.status}`, undefined, {
        url,
        body: response.body.substring(0, 500)
      });
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(response.body);
    } catch (error) {
      this.logger.error('Pending commands response is not JSON', error, { url });
      return [];
    }

    if (!Array.isArray(parsed)) {
      this.logger.error('Pending commands response is not a list', undefined, { url });
      return [];
    }

    const commands: ServerCommand[] = [];
    for (const item of parsed) {
      const result = ServerCommandSchema.safeParse(item);
      if (result.success) {
        commands.push(result.data);
      } else {
        this.logger.warn('Skipping malformed command', { issues: result.error.issues.map(issue => issue.message) });
      }
    }
    return commands;
  }

  /**
   * Run one command in the shell. Never throws: a command that cannot be
   * started is reported with exit code -1 and the reason in stderr.
   */
  async execute(command: ServerCommand): Promise<ServerCommandResult> {
    const start = this.now();
    let outcome: ShellOutcome;
    try {
      outcome = await this.runShell(command.command, this.execTimeoutMs);
    } catch (error) {
      const fault = new CommandExecutionFault(`Command ${command.id} could not be run: ${describeError(error)}`, { cause: error });
      this.logger.error(fault.message, fault);
      outcome = { exitCode: -1, stdout: '', stderr: describeError(error) };
    }
    const end = this.now();

    return {
      start_date: start.toISOString(),
      end_date: end.toISOString(),
      total_time: (end.getTime() - start.getTime()) / 1000,
      exit_code: outcome.exitCode,
      stdout: outcome.stdout,
      stderr: outcome.stderr
    };
  }

  async report(command: ServerCommand, result: ServerCommandResult): Promise<DeliveryResult> {
    return this.delivery.deliverJson(this.resultUrl(command.id), result, { label: `result of command ${command.id}` });
  }

  /**
   * One polling cycle: commands run one at a time in the order received.
   * Returns the number of commands executed.
   */
  async run(): Promise<number> {
    const commands = await this.poll();
    let executed = 0;

    for (const command of commands) {
      try {
        this.logger.info(`Running command ${command.id}`, { requestedBy: command.user_name, server: command.server_name });
        const result = await this.execute(command);
        executed++;
        this.logger.info(`Command ${command.id} finished`, { exitCode: result.exit_code, totalTime: result.total_time });
        await this.report(command, result);
      } catch (error) {
        this.logger.error(`Command ${command.id} failed`, error);
      }
    }
    return executed;
  }
}
