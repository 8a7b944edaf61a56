export type AgentErrorCode =
  | 'KEY_LOAD'
  | 'CONFIGURATION'
  | 'SOURCE_READ'
  | 'DELIVERY'
  | 'COLLECTION_SUB_PROBE'
  | 'COMMAND_EXECUTION';

/**
 * Base class for every error the agent raises or reports. Only
 * KeyLoadError and ConfigurationError are allowed to stop the process;
 * the others are contained where they occur and logged.
 */
export abstract class AgentError extends Error {
  abstract readonly code: AgentErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class KeyLoadError extends AgentError {
  readonly code = 'KEY_LOAD';
}

export class ConfigurationError extends AgentError {
  readonly code = 'CONFIGURATION';

  constructor(message: string, readonly key?: string) {
    super(message);
  }
}

export class SourceReadError extends AgentError {
  readonly code = 'SOURCE_READ';

  constructor(message: string, readonly source: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export interface DeliveryErrorDetails {
  url: string;
  attempts: number;
  status?: number;
  detail?: string;
}

export class DeliveryError extends AgentError {
  readonly code = 'DELIVERY';
  readonly url: string;
  readonly attempts: number;
  readonly status?: number;
  readonly detail?: string;

  constructor(message: string, details: DeliveryErrorDetails) {
    super(message);
    this.url = details.url;
    this.attempts = details.attempts;
    this.status = details.status;
    this.detail = details.detail;
  }
}

export class CollectionSubProbeError extends AgentError {
  readonly code = 'COLLECTION_SUB_PROBE';

  constructor(readonly probe: string, options?: { cause?: unknown }) {
    super(`Vitals probe "${probe}" failed: ${describeError(options?.cause)}`, options);
  }
}

export class CommandExecutionFault extends AgentError {
  readonly code = 'COMMAND_EXECUTION';
}

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null;

/**
 * Renders any thrown value as a single-line message.
 */
export const describeError = (err: unknown): string => {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'string') {
    return err;
  }
  if (isRecord(err) && typeof err.message === 'string') {
    return err.message;
  }
  return err === undefined ? 'unknown error' : String(err);
};

/**
 * Node system errors carry a string `code` (EACCES, ENOENT, ...).
 */
export const errorCode = (err: unknown): string | undefined =>
  isRecord(err) && typeof err.code === 'string' ? err.code : undefined;
