import * as crypto from 'crypto';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { ComponentLogger } from '../src/common/logger';
import { SecurityProvider } from '../src/security/security-provider';
import { HttpTransport, TransportRequest, TransportResponse } from '../src/server/http-transport';

export type MockLogger = ComponentLogger & {
  debug: jest.Mock;
  info: jest.Mock;
  warn: jest.Mock;
  error: jest.Mock;
};

export function createMockLogger(): MockLogger {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
  };
}

let keyPair: { publicKey: string; privateKey: string } | null = null;

/** One RSA key pair per test file; generating keys is slow. */
export function testKeyPair(): { publicKey: string; privateKey: string } {
  if (!keyPair) {
    keyPair = crypto.generateKeyPairSync('rsa', {
      modulusLength: 2048,
      publicKeyEncoding: { type: 'spki', format: 'pem' },
      privateKeyEncoding: { type: 'pkcs8', format: 'pem' }
    });
  }
  return keyPair;
}

export function createSecurity(): SecurityProvider {
  return new SecurityProvider({
    accessToken: 'test-token',
    clientId: 'test-client',
    clientSecret: Buffer.from(testKeyPair().privateKey, 'utf8').toString('base64')
  });
}

export function verifySignature(payload: Buffer | string, signature: string): boolean {
  const verifier = crypto.createVerify('RSA-SHA256');
  verifier.update(payload);
  verifier.end();
  return verifier.verify(testKeyPair().publicKey, signature, 'base64');
}

export type PostedRequest = TransportRequest & { body: Buffer };

/**
 * Transport double. Each call takes the next scripted reply; a reply that
 * is an Error is thrown as a network failure.
 */
export class FakeTransport implements HttpTransport {
  readonly posts: PostedRequest[] = [];
  readonly gets: TransportRequest[] = [];
  private postReplies: Array<TransportResponse | Error> = [];
  private getReplies: Array<TransportResponse | Error> = [];

  replyToPost(...replies: Array<TransportResponse | Error>): this {
    this.postReplies.push(...replies);
    return this;
  }

  replyToGet(...replies: Array<TransportResponse | Error>): this {
    this.getReplies.push(...replies);
    return this;
  }

  async get(request: TransportRequest): Promise<TransportResponse> {
    this.gets.push(request);
    return FakeTransport.take(this.getReplies);
  }

  async post(request: PostedRequest): Promise<TransportResponse> {
    this.posts.push(request);
    return FakeTransport.take(this.postReplies);
  }

  private static take(replies: Array<TransportResponse | Error>): TransportResponse {
    const reply = replies.length > 1 ? replies.shift() : replies[0];
    if (reply === undefined) {
      throw new Error('No reply scripted');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export function response(status: number, body: string = '', statusText: string = ''): TransportResponse {
  return { status, statusText, body };
}

/**
 * Child process double: an emitter with writable stdout/stderr streams.
 */
export class FakeProcess extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  killed: boolean = false;

  kill(): boolean {
    this.killed = true;
    return true;
  }

  writeLine(line: string): void {
    this.stdout.write(`${line}\n`);
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.emit('exit', code, signal);
  }
}

/** Lets pending stream callbacks and promise continuations run. */
export function flushPromises(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
