/**
 * Request signing for the relay agent.
 *
 * Every payload sent to the service carries a `Signature` header: the
 * base64 RSA-SHA256 signature of the exact body bytes, made with the
 * client's private key.
 */

import * as crypto from 'crypto';
import { KeyLoadError, describeError } from '../common/errors';

const SIGNING_ALGORITHM = 'RSA-SHA256';
const PEM_HEADER = '-----BEGIN';

export interface SecurityCredentials {
  accessToken: string;
  clientId: string;
  /** Private key as PEM, or base64 of the PEM as the service issues it. */
  clientSecret: string;
}

export interface AuthHeaders {
  Authorization: string;
  'Client-ID': string;
}

/**
 * Decode the configured client secret into a PEM string. The service hands
 * out the key base64-encoded; a raw PEM is accepted as is.
 */
function decodeClientSecret(clientSecret: string): string {
  const trimmed = clientSecret.trim();
  if (trimmed.startsWith(PEM_HEADER)) {
    return trimmed;
  }

  const decoded = Buffer.from(trimmed, 'base64').toString('utf8');
  if (!decoded.includes(PEM_HEADER)) {
    throw new KeyLoadError('Client secret is neither a PEM private key nor base64 of one');
  }
  return decoded;
}

export class SecurityProvider {
  private readonly privateKey: crypto.KeyObject;

  constructor(private readonly credentials: SecurityCredentials) {
    if (!credentials.clientSecret) {
      throw new KeyLoadError('Client secret is empty');
    }

    const pem = decodeClientSecret(credentials.clientSecret);
    try {
      this.privateKey = crypto.createPrivateKey({ key: pem, format: 'pem' });
    } catch (error) {
      throw new KeyLoadError(`Failed to parse private key: ${describeError(error)}`, { cause: error });
    }

    if (this.privateKey.asymmetricKeyType !== 'rsa') {
      throw new KeyLoadError(`Unsupported key type: ${this.privateKey.asymmetricKeyType ?? 'unknown'}`);
    }
  }

  get accessToken(): string {
    return this.credentials.accessToken;
  }

  get clientId(): string {
    return this.credentials.clientId;
  }

  authHeaders(): AuthHeaders {
    return {
      Authorization: `Bearer ${this.credentials.accessToken}`,
      'Client-ID': this.credentials.clientId
    };
  }

  /**
   * Sign the payload and return the base64 signature.
   */
  sign(payload: Buffer | string): string {
    const signer = crypto.createSign(SIGNING_ALGORITHM);
    signer.update(payload);
    signer.end();
    return signer.sign(this.privateKey).toString('base64');
  }
}
