/**
 * Remote signer reached over a Unix socket
 * @module signer/remote
 */

import { createConnection } from 'net';
import { createHmac, randomUUID } from 'crypto';
import { PublicKey } from '@solana/web3.js';
import { TransferSigner } from './types.js';
import { RemoteSignRequest, RemoteSignResponse } from './protocol.js';
import { RemoteSignerError } from '../errors.js';

export interface RemoteSignerOptions {
  /** Path of the signer's Unix socket */
  socketPath: string;
  /** Account the remote side signs for */
  publicKey: PublicKey;
  /** Secret shared with the signer for request HMACs */
  sharedSecret: string;
  /** Socket inactivity timeout (default: 10000) */
  timeoutMs?: number;
}

/**
 * Signer whose private key lives in another process.
 *
 * Only message bytes go out and only a signature comes back; the key never
 * crosses the socket. Every failure is a RemoteSignerError.
 */
export class RemoteSigner implements TransferSigner {
  readonly publicKey: PublicKey;
  private readonly socketPath: string;
  private readonly sharedSecret: string;
  private readonly timeoutMs: number;

  constructor(options: RemoteSignerOptions) {
    this.publicKey = options.publicKey;
    this.socketPath = options.socketPath;
    this.sharedSecret = options.sharedSecret;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async sign(message: Uint8Array): Promise<Uint8Array> {
    const request = this.buildRequest(message);
    const line = await this.exchange(JSON.stringify(request));
    return signatureFrom(line, request.requestId);
  }

  private buildRequest(message: Uint8Array): RemoteSignRequest {
    const messageBase64 = Buffer.from(message).toString('base64');
    return {
      hmac: createHmac('sha256', this.sharedSecret).update(messageBase64).digest('hex'),
      messageBase64,
      requestId: randomUUID(),
    };
  }

  /**
   * Write one line and resolve with the first line the signer sends back
   */
  private exchange(requestLine: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const socket = createConnection(this.socketPath);
      let received = '';
      let done = false;

      const finish = (outcome: string | RemoteSignerError): void => {
        if (done) return;
        done = true;
        socket.destroy();
        if (outcome instanceof RemoteSignerError) {
          reject(outcome);
        } else {
          resolve(outcome);
        }
      };

      socket.setTimeout(this.timeoutMs);
      socket.on('connect', () => socket.write(`${requestLine}\n`));
      socket.on('data', (chunk: Buffer) => {
        received += chunk.toString('utf8');
        const end = received.indexOf('\n');
        if (end !== -1) {
          finish(received.slice(0, end));
        }
      });
      socket.on('timeout', () =>
        finish(
          new RemoteSignerError(`remote signer timed out after ${this.timeoutMs}ms`, 'timeout')
        )
      );
      socket.on('error', (err: NodeJS.ErrnoException) =>
        finish(
          new RemoteSignerError(
            `remote signer socket error: ${err.code ?? err.message}`,
            'socket',
            err
          )
        )
      );
      socket.on('end', () =>
        finish(
          new RemoteSignerError('remote signer closed connection without responding', 'closed')
        )
      );
    });
  }
}

function signatureFrom(line: string, requestId: string): Uint8Array {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    throw new RemoteSignerError('remote signer returned invalid JSON', 'invalid_response', error);
  }

  const result = RemoteSignResponse.safeParse(parsed);
  if (!result.success) {
    throw new RemoteSignerError(
      'remote signer returned an invalid response',
      'invalid_response',
      result.error
    );
  }

  const response = result.data;
  if (response.requestId !== requestId) {
    throw new RemoteSignerError('remote signer answered a different request', 'request_mismatch');
  }
  if (!response.ok) {
    throw new RemoteSignerError(`remote signer error: ${response.error}`, response.error);
  }
  return Uint8Array.from(Buffer.from(response.signatureBase64, 'base64'));
}
