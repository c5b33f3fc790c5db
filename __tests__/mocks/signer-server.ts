/**
 * Mock remote signing co-process
 *
 * Listens on a Unix socket in the temp directory, checks request HMACs and
 * signs with a local keypair. Behavior toggles cover every failure the
 * client has to handle.
 */

import { createServer, Server, Socket } from 'net';
import { createHmac } from 'crypto';
import { tmpdir } from 'os';
import { join } from 'path';
import { Keypair } from '@solana/web3.js';
import { ed25519 } from '@noble/curves/ed25519';
import { RemoteSignRequest, RemoteSignResponse } from '../../src/signer/protocol';

export type MockSignerMode =
  | 'ok'
  | 'reject'
  | 'bad-signature'
  | 'wrong-request-id'
  | 'garbage'
  | 'close'
  | 'silent';

let counter = 0;

export class MockSignerServer {
  private server: Server | null = null;
  private readonly sockets = new Set<Socket>();
  readonly socketPath: string;
  mode: MockSignerMode = 'ok';
  requests = 0;

  constructor(
    private readonly keypair: Keypair,
    private readonly sharedSecret: string
  ) {
    counter++;
    this.socketPath = join(tmpdir(), `tw-signer-${process.pid}-${counter}.sock`);
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = createServer((socket) => this.handle(socket));
      this.server.on('error', reject);
      this.server.listen(this.socketPath, () => resolve());
    });
  }

  stop(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private handle(socket: Socket): void {
    this.sockets.add(socket);
    socket.on('close', () => this.sockets.delete(socket));

    let buffer = '';
    socket.on('data', (chunk: Buffer) => {
      buffer += chunk.toString('utf8');
      const newlineIndex = buffer.indexOf('\n');
      if (newlineIndex === -1) return;
      this.requests++;

      const request = RemoteSignRequest.parse(JSON.parse(buffer.slice(0, newlineIndex)));
      this.respond(socket, request);
    });
  }

  private respond(socket: Socket, request: RemoteSignRequest): void {
    const { requestId } = request;

    switch (this.mode) {
      case 'silent':
        return;
      case 'close':
        socket.end();
        return;
      case 'garbage':
        socket.write('not json\n');
        return;
      case 'reject':
        this.send(socket, { ok: false, error: 'rejected', requestId });
        return;
      case 'bad-signature':
        this.send(socket, {
          ok: true,
          signatureBase64: Buffer.alloc(64).toString('base64'),
          requestId,
        });
        return;
      case 'wrong-request-id':
        this.send(socket, {
          ok: true,
          signatureBase64: Buffer.alloc(64).toString('base64'),
          requestId: '00000000-0000-4000-8000-000000000000',
        });
        return;
      case 'ok':
        break;
    }

    const expected = createHmac('sha256', this.sharedSecret)
      .update(request.messageBase64)
      .digest('hex');
    if (expected !== request.hmac) {
      this.send(socket, { ok: false, error: 'auth_failed', requestId });
      return;
    }

    const message = Buffer.from(request.messageBase64, 'base64');
    const signature = ed25519.sign(message, this.keypair.secretKey.slice(0, 32));
    this.send(socket, {
      ok: true,
      signatureBase64: Buffer.from(signature).toString('base64'),
      requestId,
    });
  }

  private send(socket: Socket, response: RemoteSignResponse): void {
    socket.write(JSON.stringify(response) + '\n');
  }
}
