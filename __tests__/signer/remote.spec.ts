/**
 * Remote signer against an in-process signing server
 */

import { tmpdir } from 'os';
import { join } from 'path';
import { ed25519 } from '@noble/curves/ed25519';
import { RemoteSigner } from '../../src/signer/remote';
import { signMessage } from '../../src/tx/signing';
import { assembleMessage } from '../../src/tx/message';
import { transferWith } from '../../src/tx/instruction';
import { RemoteSignerError, SigningError } from '../../src/errors';
import { MockSignerServer } from '../mocks/signer-server';
import { TEST_ANCHOR, testKeypair } from '../mocks/fake-ledger';

describe('RemoteSigner', () => {
  const keypair = testKeypair(3);
  const message = new TextEncoder().encode('test-message');
  let server: MockSignerServer;

  function signerFor(sharedSecret: string = 'test-secret'): RemoteSigner {
    return new RemoteSigner({
      socketPath: server.socketPath,
      publicKey: keypair.publicKey,
      sharedSecret,
      timeoutMs: 100,
    });
  }

  beforeAll(async () => {
    server = new MockSignerServer(keypair, 'test-secret');
    await server.start();
  });

  afterAll(async () => {
    await server.stop();
  });

  beforeEach(() => {
    server.mode = 'ok';
  });

  it('should return a signature from the remote key', async () => {
    const signature = await signerFor().sign(message);

    expect(signature).toHaveLength(64);
    expect(ed25519.verify(signature, message, keypair.publicKey.toBytes())).toBe(true);
  });

  it('should surface an HMAC mismatch', async () => {
    const result = signerFor('wrong-secret').sign(message);

    await expect(result).rejects.toBeInstanceOf(RemoteSignerError);
    await expect(result).rejects.toThrow('remote signer error: auth_failed');
    await expect(result).rejects.toMatchObject({ reason: 'auth_failed', code: 'ERR_SIGNING' });
  });

  it('should surface an operator rejection', async () => {
    server.mode = 'reject';

    const result = signerFor().sign(message);

    await expect(result).rejects.toThrow('remote signer error: rejected');
    await expect(result).rejects.toMatchObject({ reason: 'rejected' });
  });

  it('should reject responses that are not JSON', async () => {
    server.mode = 'garbage';

    await expect(signerFor().sign(message)).rejects.toThrow('remote signer returned invalid JSON');
  });

  it('should reject answers to another request', async () => {
    server.mode = 'wrong-request-id';

    await expect(signerFor().sign(message)).rejects.toMatchObject({
      message: 'remote signer answered a different request',
      reason: 'request_mismatch',
    });
  });

  it('should fail when the server hangs up', async () => {
    server.mode = 'close';

    await expect(signerFor().sign(message)).rejects.toThrow(
      'remote signer closed connection without responding'
    );
  });

  it('should time out on a silent server', async () => {
    server.mode = 'silent';

    await expect(signerFor().sign(message)).rejects.toMatchObject({
      message: 'remote signer timed out after 100ms',
      reason: 'timeout',
    });
  });

  it('should fail when nothing listens on the socket', async () => {
    const missing = new RemoteSigner({
      socketPath: join(tmpdir(), `tw-missing-${process.pid}.sock`),
      publicKey: keypair.publicKey,
      sharedSecret: 'test-secret',
    });

    const result = missing.sign(message);

    await expect(result).rejects.toBeInstanceOf(SigningError);
    await expect(result).rejects.toMatchObject({
      message: 'remote signer socket error: ENOENT',
      reason: 'socket',
    });
  });

  describe('with signMessage', () => {
    const payer = keypair.publicKey;
    const { message: transferMessage } = assembleMessage({
      instruction: transferWith({ from: payer, to: payer, lamports: 1n }),
      payer,
      anchor: TEST_ANCHOR,
    });

    it('should sign a transfer remotely', async () => {
      const tx = await signMessage(transferMessage, [signerFor()]);

      expect(
        ed25519.verify(tx.signatures[0], transferMessage.serialize(), payer.toBytes())
      ).toBe(true);
    });

    it('should turn a rejection into a SigningError', async () => {
      server.mode = 'reject';

      const result = signMessage(transferMessage, [signerFor()]);

      await expect(result).rejects.toBeInstanceOf(SigningError);
      await expect(result).rejects.toThrow(
        'failed to sign transaction: remote signer error: rejected'
      );
    });

    it('should catch a forged signature', async () => {
      server.mode = 'bad-signature';

      await expect(signMessage(transferMessage, [signerFor()])).rejects.toThrow(
        'does not verify'
      );
    });
  });
});
