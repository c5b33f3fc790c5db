/**
 * Unit tests for signature collection
 */

import { PublicKey } from '@solana/web3.js';
import { ed25519 } from '@noble/curves/ed25519';
import { signMessage } from '../../src/tx/signing';
import { assembleMessage } from '../../src/tx/message';
import { transferWith } from '../../src/tx/instruction';
import { KeypairSigner } from '../../src/signer/keypair';
import { TransferSigner } from '../../src/signer/types';
import { SigningError } from '../../src/errors';
import { TEST_ANCHOR, testKeypair } from '../mocks/fake-ledger';

describe('signMessage', () => {
  const keypair = testKeypair();
  const payer = keypair.publicKey;
  const { message } = assembleMessage({
    instruction: transferWith({ from: payer, to: payer, lamports: 5n }),
    payer,
    anchor: TEST_ANCHOR,
  });

  function stubSigner(publicKey: PublicKey, sign: TransferSigner['sign']): TransferSigner {
    return { publicKey, sign };
  }

  it('should place a verifiable signature for the fee payer', async () => {
    const tx = await signMessage(message, [new KeypairSigner(keypair)]);

    expect(tx.signatures).toHaveLength(1);
    expect(ed25519.verify(tx.signatures[0], message.serialize(), payer.toBytes())).toBe(true);
  });

  it('should pick the matching signer among several', async () => {
    const other = new KeypairSigner(testKeypair(2));

    const tx = await signMessage(message, [other, new KeypairSigner(keypair)]);

    expect(ed25519.verify(tx.signatures[0], message.serialize(), payer.toBytes())).toBe(true);
  });

  it('should fail when the required signer is absent', async () => {
    const other = new KeypairSigner(testKeypair(2));

    await expect(signMessage(message, [other])).rejects.toThrow(
      `failed to sign transaction: missing signer ${payer.toBase58()}`
    );
  });

  it('should fail when the signer refuses', async () => {
    const refusing = stubSigner(payer, async () => {
      throw new Error('user rejected');
    });

    const result = signMessage(message, [refusing]);

    await expect(result).rejects.toBeInstanceOf(SigningError);
    await expect(result).rejects.toThrow('failed to sign transaction: user rejected');
  });

  it('should fail when the signature does not verify', async () => {
    const forging = stubSigner(payer, async () => new Uint8Array(64));

    await expect(signMessage(message, [forging])).rejects.toThrow(
      `failed to sign transaction: signature from ${payer.toBase58()} does not verify`
    );
  });

  it('should fail on a short signature', async () => {
    const short = stubSigner(payer, async () => new Uint8Array(10));

    await expect(signMessage(message, [short])).rejects.toBeInstanceOf(SigningError);
  });
});
