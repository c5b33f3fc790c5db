/**
 * Signature collection for an assembled message
 * @module tx/signing
 */

import { Message, VersionedTransaction } from '@solana/web3.js';
import { ed25519 } from '@noble/curves/ed25519';
import { TransferSigner } from '../signer/types.js';
import { SigningError, errorMessage } from '../errors.js';
import { requiredSigners } from './message.js';

const SIGNATURE_LENGTH = 64;

/**
 * Sign `message` with every signer it requires.
 *
 * Each signature is checked against its public key before it is placed, so
 * the returned transaction is fully signed or the call throws.
 */
export async function signMessage(
  message: Message,
  signers: readonly TransferSigner[]
): Promise<VersionedTransaction> {
  const transaction = new VersionedTransaction(message);
  const messageBytes = message.serialize();

  for (const key of requiredSigners(message)) {
    const signer = signers.find((candidate) => candidate.publicKey.equals(key));
    if (!signer) {
      throw new SigningError(`failed to sign transaction: missing signer ${key.toBase58()}`);
    }

    let signature: Uint8Array;
    try {
      signature = await signer.sign(messageBytes);
    } catch (error) {
      throw new SigningError(`failed to sign transaction: ${errorMessage(error)}`, error);
    }

    if (
      signature.length !== SIGNATURE_LENGTH ||
      !ed25519.verify(signature, messageBytes, key.toBytes())
    ) {
      throw new SigningError(
        `failed to sign transaction: signature from ${key.toBase58()} does not verify`
      );
    }

    transaction.addSignature(key, signature);
  }

  return transaction;
}
