/**
 * Signing capability contract
 * @module signer/types
 */

import { PublicKey } from '@solana/web3.js';

/**
 * Something that can produce Ed25519 signatures for one account.
 *
 * Implementations own (or reach) the private key; callers only ever see the
 * public key and the signature bytes.
 */
export interface TransferSigner {
  readonly publicKey: PublicKey;

  /**
   * Sign raw message bytes, resolving with a 64-byte signature.
   * Rejects if the backend refuses or cannot sign.
   */
  sign(message: Uint8Array): Promise<Uint8Array>;
}
