/**
 * Local keypair-file signer
 * @module signer/keypair
 */

import { readFile } from 'fs/promises';
import { Keypair, PublicKey } from '@solana/web3.js';
import { ed25519 } from '@noble/curves/ed25519';
import { z } from 'zod';
import { TransferSigner } from './types.js';
import { ResolutionError, errorMessage } from '../errors.js';

/** Solana CLI keypair files hold the 64-byte secret key as a JSON byte array */
const KeypairFileSchema = z.array(z.number().int().min(0).max(255)).length(64);

/**
 * Signer backed by key material held in this process
 */
export class KeypairSigner implements TransferSigner {
  constructor(private readonly keypair: Keypair) {}

  get publicKey(): PublicKey {
    return this.keypair.publicKey;
  }

  async sign(message: Uint8Array): Promise<Uint8Array> {
    return ed25519.sign(message, this.keypair.secretKey.slice(0, 32));
  }

  /**
   * Load a signer from a Solana CLI keypair file
   */
  static async fromFile(path: string): Promise<KeypairSigner> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      throw new ResolutionError(
        `unable to read keypair file ${path}: ${errorMessage(error)}`,
        error
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ResolutionError(`keypair file ${path} is not valid JSON`, error);
    }

    const bytes = KeypairFileSchema.safeParse(parsed);
    if (!bytes.success) {
      throw new ResolutionError(`keypair file ${path} must contain 64 bytes`);
    }

    try {
      return new KeypairSigner(Keypair.fromSecretKey(Uint8Array.from(bytes.data)));
    } catch (error) {
      throw new ResolutionError(
        `keypair file ${path} holds an invalid key: ${errorMessage(error)}`,
        error
      );
    }
  }
}
