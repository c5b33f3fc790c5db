/**
 * Self-transfer instruction with extra read-only accounts
 * @module tx/instruction
 */

import {
  PublicKey,
  SystemInstruction,
  SystemProgram,
  TransactionInstruction,
} from '@solana/web3.js';
import { MAX_LAMPORTS } from '../amount.js';
import { InvalidAmountError, InvalidInstructionError, errorMessage } from '../errors.js';

/**
 * Parameters for {@link transferWith}
 */
export interface TransferWithParams {
  /** Funding account, signs and pays */
  from: PublicKey;
  /** Receiving account, may equal `from` */
  to: PublicKey;
  /** Amount in lamports */
  lamports: bigint;
  /** Appended after the transfer accounts, read-only, in order */
  extraAddresses?: readonly PublicKey[];
}

/**
 * Build a System Program transfer carrying extra read-only account references.
 *
 * The runtime resolves roles by position: `from` (signer, writable), `to`
 * (writable), then each extra address (read-only) in input order. Duplicate
 * keys are passed through untouched.
 */
export function transferWith(params: TransferWithParams): TransactionInstruction {
  const { from, to, lamports, extraAddresses = [] } = params;

  if (lamports < 0n || lamports > MAX_LAMPORTS) {
    throw new InvalidAmountError(`Lamports out of u64 range: ${lamports}`);
  }

  const ix = SystemProgram.transfer({ fromPubkey: from, toPubkey: to, lamports });
  for (const extra of extraAddresses) {
    ix.keys.push({ pubkey: extra, isSigner: false, isWritable: false });
  }
  return ix;
}

/**
 * Read the lamport amount back out of a transfer instruction
 */
export function transferAmount(ix: TransactionInstruction): bigint {
  try {
    return SystemInstruction.decodeTransfer(ix).lamports;
  } catch (error) {
    throw new InvalidInstructionError(`Not a System Program transfer: ${errorMessage(error)}`);
  }
}
