/**
 * Unsigned message assembly
 * @module tx/message
 */

import {
  Message,
  PublicKey,
  TransactionInstruction,
  TransactionMessage,
} from '@solana/web3.js';
import { Anchor } from '../ledger/types.js';

/**
 * Options for assembling a message
 */
export interface AssembleMessageOptions {
  /** The single instruction to carry */
  instruction: TransactionInstruction;
  /** Fee payer */
  payer: PublicKey;
  /** Freshly fetched blockhash the message is bound to */
  anchor: Anchor;
}

/**
 * A compiled message that has not been signed yet
 */
export interface UnsignedTransfer {
  message: Message;
  anchor: Anchor;
}

/**
 * Compile one instruction into a legacy message.
 *
 * Compilation places the fee payer first among the writable signers and
 * deduplicates repeated keys, keeping the instruction's account order intact.
 */
export function assembleMessage(options: AssembleMessageOptions): UnsignedTransfer {
  const { instruction, payer, anchor } = options;

  const message = new TransactionMessage({
    payerKey: payer,
    recentBlockhash: anchor.blockhash,
    instructions: [instruction],
  }).compileToLegacyMessage();

  return { message, anchor };
}

/**
 * Public keys that must sign `message`, in signature order
 */
export function requiredSigners(message: Message): PublicKey[] {
  return message.accountKeys.slice(0, message.header.numRequiredSignatures);
}
