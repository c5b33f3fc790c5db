/**
 * Ledger query and submission contracts
 * @module ledger/types
 */

import { PublicKey, VersionedTransaction } from '@solana/web3.js';

/**
 * Recent blockhash bounding a message's validity window
 */
export interface Anchor {
  blockhash: string;
  /** Last block height at which the blockhash is still accepted */
  lastValidBlockHeight: number;
}

/**
 * A fully signed transaction with the anchor it was built against
 */
export interface SignedTransfer {
  transaction: VersionedTransaction;
  anchor: Anchor;
}

/**
 * Lifecycle of the transaction built for a run
 */
export enum TransactionState {
  Unsigned = 'unsigned',
  Signed = 'signed',
  Submitted = 'submitted',
  Confirmed = 'confirmed',
  Failed = 'failed',
  TimedOut = 'timed-out',
}

/**
 * Everything the pipeline needs from the cluster
 */
export interface LedgerClient {
  /** Endpoint shown in verbose output */
  readonly endpoint: string;

  /** Balance in lamports */
  getBalance(publicKey: PublicKey): Promise<bigint>;

  /** Latest blockhash, fetched fresh on every call */
  getRecentAnchor(): Promise<Anchor>;

  /**
   * Send a signed transaction and wait for confirmation.
   * Resolves with the transaction signature.
   */
  submitAndConfirm(signed: SignedTransfer): Promise<string>;
}
