/**
 * Self-transfer pipeline
 * @module client
 */

import { PublicKey } from '@solana/web3.js';
import { RandomSource, secureRandom, selectTransferAmount } from './amount.js';
import { transferWith } from './tx/instruction.js';
import { assembleMessage } from './tx/message.js';
import { signMessage } from './tx/signing.js';
import { LedgerClient, TransactionState } from './ledger/types.js';
import { TransferSigner } from './signer/types.js';
import { SubmissionError, SubmissionTimeoutError, errorMessage } from './errors.js';
import { Logger } from './utils/logger.js';

/**
 * Client configuration
 */
export interface SelfTransferClientConfig {
  /** Cluster access */
  ledger: LedgerClient;
  /** Fee payer, sender and recipient */
  signer: TransferSigner;
  /** Randomness for the amount (default: secureRandom) */
  random?: RandomSource;
  logger?: Logger;
}

/**
 * What the run is about to send, reported before signing
 */
export interface TransferPlan {
  feePayer: PublicKey;
  lamports: bigint;
  extraAddresses: readonly PublicKey[];
}

/**
 * Options for a single run
 */
export interface SelfTransferOptions {
  /** Read-only accounts appended to the instruction */
  extraAddresses?: readonly PublicKey[];
  /** Called once the amount is chosen, before anything is signed */
  onPlan?: (plan: TransferPlan) => void;
}

/**
 * Outcome of a confirmed run
 */
export interface TransferResult {
  signature: string;
  lamports: bigint;
  state: TransactionState.Confirmed;
}

/**
 * Pays the signer a random share of its own balance.
 *
 * Steps run strictly in order: balance, amount, instruction, blockhash,
 * message, signatures, submission. Any failure ends the run; nothing is
 * retried here.
 */
export class SelfTransferClient {
  private readonly ledger: LedgerClient;
  private readonly signer: TransferSigner;
  private readonly random: RandomSource;
  private readonly logger: Logger;
  private state: TransactionState = TransactionState.Unsigned;

  constructor(config: SelfTransferClientConfig) {
    this.ledger = config.ledger;
    this.signer = config.signer;
    this.random = config.random ?? secureRandom;
    this.logger = config.logger ?? new Logger();
  }

  /**
   * State reached by the most recent run
   */
  getState(): TransactionState {
    return this.state;
  }

  async transfer(options: SelfTransferOptions = {}): Promise<TransferResult> {
    const { extraAddresses = [], onPlan } = options;
    const feePayer = this.signer.publicKey;
    this.state = TransactionState.Unsigned;

    const balance = await this.ledger.getBalance(feePayer);
    const lamports = selectTransferAmount(balance, this.random);
    this.logger.debug(`Balance ${balance}, transferring ${lamports} lamports`);

    onPlan?.({ feePayer, lamports, extraAddresses });

    const instruction = transferWith({
      from: feePayer,
      to: feePayer,
      lamports,
      extraAddresses,
    });

    const anchor = await this.ledger.getRecentAnchor();
    const { message } = assembleMessage({ instruction, payer: feePayer, anchor });
    this.logger.debug(`Message bound to blockhash ${anchor.blockhash}`);

    const transaction = await signMessage(message, [this.signer]);
    this.transition(TransactionState.Signed);

    try {
      this.transition(TransactionState.Submitted);
      const signature = await this.ledger.submitAndConfirm({ transaction, anchor });
      this.transition(TransactionState.Confirmed);
      return { signature, lamports, state: TransactionState.Confirmed };
    } catch (error) {
      this.transition(
        error instanceof SubmissionTimeoutError ? TransactionState.TimedOut : TransactionState.Failed
      );
      if (error instanceof SubmissionError) {
        throw error;
      }
      throw new SubmissionError(`send transaction: ${errorMessage(error)}`);
    }
  }

  private transition(next: TransactionState): void {
    this.logger.debug(`Transaction ${this.state} -> ${next}`);
    this.state = next;
  }
}
