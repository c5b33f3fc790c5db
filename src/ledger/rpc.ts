/**
 * JSON RPC ledger client
 * @module ledger/rpc
 */

import {
  BlockhashWithExpiryBlockHeight,
  BlockheightBasedTransactionConfirmationStrategy,
  Commitment,
  PublicKey,
  RpcResponseAndContext,
  SendOptions,
  SignatureResult,
  TransactionExpiredBlockheightExceededError,
} from '@solana/web3.js';
import { Anchor, LedgerClient, SignedTransfer } from './types.js';
import {
  QueryError,
  SubmissionError,
  SubmissionTimeoutError,
  errorMessage,
} from '../errors.js';
import { Logger } from '../utils/logger.js';

/**
 * The slice of `Connection` this client calls
 */
export interface LedgerRpc {
  readonly rpcEndpoint: string;
  getBalance(publicKey: PublicKey, commitment?: Commitment): Promise<number>;
  getLatestBlockhash(commitment?: Commitment): Promise<BlockhashWithExpiryBlockHeight>;
  sendRawTransaction(
    rawTransaction: Buffer | Uint8Array | number[],
    options?: SendOptions
  ): Promise<string>;
  confirmTransaction(
    strategy: BlockheightBasedTransactionConfirmationStrategy,
    commitment?: Commitment
  ): Promise<RpcResponseAndContext<SignatureResult>>;
}

export interface RpcLedgerClientOptions {
  /** Commitment for queries and confirmation (default: confirmed) */
  commitment?: Commitment;
  /** Upper bound on sending plus confirmation (default: 60000) */
  confirmTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Ledger client over a Solana JSON RPC connection.
 *
 * Each call is attempted once; failures surface as QueryError or
 * SubmissionError so the caller can tell which phase broke.
 */
export class RpcLedgerClient implements LedgerClient {
  private readonly commitment: Commitment;
  private readonly confirmTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly rpc: LedgerRpc,
    options: RpcLedgerClientOptions = {}
  ) {
    this.commitment = options.commitment ?? 'confirmed';
    this.confirmTimeoutMs = options.confirmTimeoutMs ?? 60_000;
    this.logger = options.logger ?? new Logger();
  }

  get endpoint(): string {
    return this.rpc.rpcEndpoint;
  }

  async getBalance(publicKey: PublicKey): Promise<bigint> {
    try {
      const lamports = await this.rpc.getBalance(publicKey, this.commitment);
      return BigInt(lamports);
    } catch (error) {
      throw new QueryError(`unable to get balance: ${errorMessage(error)}`, error);
    }
  }

  async getRecentAnchor(): Promise<Anchor> {
    try {
      const { blockhash, lastValidBlockHeight } = await this.rpc.getLatestBlockhash(
        this.commitment
      );
      return { blockhash, lastValidBlockHeight };
    } catch (error) {
      throw new QueryError(`unable to get latest blockhash: ${errorMessage(error)}`, error);
    }
  }

  async submitAndConfirm(signed: SignedTransfer): Promise<string> {
    const { transaction, anchor } = signed;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let signature: string | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        const stage = signature ? `confirmation of ${signature}` : 'submission';
        reject(
          new SubmissionTimeoutError(
            `send transaction: ${stage} timed out after ${this.confirmTimeoutMs}ms`,
            signature
          )
        );
      }, this.confirmTimeoutMs);
    });

    try {
      return await Promise.race([
        this.sendAndConfirm(transaction.serialize(), anchor, controller.signal, (sent) => {
          signature = sent;
        }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
      controller.abort();
    }
  }

  private async sendAndConfirm(
    raw: Uint8Array,
    anchor: Anchor,
    abortSignal: AbortSignal,
    onSent: (signature: string) => void
  ): Promise<string> {
    let signature: string;
    try {
      signature = await this.rpc.sendRawTransaction(raw, {
        skipPreflight: false,
        preflightCommitment: this.commitment,
      });
    } catch (error) {
      throw new SubmissionError(`send transaction: ${errorMessage(error)}`);
    }

    onSent(signature);
    this.logger.debug(`Sent ${signature}, waiting for ${this.commitment} confirmation`);

    let confirmation: RpcResponseAndContext<SignatureResult>;
    try {
      confirmation = await this.rpc.confirmTransaction(
        {
          signature,
          blockhash: anchor.blockhash,
          lastValidBlockHeight: anchor.lastValidBlockHeight,
          abortSignal,
        },
        this.commitment
      );
    } catch (error) {
      if (error instanceof TransactionExpiredBlockheightExceededError) {
        throw new SubmissionTimeoutError(
          `send transaction: blockhash expired before ${signature} was confirmed`,
          signature
        );
      }
      throw new SubmissionError(`send transaction: ${errorMessage(error)}`);
    }

    if (confirmation.value.err) {
      throw new SubmissionError(
        `send transaction: ${signature} failed: ${JSON.stringify(confirmation.value.err)}`
      );
    }

    return signature;
  }
}
