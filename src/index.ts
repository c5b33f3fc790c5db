/**
 * transfer-with - pay yourself a random share of your balance on Solana,
 * with extra read-only accounts attached to the transfer instruction.
 *
 * - Amount selection with injectable randomness
 * - Position-exact account metas for the System Program transfer
 * - Legacy message assembly, Ed25519 signing and verification
 * - Bounded-wait submission over JSON RPC
 *
 * @packageDocumentation
 */

export * from './amount.js';
export * from './client.js';
export * from './config.js';
export * from './tx/instruction.js';
export * from './tx/message.js';
export * from './tx/signing.js';
export * from './ledger/types.js';
export * from './ledger/rpc.js';
export * from './signer/types.js';
export * from './signer/keypair.js';
export * from './signer/remote.js';
export * from './signer/protocol.js';
export * from './signer/resolve.js';
export * from './errors.js';
export * from './utils/logger.js';
export * from './utils/paths.js';
