/**
 * Signer reference resolution
 * @module signer/resolve
 */

import { PublicKey } from '@solana/web3.js';
import { TransferSigner } from './types.js';
import { KeypairSigner } from './keypair.js';
import { RemoteSigner } from './remote.js';
import { ResolutionError } from '../errors.js';
import { expandHome } from '../utils/paths.js';

export const REMOTE_SIGNER_SCHEME = 'unix:';

export const SHARED_SECRET_ENV = 'SIGNER_SHARED_SECRET';

function resolveRemote(reference: string, env: NodeJS.ProcessEnv): RemoteSigner {
  let url: URL;
  try {
    url = new URL(reference);
  } catch {
    throw new ResolutionError(`invalid remote signer reference: ${reference}`);
  }

  const socketPath = decodeURIComponent(url.pathname);
  if (!socketPath) {
    throw new ResolutionError(`remote signer reference has no socket path: ${reference}`);
  }

  const encodedKey = url.searchParams.get('pubkey');
  if (!encodedKey) {
    throw new ResolutionError(`remote signer reference needs ?pubkey=<address>: ${reference}`);
  }

  let publicKey: PublicKey;
  try {
    publicKey = new PublicKey(encodedKey);
  } catch (error) {
    throw new ResolutionError(`remote signer pubkey is not a valid address: ${encodedKey}`, error);
  }

  const sharedSecret = env[SHARED_SECRET_ENV];
  if (!sharedSecret) {
    throw new ResolutionError(`${SHARED_SECRET_ENV} must be set to use a remote signer`);
  }

  return new RemoteSigner({ socketPath, publicKey, sharedSecret });
}

/**
 * Turn a `--keypair` reference into a signer.
 *
 * `unix:///path/to.sock?pubkey=<address>` selects the remote signer; anything
 * else is read as a keypair file path.
 */
export async function resolveSigner(
  reference: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<TransferSigner> {
  if (reference.startsWith(REMOTE_SIGNER_SCHEME)) {
    return resolveRemote(reference, env);
  }

  return KeypairSigner.fromFile(expandHome(reference));
}
