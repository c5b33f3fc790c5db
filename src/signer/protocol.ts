import { z } from 'zod';

/**
 * Wire format spoken with a remote signing co-process.
 *
 * One request per connection, newline-delimited JSON in both directions:
 * - hmac: HMAC-SHA256 of messageBase64 under the shared secret (hex, 64 chars)
 * - messageBase64: serialized message bytes to sign
 * - requestId: UUID echoed back for correlation
 */
export const RemoteSignRequest = z.object({
  hmac: z.string().length(64),
  messageBase64: z.string().min(1),
  requestId: z.string().uuid(),
});

export type RemoteSignRequest = z.infer<typeof RemoteSignRequest>;

export const RemoteSignResponse = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    /** 64-byte Ed25519 signature, base64 */
    signatureBase64: z.string(),
    requestId: z.string(),
  }),
  z.object({
    ok: z.literal(false),
    /** `rejected` means the operator declined to sign */
    error: z.enum(['auth_failed', 'sign_error', 'rejected']),
    requestId: z.string(),
  }),
]);

export type RemoteSignResponse = z.infer<typeof RemoteSignResponse>;
