/**
 * Signed request authentication
 *
 * Mutating requests carry X-Public-Key and X-Signature headers, where the
 * signature is Ed25519 over `METHOD path` and the raw body bytes, joined by a
 * newline. The body must include a millisecond `timestamp` close to server
 * time, and each signature is accepted once while that timestamp is still fresh.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { Crypto } from '../../stakevote/crypto.js';

export interface SignedRequestOptions {
  /** Allowed distance between body timestamp and server time */
  maxSkewMs?: number;
  now?: () => number;
}

export const DEFAULT_MAX_SKEW_MS = 5 * 60 * 1000;

const rawBodies = new WeakMap<IncomingMessage, string>();

/**
 * `verify` hook for express.json(); keeps the body as received for signature checks
 */
export function captureRawBody(req: IncomingMessage, _res: ServerResponse, buf: Buffer): void {
  rawBodies.set(req, buf.toString('utf8'));
}

/**
 * The string a request signature covers
 */
export function signingPayload(method: string, path: string, rawBody: string): string {
  return `${method.toUpperCase()} ${path}\n${rawBody}`;
}

export function requireSignature(options: SignedRequestOptions = {}): RequestHandler {
  const maxSkewMs = options.maxSkewMs ?? DEFAULT_MAX_SKEW_MS;
  const now = options.now ?? Date.now;
  const seen = new Map<string, number>();

  return (req: Request, res: Response, next: NextFunction) => {
    const publicKey = req.get('x-public-key');
    const signature = req.get('x-signature');

    if (!publicKey || !signature) {
      res.status(401).json({ error: 'X-Public-Key and X-Signature headers are required', code: 'SIGNATURE_REQUIRED' });
      return;
    }

    if (!Crypto.isValidKey(publicKey)) {
      res.status(401).json({ error: 'Invalid public key', code: 'INVALID_SIGNATURE' });
      return;
    }

    const body: unknown = req.body;
    const payload = signingPayload(req.method, req.originalUrl, rawBodies.get(req) ?? '');
    if (typeof body !== 'object' || body === null || !Crypto.verify(payload, signature, publicKey)) {
      res.status(401).json({ error: 'Invalid signature', code: 'INVALID_SIGNATURE' });
      return;
    }

    const current = now();
    const timestamp = 'timestamp' in body ? body.timestamp : undefined;
    if (typeof timestamp !== 'number' || Math.abs(current - timestamp) > maxSkewMs) {
      res.status(401).json({ error: 'Request timestamp is missing or stale', code: 'STALE_REQUEST' });
      return;
    }

    for (const [key, expiresAt] of seen) {
      if (expiresAt < current) {
        seen.delete(key);
      }
    }

    const fingerprint = Crypto.hash(publicKey, signature);
    if (seen.has(fingerprint)) {
      res.status(401).json({ error: 'Request has already been processed', code: 'REPLAYED_REQUEST' });
      return;
    }
    seen.set(fingerprint, timestamp + maxSkewMs);

    res.locals.caller = publicKey;
    next();
  };
}

/**
 * The verified caller set by requireSignature
 */
export function getCaller(res: Response): string {
  const caller: unknown = res.locals.caller;
  if (typeof caller !== 'string') {
    throw new Error('Route is missing requireSignature()');
  }
  return caller;
}

/**
 * Build the headers for a signed request (used by clients and tests)
 */
export function signRequest(
  method: string,
  path: string,
  body: Record<string, unknown>,
  privateKey: string
): { body: string; headers: Record<string, string> } {
  const serialized = JSON.stringify(body);
  const { publicKey } = Crypto.keyPairFromPrivateKey(privateKey);
  return {
    body: serialized,
    headers: {
      'Content-Type': 'application/json',
      'X-Public-Key': publicKey,
      'X-Signature': Crypto.sign(signingPayload(method, path, serialized), privateKey),
    },
  };
}
