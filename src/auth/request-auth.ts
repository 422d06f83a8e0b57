import { NextFunction, Request, RequestHandler, Response } from 'express';
import { Address } from '../types';
import { AuthorizationError, UNAUTHORIZED } from '../core/errors';
import { requestSigningMessage } from '../core/hashing';
import { isValidPublicKey, publicKeyToAddress, signMessage, verifySignature } from '../crypto';

export const SIGNER_HEADER = 'x-signer-pubkey';
export const SIGNATURE_HEADER = 'x-signature';
export const TIMESTAMP_HEADER = 'x-timestamp';

export interface SignedCaller {
  address: Address;
  publicKey: string;
  timestamp: number;
}

declare global {
  namespace Express {
    interface Request {
      caller?: SignedCaller;
    }
  }
}

export interface SignatureHeaders {
  signer?: string;
  signature?: string;
  timestamp?: string;
}

export interface RequestAuthOptions {
  maxSkewSeconds: number;
  clock?: () => number;
}

/**
 * Builds the headers a caller attaches to a mutating request.
 */
export function signRequest(
  method: string,
  url: string,
  body: unknown,
  keys: { privateKey: string; publicKey: string },
  timestamp: number = Date.now()
): Record<string, string> {
  const message = requestSigningMessage(method, url, timestamp, body);
  return {
    [SIGNER_HEADER]: keys.publicKey,
    [SIGNATURE_HEADER]: signMessage(message, keys.privateKey),
    [TIMESTAMP_HEADER]: String(timestamp)
  };
}

/**
 * Verifies secp256k1-signed requests. The caller's identity is the P2PKH
 * address of the signing key. A signature is accepted once within the skew
 * window.
 */
export class RequestAuthenticator {
  private maxSkewMs: number;
  private clock: () => number;
  private usedSignatures: Map<string, number> = new Map();

  constructor(options: RequestAuthOptions) {
    this.maxSkewMs = options.maxSkewSeconds * 1000;
    this.clock = options.clock ?? (() => Date.now());
  }

  verify(method: string, url: string, headers: SignatureHeaders, body: unknown): SignedCaller {
    const { signer, signature } = headers;
    if (!signer || !signature || !headers.timestamp) {
      throw new AuthorizationError('missing request signature headers');
    }

    const timestamp = Number(headers.timestamp);
    if (!Number.isSafeInteger(timestamp)) {
      throw new AuthorizationError('invalid request timestamp');
    }

    const now = this.clock();
    if (Math.abs(now - timestamp) > this.maxSkewMs) {
      throw new AuthorizationError('request timestamp outside the accepted window', { timestamp, now });
    }

    if (!isValidPublicKey(signer)) {
      throw new AuthorizationError('invalid signer public key');
    }

    const message = requestSigningMessage(method, url, timestamp, body);
    if (!verifySignature(message, signature, signer)) {
      throw new AuthorizationError('invalid request signature');
    }

    this.pruneSignatures(now);
    if (this.usedSignatures.has(signature)) {
      throw new AuthorizationError('request signature already used');
    }
    this.usedSignatures.set(signature, timestamp + this.maxSkewMs);

    return { address: publicKeyToAddress(signer), publicKey: signer, timestamp };
  }

  middleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      try {
        req.caller = this.verify(
          req.method,
          req.originalUrl,
          {
            signer: req.header(SIGNER_HEADER),
            signature: req.header(SIGNATURE_HEADER),
            timestamp: req.header(TIMESTAMP_HEADER)
          },
          req.body
        );
      } catch (error) {
        const message = error instanceof Error ? error.message : 'unauthorized';
        res.status(401).json({ success: false, error: message, code: UNAUTHORIZED });
        return;
      }
      next();
    };
  }

  private pruneSignatures(now: number): void {
    for (const [signature, expiresAt] of this.usedSignatures) {
      if (expiresAt < now) {
        this.usedSignatures.delete(signature);
      }
    }
  }
}

export function requireCaller(req: Request): Address {
  if (!req.caller) {
    throw new AuthorizationError('request is not signed');
  }
  return req.caller.address;
}
