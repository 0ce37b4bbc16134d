import { createHash } from 'node:crypto';
import type { Credentials, SignedParams } from './types.js';

/**
 * Signer — derives the `ts` / `apikey` / `hash` triple the Marvel API requires.
 *
 * hash = md5(ts + privateKey + publicKey), lowercase hex. The gateway rejects
 * stale timestamps, so callers must sign again for every transport attempt.
 */
export class Signer {
  private readonly credentials: Credentials;
  private readonly now: () => number;

  constructor(credentials: Credentials, now: () => number = () => Date.now()) {
    this.credentials = credentials;
    this.now = now;
  }

  sign(): SignedParams {
    const timestamp = Math.floor(this.now() / 1000);
    const hash = createHash('md5')
      .update(`${timestamp}${this.credentials.privateKey}${this.credentials.publicKey}`, 'utf8')
      .digest('hex');

    return { timestamp, apiKey: this.credentials.publicKey, hash };
  }
}

// Renders signed params under their wire names
export function toQuery(signed: SignedParams): Record<'ts' | 'apikey' | 'hash', string> {
  return {
    ts: String(signed.timestamp),
    apikey: signed.apiKey,
    hash: signed.hash,
  };
}
