/**
 * Cryptographic operations for StakeVote
 * Ed25519 identities for callers, SHA-256 for request fingerprints
 */

import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, hexToBytes, randomBytes } from '@noble/hashes/utils';
import { ed25519 } from '@noble/curves/ed25519';
import type { KeyPair, PublicKey, PrivateKey, Signature, Hash } from './types.js';

export class Crypto {
  /**
   * SHA-256 hash with multiple input support
   */
  static hash(...inputs: (Uint8Array | string)[]): Hash {
    const parts = inputs.map(input =>
      typeof input === 'string' ? new TextEncoder().encode(input) : input
    );
    const combined = new Uint8Array(parts.reduce((acc, bytes) => acc + bytes.length, 0));

    let offset = 0;
    for (const bytes of parts) {
      combined.set(bytes, offset);
      offset += bytes.length;
    }

    return bytesToHex(sha256(combined));
  }

  /**
   * Generate a new Ed25519 keypair
   */
  static generateKeyPair(): KeyPair {
    return this.keyPairFromPrivateKey(bytesToHex(randomBytes(32)));
  }

  /**
   * Rebuild a keypair from a stored private key
   */
  static keyPairFromPrivateKey(privateKey: PrivateKey): KeyPair {
    if (!this.isValidKey(privateKey)) {
      throw new Error('Private key must be 32 bytes of hex');
    }
    return {
      privateKey: privateKey.toLowerCase(),
      publicKey: bytesToHex(ed25519.getPublicKey(hexToBytes(privateKey))),
    };
  }

  static sign(message: string | Uint8Array, privateKey: PrivateKey): Signature {
    const messageBytes = typeof message === 'string'
      ? new TextEncoder().encode(message)
      : message;
    return bytesToHex(ed25519.sign(messageBytes, hexToBytes(privateKey)));
  }

  /**
   * Verify an Ed25519 signature. Malformed input is simply invalid.
   */
  static verify(message: string | Uint8Array, signature: Signature, publicKey: PublicKey): boolean {
    try {
      const messageBytes = typeof message === 'string'
        ? new TextEncoder().encode(message)
        : message;
      return ed25519.verify(hexToBytes(signature), messageBytes, hexToBytes(publicKey));
    } catch {
      return false;
    }
  }

  /**
   * Validate a public or private key format (32 bytes hex)
   */
  static isValidKey(key: unknown): key is string {
    return typeof key === 'string' && /^[0-9a-f]{64}$/i.test(key);
  }
}
