/**
 * Crypto module tests
 */

import { describe, it, expect } from '@jest/globals';
import { Crypto } from '../src/stakevote/crypto.js';

describe('Crypto', () => {
  describe('hash', () => {
    it('should produce consistent hashes for the same input', () => {
      expect(Crypto.hash('test input')).toBe(Crypto.hash('test input'));
    });

    it('should produce different hashes for different inputs', () => {
      expect(Crypto.hash('input1')).not.toBe(Crypto.hash('input2'));
    });

    it('should hash multiple inputs as their concatenated bytes', () => {
      expect(Crypto.hash('a', 'b', 'c')).toBe(Crypto.hash('abc'));
    });

    it('should produce the SHA-256 digest as hex', () => {
      expect(Crypto.hash('abc')).toBe(
        'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
      );
    });
  });

  describe('keypairs', () => {
    it('should generate valid keypairs', () => {
      const keypair = Crypto.generateKeyPair();

      expect(Crypto.isValidKey(keypair.publicKey)).toBe(true);
      expect(Crypto.isValidKey(keypair.privateKey)).toBe(true);
      expect(keypair.publicKey).not.toBe(keypair.privateKey);
    });

    it('should generate unique keypairs', () => {
      const keypair1 = Crypto.generateKeyPair();
      const keypair2 = Crypto.generateKeyPair();

      expect(keypair1.privateKey).not.toBe(keypair2.privateKey);
      expect(keypair1.publicKey).not.toBe(keypair2.publicKey);
    });

    it('should rebuild the same keypair from a stored private key', () => {
      const keypair = Crypto.generateKeyPair();
      const restored = Crypto.keyPairFromPrivateKey(keypair.privateKey.toUpperCase());

      expect(restored).toEqual(keypair);
    });

    it('should reject malformed private keys', () => {
      expect(() => Crypto.keyPairFromPrivateKey('not-a-key')).toThrow('Private key must be 32 bytes of hex');
      expect(() => Crypto.keyPairFromPrivateKey('ab'.repeat(31))).toThrow();
    });
  });

  describe('signatures', () => {
    it('should sign and verify messages', () => {
      const keypair = Crypto.generateKeyPair();
      const signature = Crypto.sign('Hello, world!', keypair.privateKey);

      expect(Crypto.verify('Hello, world!', signature, keypair.publicKey)).toBe(true);
    });

    it('should reject signatures from a different key', () => {
      const signer = Crypto.generateKeyPair();
      const other = Crypto.generateKeyPair();
      const signature = Crypto.sign('Hello, world!', signer.privateKey);

      expect(Crypto.verify('Hello, world!', signature, other.publicKey)).toBe(false);
    });

    it('should reject modified messages', () => {
      const keypair = Crypto.generateKeyPair();
      const signature = Crypto.sign('Hello, world!', keypair.privateKey);

      expect(Crypto.verify('Hello, World!', signature, keypair.publicKey)).toBe(false);
    });

    it('should treat malformed signatures as invalid', () => {
      const keypair = Crypto.generateKeyPair();

      expect(Crypto.verify('message', 'zz', keypair.publicKey)).toBe(false);
      expect(Crypto.verify('message', '', keypair.publicKey)).toBe(false);
    });
  });

  describe('isValidKey', () => {
    it('should accept 64 hex characters only', () => {
      expect(Crypto.isValidKey('a'.repeat(64))).toBe(true);
      expect(Crypto.isValidKey('A'.repeat(64))).toBe(true);
      expect(Crypto.isValidKey('x'.repeat(64))).toBe(false);
      expect(Crypto.isValidKey('a'.repeat(63))).toBe(false);
      expect(Crypto.isValidKey('')).toBe(false);
      expect(Crypto.isValidKey(42)).toBe(false);
    });
  });
});
