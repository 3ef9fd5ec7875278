import { describe, it, expect } from 'vitest';
import { createHmac } from 'crypto';
import {
  getTimeBlock,
  getSecondsUntilRotation,
  encodeTimeBlock,
  deriveProof,
  getCurrentProof,
  getValidWindow,
  proofsMatch,
  isInWindow,
} from './token.rules';

const at = (seconds: number) => new Date(seconds * 1000);

const secret = Buffer.from('TESTKEY');
const otherSecret = Buffer.from('OTHERKEY');

/** Reference derivation written out independently of the rules module. */
const referenceProof = (key: Buffer, block: number) =>
  createHmac('sha256', key)
    .update(Buffer.from([0, 0, 0, 0, 0, 0, 0, block]))
    .digest('hex')
    .slice(0, 8)
    .toUpperCase();

describe('Token Domain Rules', () => {
  // ============ TIME BLOCK RULES ============

  describe('getTimeBlock', () => {
    it('should floor unix seconds by the period', () => {
      expect(getTimeBlock(at(90), 30)).toBe(3);
      expect(getTimeBlock(at(119.999), 30)).toBe(3);
      expect(getTimeBlock(at(120), 30)).toBe(4);
    });

    it('should map every instant of a period to the same block', () => {
      const blocks = [60, 61, 75, 89].map((s) => getTimeBlock(at(s), 30));

      expect(new Set(blocks)).toEqual(new Set([2]));
    });
  });

  describe('getSecondsUntilRotation', () => {
    it('should return the full period at a block boundary', () => {
      expect(getSecondsUntilRotation(at(90), 30)).toBe(30);
    });

    it('should count down within a block', () => {
      expect(getSecondsUntilRotation(at(91), 30)).toBe(29);
      expect(getSecondsUntilRotation(at(119.5), 30)).toBe(1);
    });
  });

  describe('encodeTimeBlock', () => {
    it('should encode as 8-byte big-endian', () => {
      expect(encodeTimeBlock(3)).toEqual(
        Buffer.from([0, 0, 0, 0, 0, 0, 0, 3]),
      );
      expect(encodeTimeBlock(0x0102)).toEqual(
        Buffer.from([0, 0, 0, 0, 0, 0, 1, 2]),
      );
    });
  });

  // ============ PROOF RULES ============

  describe('deriveProof', () => {
    it('should match the reference HMAC-SHA256 derivation', () => {
      expect(deriveProof(secret, 3)).toBe(referenceProof(secret, 3));
    });

    it('should produce 8 uppercase hex characters', () => {
      expect(deriveProof(secret, 3)).toMatch(/^[0-9A-F]{8}$/);
    });

    it('should be deterministic', () => {
      expect(deriveProof(secret, 42)).toBe(deriveProof(secret, 42));
    });

    it('should differ between secrets', () => {
      expect(deriveProof(secret, 3)).not.toBe(deriveProof(otherSecret, 3));
    });
  });

  describe('getCurrentProof', () => {
    it('should derive the proof for block 3 at t=90 with a 30s period', () => {
      expect(getCurrentProof(secret, at(90), 30)).toBe(
        referenceProof(secret, 3),
      );
    });

    it('should not change within a block', () => {
      expect(getCurrentProof(secret, at(91), 30)).toBe(
        getCurrentProof(secret, at(119), 30),
      );
    });
  });

  describe('getValidWindow', () => {
    it('should contain the current block then the previous one', () => {
      expect(getValidWindow(secret, at(95), 30, 2)).toEqual([
        referenceProof(secret, 3),
        referenceProof(secret, 2),
      ]);
    });

    it('should honour a wider window', () => {
      expect(getValidWindow(secret, at(95), 30, 3)).toEqual([
        referenceProof(secret, 3),
        referenceProof(secret, 2),
        referenceProof(secret, 1),
      ]);
    });

    it('should skip blocks before the epoch', () => {
      expect(getValidWindow(secret, at(10), 30, 2)).toEqual([
        referenceProof(secret, 0),
      ]);
    });
  });

  // ============ COMPARISON RULES ============

  describe('proofsMatch', () => {
    it('should accept an identical string', () => {
      expect(proofsMatch('ABCDEF01', 'ABCDEF01')).toBe(true);
    });

    it('should be case-sensitive', () => {
      expect(proofsMatch('abcdef01', 'ABCDEF01')).toBe(false);
    });

    it('should not trim whitespace', () => {
      expect(proofsMatch(' ABCDEF0', 'ABCDEF01')).toBe(false);
      expect(proofsMatch('ABCDEF01 ', 'ABCDEF01')).toBe(false);
    });

    it('should reject strings of another length', () => {
      expect(proofsMatch('', 'ABCDEF01')).toBe(false);
      expect(proofsMatch('ABCDEF01'.repeat(1000), 'ABCDEF01')).toBe(false);
    });

    it('should reject non-ASCII input with the same character count', () => {
      expect(proofsMatch('ÄBCDEF01', 'ABCDEF01')).toBe(false);
    });
  });

  describe('isInWindow', () => {
    it('should accept a member at any position', () => {
      expect(isInWindow('BBBBBBBB', ['AAAAAAAA', 'BBBBBBBB'])).toBe(true);
      expect(isInWindow('AAAAAAAA', ['AAAAAAAA', 'BBBBBBBB'])).toBe(true);
    });

    it('should reject a non-member', () => {
      expect(isInWindow('CCCCCCCC', ['AAAAAAAA', 'BBBBBBBB'])).toBe(false);
    });

    it('should reject everything against an empty window', () => {
      expect(isInWindow('', [])).toBe(false);
    });
  });
});
