import { createHmac, timingSafeEqual } from 'crypto';

/**
 * Domain rules for time-based proofs.
 * Pure functions over (secret, time); no clock or configuration access.
 */

// ============ CONSTANTS ============

export const PROOF_LENGTH = 8;
export const DEFAULT_PERIOD_SECONDS = 30;
export const DEFAULT_WINDOW_BLOCKS = 2;

// ============ TIME BLOCK RULES ============

export function toUnixSeconds(now: Date): number {
  return now.getTime() / 1000;
}

/**
 * floor(unix_seconds / period). Two instants in the same period share a block.
 */
export function getTimeBlock(now: Date, periodSeconds: number): number {
  return Math.floor(toUnixSeconds(now) / periodSeconds);
}

/**
 * Seconds until the block changes, counted in whole seconds.
 * Informational only; at an exact block boundary this is the full period.
 */
export function getSecondsUntilRotation(
  now: Date,
  periodSeconds: number,
): number {
  const wholeSeconds = Math.floor(toUnixSeconds(now));
  return periodSeconds - (wholeSeconds % periodSeconds);
}

/**
 * 8-byte big-endian unsigned encoding of a block counter.
 */
export function encodeTimeBlock(block: number): Buffer {
  const buf = Buffer.alloc(8);
  buf.writeBigUInt64BE(BigInt(block));
  return buf;
}

// ============ PROOF RULES ============

/**
 * uppercase_hex(HMAC-SHA256(secret, u64be(block)))[0..8]
 */
export function deriveProof(secret: Buffer, block: number): string {
  return createHmac('sha256', secret)
    .update(encodeTimeBlock(block))
    .digest('hex')
    .slice(0, PROOF_LENGTH)
    .toUpperCase();
}

export function getCurrentProof(
  secret: Buffer,
  now: Date,
  periodSeconds: number,
): string {
  return deriveProof(secret, getTimeBlock(now, periodSeconds));
}

/**
 * Proofs accepted at `now`: the current block first, then the
 * `windowBlocks - 1` blocks before it. Blocks before the epoch are skipped.
 */
export function getValidWindow(
  secret: Buffer,
  now: Date,
  periodSeconds: number,
  windowBlocks: number,
): string[] {
  const current = getTimeBlock(now, periodSeconds);
  const proofs: string[] = [];
  for (let offset = 0; offset < windowBlocks; offset++) {
    const block = current - offset;
    if (block < 0) {
      break;
    }
    proofs.push(deriveProof(secret, block));
  }
  return proofs;
}

// ============ COMPARISON RULES ============

/**
 * Exact, case-sensitive comparison whose running time does not depend on
 * where the strings first differ. Only the length may leak.
 */
export function proofsMatch(candidate: string, expected: string): boolean {
  if (candidate.length !== expected.length) {
    return false;
  }
  const a = Buffer.from(candidate, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(a, b);
}

/**
 * Membership test against a window. Every element is compared, even after a
 * match, so the position of the matching proof is not observable.
 */
export function isInWindow(candidate: string, window: string[]): boolean {
  let matched = false;
  for (const proof of window) {
    const equal = proofsMatch(candidate, proof);
    matched = matched || equal;
  }
  return matched;
}
