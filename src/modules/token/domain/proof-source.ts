import { InvalidTokenPolicyError } from '../../../shared/domain/errors';
import {
  getCurrentProof,
  getSecondsUntilRotation,
  getTimeBlock,
  getValidWindow,
} from './token.rules';

export type TokenMode = 'totp' | 'static';

export type TokenPolicy =
  | {
      mode: 'totp';
      secret: Buffer;
      periodSeconds: number;
      windowBlocks: number;
    }
  | {
      mode: 'static';
      literal: string;
    };

/**
 * Where proofs come from. The generator and the validator both work against
 * this interface, so a static literal is just a source that never rotates.
 */
export interface ProofSource {
  readonly mode: TokenMode;

  /** Proof a holder should present at `now`. */
  current(now: Date): string;

  /** Proofs accepted at `now`, current first. Recomputed on every call. */
  window(now: Date): string[];

  /** Rotation step at `now`; constant for a source that never rotates. */
  step(now: Date): number;

  /** Seconds until `current` changes, or null if it never does. */
  secondsUntilRotation(now: Date): number | null;
}

export class TotpProofSource implements ProofSource {
  readonly mode = 'totp';

  constructor(
    private readonly secret: Buffer,
    private readonly periodSeconds: number,
    private readonly windowBlocks: number,
  ) {
    if (secret.length === 0) {
      throw new InvalidTokenPolicyError('Shared secret must not be empty');
    }
    if (!Number.isInteger(periodSeconds) || periodSeconds <= 0) {
      throw new InvalidTokenPolicyError(
        `Period must be a positive integer number of seconds, got ${periodSeconds}`,
      );
    }
    if (!Number.isInteger(windowBlocks) || windowBlocks < 1) {
      throw new InvalidTokenPolicyError(
        `Window must span at least one block, got ${windowBlocks}`,
      );
    }
  }

  current(now: Date): string {
    return getCurrentProof(this.secret, now, this.periodSeconds);
  }

  window(now: Date): string[] {
    return getValidWindow(
      this.secret,
      now,
      this.periodSeconds,
      this.windowBlocks,
    );
  }

  step(now: Date): number {
    return getTimeBlock(now, this.periodSeconds);
  }

  secondsUntilRotation(now: Date): number {
    return getSecondsUntilRotation(now, this.periodSeconds);
  }
}

export class StaticProofSource implements ProofSource {
  readonly mode = 'static';

  constructor(private readonly literal: string) {
    if (literal.length === 0) {
      throw new InvalidTokenPolicyError('Static token must not be empty');
    }
  }

  current(): string {
    return this.literal;
  }

  window(): string[] {
    return [this.literal];
  }

  step(): number {
    return 0;
  }

  secondsUntilRotation(): null {
    return null;
  }
}

export function createProofSource(policy: TokenPolicy): ProofSource {
  switch (policy.mode) {
    case 'totp':
      return new TotpProofSource(
        policy.secret,
        policy.periodSeconds,
        policy.windowBlocks,
      );
    case 'static':
      return new StaticProofSource(policy.literal);
  }
}

export const PROOF_SOURCE = Symbol('PROOF_SOURCE');
