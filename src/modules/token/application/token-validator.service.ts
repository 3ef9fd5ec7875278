import { Inject, Injectable } from '@nestjs/common';
import type { Clock } from '../../../shared/domain/clock.port';
import { CLOCK } from '../../../shared/domain/clock.port';
import type { ProofSource } from '../domain/proof-source';
import { PROOF_SOURCE } from '../domain/proof-source';
import { isInWindow } from '../domain/token.rules';

/**
 * Decides whether a decoded candidate is a currently valid proof.
 *
 * The window is rebuilt from the source on every call. With the default
 * two-block window a proof shown at the start of its block keeps validating
 * until the end of the following block, so the total replay tolerance is
 * up to 2 x period. Proofs from future blocks are never accepted.
 */
@Injectable()
export class TokenValidatorService {
  constructor(
    @Inject(PROOF_SOURCE) private readonly source: ProofSource,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Validate against the clock's current time.
   */
  isValid(candidate: string): boolean {
    return this.isValidAt(candidate, this.clock.now());
  }

  /**
   * Never throws: any string outside the window, however malformed, is
   * simply rejected.
   */
  isValidAt(candidate: string, now: Date): boolean {
    return isInWindow(candidate, this.source.window(now));
  }
}
