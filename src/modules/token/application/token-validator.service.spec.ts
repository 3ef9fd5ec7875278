import { describe, it, expect, beforeEach } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import { TokenValidatorService } from './token-validator.service';
import {
  PROOF_SOURCE,
  StaticProofSource,
  TotpProofSource,
} from '../domain/proof-source';
import type { ProofSource } from '../domain/proof-source';
import { CLOCK } from '../../../shared/domain/clock.port';
import { FakeClock } from '../../../../test/fake-clock';

describe('TokenValidatorService', () => {
  let clock: FakeClock;

  async function createValidator(source: ProofSource) {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TokenValidatorService,
        { provide: PROOF_SOURCE, useValue: source },
        { provide: CLOCK, useValue: clock },
      ],
    }).compile();

    return module.get<TokenValidatorService>(TokenValidatorService);
  }

  beforeEach(() => {
    clock = new FakeClock(90_000);
  });

  describe('totp source', () => {
    const source = new TotpProofSource(Buffer.from('test-secret'), 30, 2);

    it('should accept the proof the source currently shows', async () => {
      const validator = await createValidator(source);

      expect(validator.isValid(source.current(clock.now()))).toBe(true);
    });

    it('should follow the clock between calls', async () => {
      const validator = await createValidator(source);
      const proof = source.current(clock.now());

      clock.advance(59_000);
      expect(validator.isValid(proof)).toBe(true);

      clock.advance(1_000);
      expect(validator.isValid(proof)).toBe(false);
    });

    it('should reject a proof made with a different secret', async () => {
      const validator = await createValidator(source);
      const other = new TotpProofSource(Buffer.from('other-secret'), 30, 2);

      expect(validator.isValid(other.current(clock.now()))).toBe(false);
    });

    it('should not accept proofs from the next block', async () => {
      const validator = await createValidator(source);
      const future = source.current(new Date(120_000));

      expect(validator.isValidAt(future, new Date(119_999))).toBe(false);
    });

    it('should reject the lowercase form of a valid proof', async () => {
      const validator = await createValidator(source);
      const proof = source.current(clock.now());

      expect(validator.isValid(proof.toLowerCase())).toBe(
        proof === proof.toLowerCase(),
      );
    });

    it('should reject malformed input without throwing', async () => {
      const validator = await createValidator(source);

      for (const candidate of ['', ' ', '\u0000\u0000', 'ÄÖÜ', 'x'.repeat(4096)]) {
        expect(validator.isValid(candidate)).toBe(false);
      }
    });
  });

  describe('static source', () => {
    const source = new StaticProofSource('test-literal');

    it('should accept the literal at any time', async () => {
      const validator = await createValidator(source);

      expect(validator.isValid('test-literal')).toBe(true);
      clock.advance(86_400_000);
      expect(validator.isValid('test-literal')).toBe(true);
    });

    it('should reject anything else', async () => {
      const validator = await createValidator(source);

      expect(validator.isValid('test-literal ')).toBe(false);
      expect(validator.isValid('TEST-LITERAL')).toBe(false);
    });
  });
});
