/**
 * Base class for domain errors.
 * Domain errors represent rule violations the caller can classify by code.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ============ CONFIGURATION ERRORS ============

export class InvalidConfigurationError extends DomainError {
  readonly code = 'INVALID_CONFIGURATION';

  constructor(public readonly violations: string[]) {
    super(`Invalid guard configuration: ${violations.join('; ')}`);
  }
}

// ============ TOKEN ERRORS ============

export class InvalidTokenPolicyError extends DomainError {
  readonly code = 'INVALID_TOKEN_POLICY';

  constructor(message: string) {
    super(message);
  }
}

// ============ VAULT ERRORS ============

export class PinOutOfRangeError extends DomainError {
  readonly code = 'PIN_OUT_OF_RANGE';

  constructor(public readonly pin: number) {
    super(`PIN ${pin} does not fit in an unsigned 32-bit integer`);
  }
}
