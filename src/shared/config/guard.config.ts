import { registerAs } from '@nestjs/config';
import { InvalidConfigurationError } from '../domain/errors';
import type { TokenPolicy } from '../../modules/token/domain/proof-source';
import type { GatePolicy } from '../../modules/guard/domain/unlock-gate.entity';
import type {
  ByteOrder,
  VaultSettings,
} from '../../modules/vault/domain/unlock.port';
import { EnvironmentVariables, validateEnvironment } from './environment';

export interface GuardConfig {
  token: TokenPolicy;
  gate: GatePolicy;
  unlock: {
    pin: number;
    byteOrder: ByteOrder;
  };
  vault: VaultSettings;
  display: {
    enabled: boolean;
  };
  rejectLogIntervalMs: number;
  port: number;
}

const HEX_SECRET_PREFIX = 'hex:';

/**
 * Plain text is used as UTF-8 bytes; a `hex:` prefix marks raw bytes.
 */
export function parseSharedSecret(raw: string): Buffer {
  if (!raw.startsWith(HEX_SECRET_PREFIX)) {
    return Buffer.from(raw, 'utf8');
  }
  const hex = raw.slice(HEX_SECRET_PREFIX.length);
  if (!/^(?:[0-9a-fA-F]{2})+$/.test(hex)) {
    throw new InvalidConfigurationError([
      'VAULT_SHARED_SECRET has a hex: prefix but is not an even-length hex string',
    ]);
  }
  return Buffer.from(hex, 'hex');
}

const MAX_IOCTL_COMMAND = 0xffffffff;

/**
 * Decimal or 0x-prefixed hex, as validated by the environment schema.
 */
export function parseIoctlCommand(raw: string): number {
  const command = Number(raw);
  if (!Number.isSafeInteger(command) || command > MAX_IOCTL_COMMAND) {
    throw new InvalidConfigurationError([
      `VAULT_IOCTL_COMMAND (${raw}) does not fit in an unsigned 32-bit integer`,
    ]);
  }
  return command;
}

function buildTokenPolicy(env: EnvironmentVariables): TokenPolicy {
  if (env.TOKEN_MODE === 'static') {
    return { mode: 'static', literal: env.STATIC_TOKEN ?? '' };
  }
  return {
    mode: 'totp',
    secret: parseSharedSecret(env.VAULT_SHARED_SECRET ?? ''),
    periodSeconds: env.TOKEN_PERIOD_SECONDS,
    windowBlocks: env.TOKEN_WINDOW_BLOCKS,
  };
}

function buildGatePolicy(env: EnvironmentVariables): GatePolicy {
  if (env.GATE_MODE === 'single-shot') {
    return { mode: 'single-shot' };
  }
  const cooldownSeconds = env.COOLDOWN_SECONDS;
  const maxWaitSeconds = env.COOLDOWN_MAX_WAIT_SECONDS ?? cooldownSeconds * 2;
  if (maxWaitSeconds < cooldownSeconds) {
    throw new InvalidConfigurationError([
      `COOLDOWN_MAX_WAIT_SECONDS (${maxWaitSeconds}) must not be shorter than COOLDOWN_SECONDS (${cooldownSeconds})`,
    ]);
  }
  return {
    mode: 'cooldown',
    cooldownMs: cooldownSeconds * 1000,
    maxWaitMs: maxWaitSeconds * 1000,
  };
}

/**
 * Assemble the typed guard configuration from validated variables.
 * @throws InvalidConfigurationError for settings that are individually valid
 * but unusable together
 */
export function buildGuardConfig(env: EnvironmentVariables): GuardConfig {
  return {
    token: buildTokenPolicy(env),
    gate: buildGatePolicy(env),
    unlock: {
      pin: env.UNLOCK_PIN,
      byteOrder: env.UNLOCK_PIN_BYTE_ORDER,
    },
    vault: {
      driver: env.VAULT_DRIVER,
      devicePath: env.VAULT_DEVICE_PATH,
      ioctlCommand: parseIoctlCommand(env.VAULT_IOCTL_COMMAND),
      helperPath: env.VAULT_IOCTL_HELPER,
    },
    display: {
      enabled: env.TOKEN_DISPLAY_ENABLED,
    },
    rejectLogIntervalMs: env.REJECT_LOG_INTERVAL_SECONDS * 1000,
    port: env.PORT,
  };
}

export function loadGuardConfig(
  source: Record<string, unknown> = process.env,
): GuardConfig {
  return buildGuardConfig(validateEnvironment(source));
}

/**
 * Registered with ConfigModule; resolved once while the application boots,
 * so a bad setting aborts startup before anything listens.
 */
export const guardConfig = registerAs('guard', () => loadGuardConfig());

export const GUARD_CONFIG = guardConfig.KEY;
