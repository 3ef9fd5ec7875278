import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  Max,
  Min,
  ValidateIf,
  validateSync,
} from 'class-validator';
import { InvalidConfigurationError } from '../domain/errors';
import {
  DEFAULT_PERIOD_SECONDS,
  DEFAULT_WINDOW_BLOCKS,
} from '../../modules/token/domain/token.rules';

const toBoolean = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? ['true', '1', 'yes'].includes(value) : value;

/**
 * Environment variables read at startup. Every policy constant of the guard
 * is configurable here; the defaults match the reference deployment.
 */
export class EnvironmentVariables {
  @IsIn(['totp', 'static'])
  TOKEN_MODE: 'totp' | 'static' = 'totp';

  @ValidateIf((env: EnvironmentVariables) => env.TOKEN_MODE === 'totp')
  @IsString()
  @IsNotEmpty({ message: 'VAULT_SHARED_SECRET must be set in totp mode' })
  VAULT_SHARED_SECRET?: string;

  @ValidateIf((env: EnvironmentVariables) => env.TOKEN_MODE === 'static')
  @IsString()
  @IsNotEmpty({ message: 'STATIC_TOKEN must be set in static mode' })
  STATIC_TOKEN?: string;

  @IsInt()
  @IsPositive()
  TOKEN_PERIOD_SECONDS: number = DEFAULT_PERIOD_SECONDS;

  @IsInt()
  @Min(1)
  TOKEN_WINDOW_BLOCKS: number = DEFAULT_WINDOW_BLOCKS;

  @IsIn(['cooldown', 'single-shot'])
  GATE_MODE: 'cooldown' | 'single-shot' = 'cooldown';

  @IsNumber()
  @IsPositive()
  COOLDOWN_SECONDS: number = 5;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  COOLDOWN_MAX_WAIT_SECONDS?: number;

  @IsInt()
  @Min(0)
  @Max(0xffffffff)
  UNLOCK_PIN: number = 1337;

  @IsIn(['LE', 'BE'])
  UNLOCK_PIN_BYTE_ORDER: 'LE' | 'BE' = 'LE';

  @IsIn(['device', 'dry-run'])
  VAULT_DRIVER: 'device' | 'dry-run' = 'device';

  @IsString()
  @IsNotEmpty()
  VAULT_DEVICE_PATH: string = '/dev/secret_vault';

  @Matches(/^(0x[0-9a-fA-F]{1,8}|\d+)$/, {
    message: 'VAULT_IOCTL_COMMAND must be a decimal or 0x-prefixed hex number',
  })
  VAULT_IOCTL_COMMAND: string = '0x40047601';

  @IsString()
  @IsNotEmpty()
  VAULT_IOCTL_HELPER: string = 'vault-ioctl';

  @Transform(toBoolean)
  @IsBoolean()
  TOKEN_DISPLAY_ENABLED: boolean = false;

  @IsNumber()
  @Min(0)
  REJECT_LOG_INTERVAL_SECONDS: number = 1;

  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;
}

/**
 * Convert and validate raw environment values.
 * @throws InvalidConfigurationError listing every violated constraint
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const env = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(env, { skipMissingProperties: false });
  if (errors.length > 0) {
    throw new InvalidConfigurationError(
      errors.flatMap((error) => Object.values(error.constraints ?? {})),
    );
  }

  return env;
}
